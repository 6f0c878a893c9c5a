#!/usr/bin/env node
/**
 * CLI entry point.
 * Loads configuration, picks the input file (argument or interactive choice)
 * and runs one analysis. Per-record failures land in the output file;
 * configuration and file errors abort with exit code 1.
 */

import { createInterface } from 'node:readline/promises';
import { loadConfig } from './config.js';
import { createProductionContainer } from './container.production.js';
import { ConsoleLogProvider } from './providers/index.js';
import { parseCliArgs, USAGE } from './cli/args.js';
import { AppError, ValidationError, errorMessage } from './errors.js';
import type { IRecordStore } from './repositories/IRecordStore.js';

async function chooseInputFile(store: IRecordStore, inputDir: string): Promise<string | null> {
  const files = await store.listInputFiles();
  if (files.length === 0) {
    console.log(`No input CSV files found in ${inputDir}`);
    return null;
  }

  console.log('Available input files:');
  files.forEach((file, i) => console.log(`${i + 1}. ${file}`));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question('Select the number of the file to process: ');
    const selection = Number(answer.trim());
    if (!Number.isInteger(selection) || selection < 1 || selection > files.length) {
      throw new ValidationError(`Invalid selection: ${answer.trim()}`);
    }
    return files[selection - 1];
  } finally {
    rl.close();
  }
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const { config, envFileFound } = loadConfig();
  const logProvider = new ConsoleLogProvider({ outputToConsole: true, level: config.logLevel });
  const log = logProvider.child({ component: 'cli' });
  if (!envFileFound) {
    log.warn('.env file not found; using environment variables only');
  }

  const container = createProductionContainer(config, logProvider);

  try {
    const fileName = args.fileName ?? (await chooseInputFile(container.store, config.inputDir));
    if (fileName === null) return 0;

    const summary = await container.analysisService.run(fileName, args.overrides);
    console.log(
      `\nAnalysis complete: ${summary.enriched} enriched, ${summary.failed} failed. Results saved to: ${summary.outputPath}`
    );
    return 0;
  } finally {
    await logProvider.flush();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof AppError) {
      console.error(`[${err.code}] ${err.message}`);
    } else {
      console.error(`Unexpected error: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  }
);
