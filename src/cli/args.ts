/**
 * Command-line argument parsing.
 *
 *   ip-risk-enrich [file.csv] [--concurrency=N] [--pacing-ms=N] [--retry-passes=N]
 */

import type { AnalysisSettings } from '../services/AnalysisService.js';
import { ValidationError } from '../errors.js';

export interface CliArgs {
  fileName?: string;
  overrides: Partial<AnalysisSettings>;
  help: boolean;
}

const FLAGS: Record<string, { key: keyof AnalysisSettings; min: number }> = {
  '--concurrency': { key: 'concurrency', min: 1 },
  '--pacing-ms': { key: 'pacingMs', min: 0 },
  '--retry-passes': { key: 'retryPasses', min: 0 },
};

export const USAGE =
  'Usage: ip-risk-enrich [file.csv] [--concurrency=N] [--pacing-ms=N] [--retry-passes=N]';

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { overrides: {}, help: false };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const [name, value] = arg.split('=', 2);
      const flag = FLAGS[name];
      if (!flag) {
        throw new ValidationError(`Unknown option ${name}`);
      }
      if (value === undefined || !/^\d+$/.test(value) || Number(value) < flag.min) {
        throw new ValidationError(`${name} expects a whole number of at least ${flag.min}`, {
          value,
        });
      }
      result.overrides[flag.key] = Number(value);
      continue;
    }

    if (result.fileName !== undefined) {
      throw new ValidationError(`Unexpected argument ${arg}`);
    }
    result.fileName = arg;
  }

  return result;
}
