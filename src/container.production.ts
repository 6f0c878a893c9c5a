/**
 * Production container: real lookup and assessment gateways, CSV store,
 * console logging. Built once from a validated AppConfig.
 */

import { createContainer, type Container } from './container.js';
import type { AppConfig } from './config.js';
import type { ILogProvider } from './providers/index.js';
import {
  CensysLookupGateway,
  IpApiLookupGateway,
  OpenAIAssessmentGateway,
  type ILookupGateway,
} from './gateways/index.js';
import { CsvRecordStore } from './repositories/CsvRecordStore.js';

function createLookupGateway(config: AppConfig['lookup']): ILookupGateway {
  switch (config.provider) {
    case 'censys':
      return new CensysLookupGateway({
        apiId: config.apiId,
        apiSecret: config.apiSecret,
        timeoutMs: config.timeoutMs,
      });
    case 'ip-api':
      return new IpApiLookupGateway({
        urlTemplate: config.urlTemplate,
        timeoutMs: config.timeoutMs,
      });
  }
}

export function createProductionContainer(config: AppConfig, logProvider: ILogProvider): Container {
  const { assessment } = config;

  return createContainer({
    lookupGateway: createLookupGateway(config.lookup),
    assessmentGateway: new OpenAIAssessmentGateway({
      apiKey: assessment.apiKey,
      baseURL: assessment.baseURL,
      model: assessment.model,
      maxTokens: assessment.maxTokens,
      temperature: assessment.temperature,
      stream: assessment.stream,
      timeoutMs: assessment.timeoutMs,
    }),
    store: new CsvRecordStore(
      { inputDir: config.inputDir, outputDir: config.outputDir },
      logProvider.child({ component: 'CsvRecordStore' })
    ),
    logProvider,
    settings: config.pool,
    enricherOptions: {
      includeRiskScore: assessment.includeRiskScore,
      rejectEmptyAssessment: assessment.rejectEmpty,
    },
  });
}
