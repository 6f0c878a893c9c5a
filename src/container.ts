/**
 * Dependency wiring.
 * Constructs the enrichment services around whichever gateways, store and
 * log provider it is given. Production passes real implementations
 * (container.production.ts); tests pass mocks.
 */

import type { ILookupGateway } from './gateways/ILookupGateway.js';
import type { IAssessmentGateway } from './gateways/IAssessmentGateway.js';
import type { IRecordStore } from './repositories/IRecordStore.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { RecordEnricher, type RecordEnricherOptions } from './services/RecordEnricher.js';
import { EnrichmentPool, createLogProgressReporter, type Sleep } from './services/EnrichmentPool.js';
import { AnalysisService, type AnalysisSettings } from './services/AnalysisService.js';

export interface Container {
  analysisService: AnalysisService;
  enrichmentPool: EnrichmentPool;
  recordEnricher: RecordEnricher;
  store: IRecordStore;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  lookupGateway: ILookupGateway;
  assessmentGateway: IAssessmentGateway;
  store: IRecordStore;
  logProvider: ILogProvider;
  settings: AnalysisSettings;
  enricherOptions?: RecordEnricherOptions;
  sleep?: Sleep;
}): Container {
  const log = deps.logProvider;

  const recordEnricher = new RecordEnricher(
    deps.lookupGateway,
    deps.assessmentGateway,
    log.child({ component: 'RecordEnricher' }),
    deps.enricherOptions
  );
  const enrichmentPool = new EnrichmentPool(
    recordEnricher,
    log.child({ component: 'EnrichmentPool' }),
    deps.sleep
  );
  const analysisService = new AnalysisService(
    deps.store,
    enrichmentPool,
    log.child({ component: 'AnalysisService' }),
    deps.settings,
    createLogProgressReporter(log.child({ component: 'Progress' }))
  );

  return {
    analysisService,
    enrichmentPool,
    recordEnricher,
    store: deps.store,
    logProvider: log,
  };
}
