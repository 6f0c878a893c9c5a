/**
 * Domain models: the values that flow through one enrichment run.
 * Decoupled from both the CSV column shapes and the wire formats of the gateways.
 */

// ── Input ──

/** One observed remote address with its traffic counters. Immutable once read. */
export interface NetworkRecord {
  readonly address: string;
  readonly totalEvents: number;
  readonly connects: number;
  readonly disconnects: number;
  readonly sends: number;
  readonly receives: number;
  readonly sendBytes: number;
  readonly receiveBytes: number;
}

// ── Gateway results ──

/**
 * What the lookup service knows about an address.
 * Fields the service did not return stay absent; they are never invented.
 */
export interface LookupResult {
  organization?: string;
  country?: string;
  isp?: string;
  /** Open ports, from lookup backends that scan hosts. */
  ports?: number[];
  /** Service names seen on those ports. */
  services?: string[];
  /** When the backend last observed the host. */
  lastUpdated?: string;
}

/** The fixed instruction template plus everything known about one record. */
export interface EnrichmentContext {
  record: NetworkRecord;
  lookup: LookupResult;
  instructions: string;
}

export interface StructuredAssessment {
  trustworthiness: string;
  primaryPurpose: string;
  securityConcerns: string;
  recommendation: string;
  /** Only present when the backend is asked for a risk score. */
  riskScore?: string;
}

// ── Results ──

export interface EnrichedResult {
  status: 'enriched';
  record: NetworkRecord;
  lookup: LookupResult;
  assessment: StructuredAssessment;
}

export interface FailedResult {
  status: 'failed';
  record: NetworkRecord;
  error: string;
}

export type EnrichedRecord = EnrichedResult | FailedResult;

/** Progress callback invoked after every completed record. */
export type ProgressReporter = (completed: number, total: number) => void;
