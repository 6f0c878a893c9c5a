/**
 * Address lookup gateway interface.
 * Wraps an external identity/geolocation service (ip-api, Censys, etc).
 */

import type { LookupResult } from '../types/models.js';

export interface ILookupGateway {
  /** Short backend name for logs. */
  readonly name: string;

  /**
   * Look up one address. One outbound call.
   * Rejects with LookupError on network failure, timeout, non-2xx status
   * or an unusable body.
   */
  lookup(address: string): Promise<LookupResult>;
}
