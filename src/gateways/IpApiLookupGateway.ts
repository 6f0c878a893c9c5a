/**
 * ip-api style lookup gateway.
 * One GET per address against a templated URL; JSON body with optional
 * `org` / `organization`, `country` and `isp` keys.
 * No SDK dependency; uses native fetch.
 */

import { z } from 'zod';
import type { ILookupGateway } from './ILookupGateway.js';
import type { LookupResult } from '../types/models.js';
import { LookupError, errorMessage } from '../errors.js';

export const DEFAULT_URL_TEMPLATE = 'http://ip-api.com/json/{address}';
const DEFAULT_TIMEOUT_MS = 10_000;

const IpApiResponseSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  country: z.string().optional(),
  org: z.string().optional(),
  organization: z.string().optional(),
  isp: z.string().optional(),
});

export class IpApiLookupGateway implements ILookupGateway {
  readonly name = 'ip-api';
  private urlTemplate: string;
  private timeoutMs: number;

  constructor(opts?: { urlTemplate?: string; timeoutMs?: number }) {
    this.urlTemplate = opts?.urlTemplate ?? DEFAULT_URL_TEMPLATE;
    this.timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async lookup(address: string): Promise<LookupResult> {
    const url = this.urlTemplate.replace('{address}', encodeURIComponent(address));

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new LookupError(`Lookup request failed: ${errorMessage(err)}`, { address }, { cause: err });
    }

    if (!res.ok) {
      throw new LookupError(`Lookup API error (${res.status})`, { address, status: res.status });
    }

    let raw: unknown;
    try {
      raw = await res.json();
    } catch (err) {
      throw new LookupError('Lookup response was not valid JSON', { address }, { cause: err });
    }

    const parsed = IpApiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LookupError('Lookup response had an unexpected shape', { address });
    }

    const body = parsed.data;
    // ip-api answers 200 with status "fail" for private and reserved ranges
    if (body.status === 'fail') {
      throw new LookupError(`Lookup rejected address: ${body.message ?? 'unknown reason'}`, { address });
    }

    const result: LookupResult = {};
    const organization = body.org || body.organization;
    if (organization) result.organization = organization;
    if (body.country) result.country = body.country;
    if (body.isp) result.isp = body.isp;
    return result;
  }
}
