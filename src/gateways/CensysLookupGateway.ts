/**
 * Censys host lookup gateway.
 * Uses the Censys Search v2 host view with HTTP Basic auth.
 * Besides organization and country it reports the host's open ports, service names
 * and when Censys last observed it.
 */

import { z } from 'zod';
import type { ILookupGateway } from './ILookupGateway.js';
import type { LookupResult } from '../types/models.js';
import { LookupError, errorMessage } from '../errors.js';

const API_URL = 'https://search.censys.io/api/v2/hosts';
const DEFAULT_TIMEOUT_MS = 10_000;

const CensysHostSchema = z.object({
  result: z.object({
    autonomous_system: z.object({ name: z.string().optional() }).optional(),
    location: z.object({ country: z.string().optional() }).optional(),
    services: z
      .array(
        z.object({
          port: z.number().int().optional(),
          service_name: z.string().optional(),
          transport_protocol: z.string().optional(),
        })
      )
      .optional(),
    last_updated_at: z.string().optional(),
  }),
});

export class CensysLookupGateway implements ILookupGateway {
  readonly name = 'censys';
  private authorization: string;
  private timeoutMs: number;

  constructor(opts: { apiId: string; apiSecret: string; timeoutMs?: number }) {
    this.authorization = `Basic ${Buffer.from(`${opts.apiId}:${opts.apiSecret}`).toString('base64')}`;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async lookup(address: string): Promise<LookupResult> {
    let res: Response;
    try {
      res = await fetch(`${API_URL}/${encodeURIComponent(address)}`, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          Authorization: this.authorization,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new LookupError(`Censys request failed: ${errorMessage(err)}`, { address }, { cause: err });
    }

    if (!res.ok) {
      throw new LookupError(`Censys API error (${res.status})`, { address, status: res.status });
    }

    const parsed = CensysHostSchema.safeParse(await res.json().catch(() => null));
    if (!parsed.success) {
      throw new LookupError('Censys response had an unexpected shape', { address });
    }

    const host = parsed.data.result;
    const result: LookupResult = {};
    if (host.autonomous_system?.name) result.organization = host.autonomous_system.name;
    if (host.location?.country) result.country = host.location.country;
    if (host.last_updated_at) result.lastUpdated = host.last_updated_at;

    if (host.services && host.services.length > 0) {
      const ports: number[] = [];
      const services: string[] = [];
      for (const service of host.services) {
        if (service.port !== undefined) ports.push(service.port);
        if (service.service_name) services.push(service.service_name);
      }
      result.ports = ports;
      result.services = services;
    }

    return result;
  }
}
