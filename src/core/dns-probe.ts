/**
 * DNS probe: resolve one candidate to its addresses
 */

import { promises as dns } from 'dns';
import { errorCode, toError } from './errors.js';
import { isDeadline, raceDeadline } from '../utils/concurrency.js';
import type { DnsOutcome, DnsProber } from './types.js';

/**
 * The slice of `dns.promises.Resolver` the probe relies on
 */
export interface DnsLookup {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  cancel(): void;
}

export type ResolverFactory = (timeoutMs: number) => DnsLookup;

/** Authoritative "no such name" / "no such record" answers */
const NEGATIVE_CODES = new Set(['ENOTFOUND', 'ENODATA']);

const TIMEOUT_CODES = new Set(['ETIMEOUT']);

/**
 * Map a resolver rejection onto the outcome taxonomy
 */
export function classifyDnsError(error: unknown, elapsedMs: number): DnsOutcome {
  const code = errorCode(error);
  if (code && NEGATIVE_CODES.has(code)) {
    return { kind: 'unreachable', reason: code };
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return { kind: 'timed-out', afterMs: elapsedMs };
  }
  return { kind: 'error', cause: toError(error) };
}

/**
 * One resolver per lookup so a timed-out query can be cancelled without
 * touching queries of other candidates.
 */
export function systemResolverFactory(servers: readonly string[] = []): ResolverFactory {
  return (timeoutMs) => {
    const resolver = new dns.Resolver({ timeout: timeoutMs, tries: 1 });
    if (servers.length > 0) {
      resolver.setServers([...servers]);
    }
    return resolver;
  };
}

/**
 * A records first, AAAA when the name exists without A data. Never retries.
 */
export class DnsProbe implements DnsProber {
  private createResolver: ResolverFactory;

  constructor(createResolver: ResolverFactory = systemResolverFactory()) {
    this.createResolver = createResolver;
  }

  async probe(candidate: string, timeoutMs: number): Promise<DnsOutcome> {
    const started = Date.now();

    let resolver: DnsLookup;
    try {
      resolver = this.createResolver(timeoutMs);
    } catch (error) {
      return { kind: 'error', cause: toError(error) };
    }

    const lookup = this.lookup(resolver, candidate).then(
      (addresses): DnsOutcome =>
        addresses.length > 0
          ? { kind: 'resolved', value: addresses }
          : { kind: 'unreachable', reason: 'no addresses' },
      (error: unknown): DnsOutcome => classifyDnsError(error, Date.now() - started)
    );

    const outcome = await raceDeadline(lookup, timeoutMs, () => resolver.cancel());
    if (isDeadline(outcome)) {
      return { kind: 'timed-out', afterMs: timeoutMs };
    }
    return outcome;
  }

  private async lookup(resolver: DnsLookup, hostname: string): Promise<string[]> {
    try {
      return await resolver.resolve4(hostname);
    } catch (error) {
      if (errorCode(error) !== 'ENODATA') {
        throw error;
      }
      return await resolver.resolve6(hostname);
    }
  }
}
