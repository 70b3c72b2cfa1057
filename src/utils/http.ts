/**
 * HTTP utilities
 */

import { lookup as systemLookup, type LookupAddress } from 'dns';
import { isIP, type LookupFunction } from 'net';
import { Agent } from 'undici';

export interface HttpAgentOptions {
  /** Connect timeout in milliseconds */
  connectTimeout: number;
  /** Skip certificate verification */
  insecure?: boolean;
  /** Host resolution for new sockets; the system resolver when absent */
  lookup?: LookupFunction;
}

function familyOf(value: unknown): number {
  if (value === 4 || value === 'IPv4') return 4;
  if (value === 6 || value === 'IPv6') return 6;
  return 0;
}

/**
 * Addresses already resolved for a hostname, so sockets connect to what
 * the DNS probe found instead of asking the system resolver again.
 * Pins are reference counted: concurrent probes of one name share an entry.
 */
export class AddressBook {
  private entries = new Map<string, { addresses: readonly string[]; refs: number }>();

  /**
   * @returns Release callback; the pin is dropped once every holder released it
   */
  pin(hostname: string, addresses: readonly string[]): () => void {
    const key = hostname.toLowerCase();
    const entry = this.entries.get(key);
    if (entry) {
      entry.refs++;
      entry.addresses = addresses;
    } else {
      this.entries.set(key, { addresses, refs: 1 });
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;

      const current = this.entries.get(key);
      if (!current) return;
      current.refs--;
      if (current.refs <= 0) this.entries.delete(key);
    };
  }

  get(hostname: string): readonly string[] | undefined {
    return this.entries.get(hostname.toLowerCase())?.addresses;
  }

  /**
   * `net.connect` lookup hook: pinned names answer from the book, others go to the system resolver
   */
  readonly lookup: LookupFunction = (hostname, options, callback) => {
    const pinned = this.get(hostname);
    if (!pinned) {
      systemLookup(hostname, options, callback);
      return;
    }

    const wanted = familyOf(options.family);
    const records: LookupAddress[] = pinned
      .map((address) => ({ address, family: isIP(address) }))
      .filter((record) => record.family !== 0 && (wanted === 0 || record.family === wanted));

    if (records.length === 0) {
      const error = Object.assign(new Error(`No pinned IPv${wanted} address for ${hostname}`), {
        code: 'ENOTFOUND',
        hostname,
      });
      callback(error, options.all ? [] : '');
      return;
    }

    if (options.all) {
      callback(null, records);
    } else {
      callback(null, records[0].address, records[0].family);
    }
  };
}

/**
 * Settings for the per-scan dispatcher. Liveness checks hit every origin once,
 * so keep-alive is short.
 */
export function agentOptions(options: HttpAgentOptions) {
  return {
    connections: 4,
    keepAliveTimeout: 1000,
    keepAliveMaxTimeout: 5000,
    connect: {
      timeout: options.connectTimeout,
      rejectUnauthorized: !options.insecure,
      ...(options.lookup ? { lookup: options.lookup } : {}),
    },
  };
}

export function createHttpAgent(options: HttpAgentOptions) {
  return new Agent(agentOptions(options));
}

/**
 * Resolve a Location header against the URL that produced it
 */
export function resolveLocation(currentUrl: string, location: string): URL | null {
  try {
    return new URL(location, currentUrl);
  } catch {
    return null;
  }
}
