/**
 * Scan configuration: defaults and validation
 */

import { isIP } from 'net';
import { ScanConfigError } from './errors.js';
import { inferFormat } from './formatter.js';
import { MAX_RETRIES } from '../utils/concurrency.js';
import type { HttpScheme, OutputFormat, ProbeMethod, ScanConfig, ScanOptions } from './types.js';

const METHODS: readonly ProbeMethod[] = ['dns', 'http'];
const SCHEMES: readonly HttpScheme[] = ['http', 'https'];
const FORMATS: readonly OutputFormat[] = ['text', 'json', 'csv'];

export const DEFAULTS = {
  concurrency: 50,
  timeout: 5,
  methods: METHODS,
  schemes: SCHEMES,
  retries: 0,
};

/**
 * Validate domain format
 */
export function isValidDomain(domain: string): boolean {
  const domainRegex = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
  return domain.length <= 253 && domainRegex.test(domain);
}

/**
 * Lowercase, trim and drop a trailing root dot
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * `1.1.1.1`, `2001:db8::1`, `1.1.1.1:5353` or `[2001:db8::1]:5353`
 */
export function isValidResolver(server: string): boolean {
  if (isIP(server)) return true;

  const m = server.match(/^\[?([^\]]+?)\]?:(\d{1,5})$/);
  if (!m) return false;

  const port = Number(m[2]);
  return isIP(m[1]) !== 0 && port > 0 && port < 65536;
}

function pickSubset<T extends string>(
  label: string,
  values: readonly string[] | undefined,
  allowed: readonly T[],
  fallback: readonly T[]
): T[] {
  if (values === undefined) return [...fallback];
  if (values.length === 0) {
    throw new ScanConfigError(`At least one ${label} is required (${allowed.join(', ')})`);
  }

  const picked: T[] = [];
  for (const value of values) {
    const match = allowed.find((candidate) => candidate === value);
    if (!match) {
      throw new ScanConfigError(`Unknown ${label}: ${value}. Use ${allowed.join(', ')}.`);
    }
    if (!picked.includes(match)) picked.push(match);
  }
  return picked;
}

function seconds(label: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ScanConfigError(`${label} must be a positive number of seconds, got ${value}`);
  }
  return Math.round(value * 1000);
}

export function parseMethods(values: readonly string[]): ProbeMethod[] {
  return pickSubset('method', values, METHODS, DEFAULTS.methods);
}

export function parseSchemes(values: readonly string[]): HttpScheme[] {
  return pickSubset('scheme', values, SCHEMES, DEFAULTS.schemes);
}

export function parseFormat(value: string): OutputFormat {
  const format = FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new ScanConfigError(`Invalid format: ${value}. Use text, json, or csv.`);
  }
  return format;
}

/**
 * Apply defaults and reject misconfiguration before any probe runs
 * @throws ScanConfigError
 */
export function resolveScanConfig(domain: string, options: ScanOptions = {}): ScanConfig {
  const normalized = normalizeDomain(domain);
  if (!isValidDomain(normalized)) {
    throw new ScanConfigError(`Invalid domain: ${domain}`);
  }

  const concurrency = options.concurrency ?? DEFAULTS.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ScanConfigError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const retries = options.retries ?? DEFAULTS.retries;
  if (!Number.isInteger(retries) || retries < 0 || retries > MAX_RETRIES) {
    throw new ScanConfigError(`Retries must be an integer between 0 and ${MAX_RETRIES}, got ${retries}`);
  }

  const resolvers = options.resolvers ?? [];
  const invalid = resolvers.find((server) => !isValidResolver(server));
  if (invalid !== undefined) {
    throw new ScanConfigError(`Invalid resolver address: ${invalid}`);
  }

  return {
    domain: normalized,
    wordlist: options.wordlist,
    words: options.words,
    concurrency,
    timeoutMs: seconds('Timeout', options.timeout ?? DEFAULTS.timeout),
    methods: pickSubset('method', options.methods, METHODS, DEFAULTS.methods),
    schemes: pickSubset('scheme', options.schemes, SCHEMES, DEFAULTS.schemes),
    scanTimeoutMs:
      options.scanTimeout === undefined ? undefined : seconds('Scan timeout', options.scanTimeout),
    retries,
    resolvers,
    insecure: options.insecure ?? false,
    output: options.output,
    format: options.format ?? (options.output ? inferFormat(options.output) : 'text'),
    quiet: options.quiet ?? false,
    verbose: options.verbose ?? false,
    hooks: options.hooks ?? {},
    signal: options.signal,
  };
}
