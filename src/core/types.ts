// src/core/types.ts
/**
 * Type definitions for subprobe
 */

/**
 * Verification methods a scan can run per candidate
 */
export type ProbeMethod = 'dns' | 'http';

/**
 * URL schemes the HTTP probe tries
 */
export type HttpScheme = 'http' | 'https';

/**
 * Output formats understood by the formatter
 */
export type OutputFormat = 'text' | 'json' | 'csv';

/**
 * Options accepted by `scan()` and the CLI. Durations are in seconds.
 */
export interface ScanOptions {
  /** Path to a wordlist file; the built-in list is used when neither this nor `words` is set */
  wordlist?: string;
  /** In-memory wordlist */
  words?: Iterable<string>;
  concurrency?: number;
  /** Per-probe timeout in seconds */
  timeout?: number;
  methods?: ProbeMethod[];
  schemes?: HttpScheme[];
  /** Scan-wide dispatch deadline in seconds */
  scanTimeout?: number;
  retries?: number;
  /** Upstream DNS servers; the system resolver when empty */
  resolvers?: string[];
  insecure?: boolean;
  output?: string;
  format?: OutputFormat;
  quiet?: boolean;
  verbose?: boolean;
  hooks?: ScanHooks;
  /** Aborting stops dispatch; finished candidates are still reported */
  signal?: AbortSignal;
}

/**
 * Validated scan configuration (see config.ts for defaults)
 */
export interface ScanConfig {
  domain: string;
  wordlist?: string;
  words?: Iterable<string>;
  concurrency: number;
  timeoutMs: number;
  methods: ProbeMethod[];
  schemes: HttpScheme[];
  scanTimeoutMs?: number;
  retries: number;
  resolvers: string[];
  insecure: boolean;
  output?: string;
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
  hooks: ScanHooks;
  signal?: AbortSignal;
}

/**
 * Four-way outcome of any probe
 */
export type ProbeOutcome<T> =
  | { kind: 'resolved'; value: T }
  | { kind: 'unreachable'; reason: string }
  | { kind: 'timed-out'; afterMs: number }
  | { kind: 'error'; cause: Error };

export type FailedOutcome = Exclude<ProbeOutcome<never>, { kind: 'resolved' }>;

export type DnsOutcome = ProbeOutcome<string[]>;

/**
 * What a live HTTP(S) endpoint told us
 */
export interface HttpResponseInfo {
  scheme: HttpScheme;
  url: string;
  status: number;
  contentLength: number;
  title?: string;
  redirects: string[];
}

export type HttpOutcome = ProbeOutcome<HttpResponseInfo>;

/**
 * One probe outcome as handed to the aggregator
 */
export type ProbeReport =
  | { method: 'dns'; outcome: DnsOutcome }
  | { method: 'http'; scheme: HttpScheme; outcome: HttpOutcome };

/**
 * Aggregate record for one confirmed candidate
 */
export interface ScanResult {
  name: string;
  addresses: string[];
  dns?: string[];
  http: Partial<Record<HttpScheme, HttpResponseInfo>>;
  discoveredAt: Date;
}

/**
 * Counters shared by candidate-level and per-method statistics
 */
export interface OutcomeTally {
  attempted: number;
  resolved: number;
  unreachable: number;
  timedOut: number;
  errored: number;
}

export interface ScanStatistics extends OutcomeTally {
  methods: Record<ProbeMethod, OutcomeTally>;
}

/**
 * Read-only view of the aggregated results
 */
export interface ResultSet {
  readonly results: readonly ScanResult[];
  readonly statistics: ScanStatistics;
  get(name: string): ScanResult | undefined;
}

/**
 * Everything a finished scan returns
 */
export interface ScanReport {
  domain: string;
  methods: ProbeMethod[];
  resultSet: ResultSet;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  deadlineReached: boolean;
  /** The scan was aborted before every candidate was dispatched */
  interrupted: boolean;
  outputError?: Error;
}

/**
 * Per-candidate lifecycle
 */
export type CandidateState =
  | 'pending'
  | 'dns-probing'
  | 'dns-resolved'
  | 'dns-failed'
  | 'http-probing'
  | 'done';

/**
 * Lifecycle hooks a caller can attach to a scan
 */
export interface ScanHooks {
  onCandidateState?: (candidate: string, state: CandidateState) => void;
  onResult?: (result: ScanResult) => void;
  onProgress?: (checked: number) => void;
}

/**
 * Probe seams the scheduler drives
 */
export interface DnsProber {
  probe(candidate: string, timeoutMs: number): Promise<DnsOutcome>;
}

export interface HttpProber {
  /** `addresses` are the candidate's DNS answers; absent for HTTP-only scans */
  probe(
    candidate: string,
    scheme: HttpScheme,
    timeoutMs: number,
    addresses?: readonly string[]
  ): Promise<HttpOutcome>;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
