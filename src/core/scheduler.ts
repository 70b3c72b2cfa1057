/**
 * Bounded-concurrency probing engine
 */

import pLimit from 'p-limit';
import { ResultAggregator } from './aggregator.js';
import { ResourceExhaustedError, ScanConfigError, errorCode, toError } from './errors.js';
import { retryProbe } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import type {
  CandidateState,
  DnsProber,
  HttpProber,
  HttpScheme,
  ProbeMethod,
  ProbeOutcome,
  ProbeReport,
  ResultSet,
  ScanHooks,
} from './types.js';

/** Local failures that mean no further probe can succeed */
const RESOURCE_EXHAUSTION_CODES = new Set(['EMFILE', 'ENFILE', 'ENOBUFS', 'ENOMEM']);

export interface SchedulerOptions {
  concurrency: number;
  /** Per-probe timeout in milliseconds */
  timeout: number;
  methods: readonly ProbeMethod[];
  schemes?: readonly HttpScheme[];
  retries?: number;
  /** Stop dispatching new candidates this many milliseconds after start */
  scanTimeout?: number;
  hooks?: ScanHooks;
  /** Emit onProgress every N finished candidates */
  progressInterval?: number;
  /** Abort stops dispatch like the scan deadline; in-flight chains drain */
  signal?: AbortSignal;
}

export interface SchedulerProbes {
  dns?: DnsProber;
  http?: HttpProber;
}

export interface SchedulerRun {
  resultSet: ResultSet;
  dispatched: number;
  deadlineReached: boolean;
  interrupted: boolean;
}

/**
 * Pulls candidates one at a time and runs each one's probe chain
 * (DNS, then HTTP per scheme when DNS resolved) with at most
 * `concurrency` chains in flight.
 */
export class ScanScheduler {
  private probes: SchedulerProbes;
  private aggregator: ResultAggregator;
  private concurrency: number;
  private timeout: number;
  private methods: readonly ProbeMethod[];
  private schemes: readonly HttpScheme[];
  private retries: number;
  private scanTimeout?: number;
  private hooks: ScanHooks;
  private progressInterval: number;
  private signal?: AbortSignal;
  private checked = 0;
  private started = false;
  private fatal?: ResourceExhaustedError;

  constructor(probes: SchedulerProbes, aggregator: ResultAggregator, options: SchedulerOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ScanConfigError(`Concurrency must be a positive integer, got ${options.concurrency}`);
    }
    if (options.methods.includes('dns') && !probes.dns) {
      throw new ScanConfigError('DNS probing requested without a DNS prober');
    }
    if (options.methods.includes('http') && !probes.http) {
      throw new ScanConfigError('HTTP probing requested without an HTTP prober');
    }

    this.probes = probes;
    this.aggregator = aggregator;
    this.concurrency = options.concurrency;
    this.timeout = options.timeout;
    this.methods = options.methods;
    this.schemes = options.schemes ?? ['http', 'https'];
    this.retries = options.retries ?? 0;
    this.scanTimeout = options.scanTimeout;
    this.hooks = options.hooks ?? {};
    this.progressInterval = options.progressInterval ?? 100;
    this.signal = options.signal;
  }

  /**
   * Consume the candidate sequence to exhaustion (or to the scan deadline),
   * wait for every dispatched chain, then finalize the aggregator.
   */
  async run(candidates: Iterable<string>): Promise<SchedulerRun> {
    if (this.started) {
      throw new Error('A scheduler runs a single scan');
    }
    this.started = true;

    const limit = pLimit(this.concurrency);
    const inFlight = new Set<Promise<void>>();
    const iterator = candidates[Symbol.iterator]();
    const deadline = this.scanTimeout !== undefined ? Date.now() + this.scanTimeout : undefined;
    let deadlineReached = false;
    let interrupted = false;
    let dispatched = 0;

    try {
      while (!this.fatal) {
        if (inFlight.size >= this.concurrency) {
          await Promise.race(inFlight);
          continue;
        }
        if (deadline !== undefined && Date.now() >= deadline) {
          deadlineReached = true;
          logger.warn(`Scan deadline reached after ${dispatched} candidates; draining in-flight probes`);
          break;
        }
        if (this.signal?.aborted) {
          interrupted = true;
          logger.warn(`Scan interrupted after ${dispatched} candidates; draining in-flight probes`);
          break;
        }

        // Single claim point: each candidate is taken exactly once
        const next = iterator.next();
        if (next.done) break;

        const candidate = next.value;
        dispatched++;
        this.transition(candidate, 'pending');

        const task: Promise<void> = limit(() => this.evaluate(candidate)).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
      }
    } catch (error) {
      await Promise.allSettled(inFlight);
      this.aggregator.finalize();
      throw error;
    }

    await Promise.all(inFlight);
    this.aggregator.finalize();

    if (this.fatal) {
      throw this.fatal;
    }

    return {
      resultSet: this.aggregator.snapshot(),
      dispatched,
      deadlineReached,
      interrupted,
    };
  }

  /**
   * Full probe chain for one candidate. Never rejects.
   */
  private async evaluate(candidate: string): Promise<void> {
    try {
      let gateOpen = true;
      let addresses: string[] | undefined;

      if (this.methods.includes('dns') && this.probes.dns) {
        const dns = this.probes.dns;
        this.transition(candidate, 'dns-probing');
        const outcome = await this.runProbe(() => dns.probe(candidate, this.timeout));
        this.record(candidate, { method: 'dns', outcome });

        gateOpen = outcome.kind === 'resolved';
        if (outcome.kind === 'resolved') addresses = outcome.value;
        this.transition(candidate, gateOpen ? 'dns-resolved' : 'dns-failed');
      }

      if (gateOpen && this.methods.includes('http') && this.probes.http) {
        const http = this.probes.http;
        this.transition(candidate, 'http-probing');
        await Promise.all(
          this.schemes.map(async (scheme) => {
            const outcome = await this.runProbe(() => http.probe(candidate, scheme, this.timeout, addresses));
            this.record(candidate, { method: 'http', scheme, outcome });
          })
        );
      }
    } catch (error) {
      logger.error(`Unexpected failure while evaluating ${candidate}:`, toError(error));
    } finally {
      this.aggregator.complete(candidate);
      this.transition(candidate, 'done');
      this.checked++;
      if (this.checked % this.progressInterval === 0) {
        const checked = this.checked;
        this.callHook('onProgress', () => this.hooks.onProgress?.(checked));
      }
    }
  }

  /**
   * Probe with optional retries; a throwing probe becomes an `error` outcome
   */
  private runProbe<T>(probe: () => Promise<ProbeOutcome<T>>): Promise<ProbeOutcome<T>> {
    return retryProbe<T>(async () => {
      try {
        return await probe();
      } catch (error) {
        return { kind: 'error', cause: toError(error) };
      }
    }, this.retries);
  }

  private record(candidate: string, report: ProbeReport) {
    const label = report.method === 'dns' ? 'dns' : report.scheme;
    const { outcome } = report;

    switch (outcome.kind) {
      case 'unreachable':
        logger.debug(`${candidate} [${label}] unreachable (${outcome.reason})`);
        break;
      case 'timed-out':
        logger.debug(`${candidate} [${label}] timed out after ${outcome.afterMs}ms`);
        break;
      case 'error': {
        logger.warn(`${candidate} [${label}] failed: ${outcome.cause.message}`);
        const code = errorCode(outcome.cause);
        if (code && RESOURCE_EXHAUSTION_CODES.has(code) && !this.fatal) {
          this.fatal = new ResourceExhaustedError(code, outcome.cause);
        }
        break;
      }
      case 'resolved':
        break;
    }

    const created = this.aggregator.record(candidate, report);
    if (created) {
      this.callHook('onResult', () => this.hooks.onResult?.(created));
    }
  }

  private transition(candidate: string, state: CandidateState) {
    this.callHook('onCandidateState', () => this.hooks.onCandidateState?.(candidate, state));
  }

  /**
   * A throwing hook is logged and never reaches the probe chain
   */
  private callHook(name: keyof ScanHooks, invoke: () => void) {
    try {
      invoke();
    } catch (error) {
      logger.error(`Hook ${name} failed:`, toError(error));
    }
  }
}
