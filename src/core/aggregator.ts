/**
 * Result aggregation: sole owner of the result set for one scan
 */

import type {
  FailedOutcome,
  OutcomeTally,
  ProbeMethod,
  ProbeReport,
  ResultSet,
  ScanResult,
  ScanStatistics,
} from './types.js';

type FailureKind = FailedOutcome['kind'];

/** Most severe failure wins when a candidate never succeeds */
const SEVERITY: Record<FailureKind, number> = {
  unreachable: 0,
  'timed-out': 1,
  error: 2,
};

function emptyTally(): OutcomeTally {
  return { attempted: 0, resolved: 0, unreachable: 0, timedOut: 0, errored: 0 };
}

function countFailure(tally: OutcomeTally, kind: FailureKind) {
  switch (kind) {
    case 'unreachable':
      tally.unreachable++;
      break;
    case 'timed-out':
      tally.timedOut++;
      break;
    case 'error':
      tally.errored++;
      break;
  }
}

function mergeInto(result: ScanResult, report: ProbeReport) {
  if (report.method === 'dns') {
    if (report.outcome.kind === 'resolved') {
      const addresses = report.outcome.value;
      result.dns = [...addresses];
      result.addresses = [...new Set([...result.addresses, ...addresses])];
    }
  } else if (report.outcome.kind === 'resolved') {
    result.http[report.scheme] = report.outcome.value;
  }
}

function freezeResult(result: ScanResult): ScanResult {
  Object.freeze(result.addresses);
  if (result.dns) Object.freeze(result.dns);
  for (const response of Object.values(result.http)) {
    if (!response) continue;
    Object.freeze(response.redirects);
    Object.freeze(response);
  }
  Object.freeze(result.http);
  return Object.freeze(result);
}

/**
 * Collects probe outcomes into a deduplicated, completion-ordered result set.
 *
 * `record` runs to completion without awaiting, so on the event loop the
 * merge-or-create step cannot interleave with another worker's.
 */
export class ResultAggregator {
  private results = new Map<string, ScanResult>();
  private failures = new Map<string, FailureKind>();
  private settled = new Set<string>();
  private candidates: OutcomeTally = emptyTally();
  private methods: Record<ProbeMethod, OutcomeTally> = { dns: emptyTally(), http: emptyTally() };
  private finalized = false;
  private frozen?: ResultSet;

  /**
   * Record one probe outcome for a candidate
   * @returns The candidate's result when this outcome created it, otherwise undefined
   */
  record(candidate: string, report: ProbeReport): ScanResult | undefined {
    this.assertOpen();

    const tally = this.methods[report.method];
    tally.attempted++;

    const failure = report.outcome.kind === 'resolved' ? undefined : report.outcome.kind;
    if (failure) {
      countFailure(tally, failure);
      this.noteFailure(candidate, failure);
      return undefined;
    }
    tally.resolved++;

    const existing = this.results.get(candidate);
    const result: ScanResult = existing ?? {
      name: candidate,
      addresses: [],
      http: {},
      discoveredAt: new Date(),
    };
    mergeInto(result, report);

    if (existing) {
      return undefined;
    }
    this.results.set(candidate, result);
    return result;
  }

  /**
   * Settle candidate-level statistics once a candidate's probe chain is done
   */
  complete(candidate: string): void {
    this.assertOpen();
    if (this.settled.has(candidate)) return;

    this.settled.add(candidate);
    this.candidates.attempted++;

    if (this.results.has(candidate)) {
      this.candidates.resolved++;
    } else {
      countFailure(this.candidates, this.failures.get(candidate) ?? 'error');
    }
    this.failures.delete(candidate);
  }

  /**
   * Stop accepting outcomes. Idempotent.
   */
  finalize(): void {
    this.finalized = true;
  }

  /**
   * Frozen results and statistics; only valid after finalize()
   */
  snapshot(): ResultSet {
    if (!this.finalized) {
      throw new Error('Cannot snapshot results before the scan has finished');
    }
    if (this.frozen) {
      return this.frozen;
    }

    const results = Object.freeze([...this.results.values()].map(freezeResult));
    const byName = new Map(results.map((result) => [result.name, result]));
    const statistics: ScanStatistics = Object.freeze({
      ...this.candidates,
      methods: Object.freeze({
        dns: Object.freeze({ ...this.methods.dns }),
        http: Object.freeze({ ...this.methods.http }),
      }),
    });

    this.frozen = Object.freeze({
      results,
      statistics,
      get: (name: string) => byName.get(name),
    });
    return this.frozen;
  }

  private noteFailure(candidate: string, kind: FailureKind) {
    const previous = this.failures.get(candidate);
    if (previous === undefined || SEVERITY[kind] > SEVERITY[previous]) {
      this.failures.set(candidate, kind);
    }
  }

  private assertOpen() {
    if (this.finalized) {
      throw new Error('Result set is finalized');
    }
  }
}
