/**
 * Concurrency control utilities
 */

import type { ProbeOutcome } from '../core/types.js';

/**
 * Hard cap on probe retries
 */
export const MAX_RETRIES = 3;

export const DEADLINE = Symbol('deadline');

/**
 * Race a promise against a timer. Settles no later than `ms` even if the
 * underlying operation never does; `onTimeout` lets the caller abort it.
 * @returns The promise's value, or the `DEADLINE` marker
 */
export async function raceDeadline<T>(
  task: Promise<T>,
  ms: number,
  onTimeout?: () => void
): Promise<T | typeof DEADLINE> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof DEADLINE>((resolve) => {
    timer = setTimeout(() => {
      onTimeout?.();
      resolve(DEADLINE);
    }, ms);
  });

  try {
    return await Promise.race([task, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function isDeadline(value: unknown): value is typeof DEADLINE {
  return value === DEADLINE;
}

/**
 * Re-run a probe while its outcome is `timed-out` or `error`.
 * No backoff: per-probe timeouts are already short.
 * @param probe Probe invocation
 * @param retries Extra attempts after the first, capped at MAX_RETRIES
 */
export async function retryProbe<T>(
  probe: () => Promise<ProbeOutcome<T>>,
  retries = 0
): Promise<ProbeOutcome<T>> {
  const attempts = 1 + Math.min(Math.max(retries, 0), MAX_RETRIES);
  let outcome = await probe();

  for (let attempt = 1; attempt < attempts; attempt++) {
    if (outcome.kind !== 'timed-out' && outcome.kind !== 'error') {
      break;
    }
    outcome = await probe();
  }

  return outcome;
}

