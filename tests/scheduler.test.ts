/**
 * Tests for ScanScheduler
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ScanScheduler, type SchedulerOptions, type SchedulerProbes } from '../src/core/scheduler.js';
import { ResultAggregator } from '../src/core/aggregator.js';
import { DnsProbe } from '../src/core/dns-probe.js';
import { generateCandidates } from '../src/core/generator.js';
import { ResourceExhaustedError, ScanConfigError } from '../src/core/errors.js';
import { logger } from '../src/utils/logger.js';
import type { CandidateState, DnsOutcome, DnsProber } from '../src/core/types.js';
import {
  FakeDnsProber,
  FakeHttpProber,
  codedError,
  fakeResolverFactory,
  httpResponse,
  resolved,
} from './helpers/fakes.js';

function runScan(probes: SchedulerProbes, options: Partial<SchedulerOptions>, words: string[]) {
  const scheduler = new ScanScheduler(probes, new ResultAggregator(), {
    concurrency: 10,
    timeout: 1000,
    methods: ['dns'],
    ...options,
  });
  return scheduler.run(generateCandidates('example.com', words));
}

function names(run: Awaited<ReturnType<typeof runScan>>): string[] {
  return run.resultSet.results.map((result) => result.name).sort();
}

const ZONE = {
  'www.example.com': { a: ['1.2.3.4'] },
  'mail.example.com': { a: ['1.2.3.5'] },
};

describe('ScanScheduler', () => {
  beforeAll(() => {
    logger.setQuiet(true);
  });

  afterAll(() => {
    logger.setQuiet(false);
  });

  describe('DNS-only scans', () => {
    it('keeps names that resolve and counts the rest', async () => {
      const { factory } = fakeResolverFactory(ZONE);

      const run = await runScan({ dns: new DnsProbe(factory) }, {}, ['www', 'mail', 'doesnotexist123']);

      expect(names(run)).toEqual(['mail.example.com', 'www.example.com']);
      expect(run.resultSet.get('www.example.com')?.addresses).toEqual(['1.2.3.4']);
      expect(run.resultSet.get('mail.example.com')?.addresses).toEqual(['1.2.3.5']);
      expect(run.resultSet.get('doesnotexist123.example.com')).toBeUndefined();
      expect(run.resultSet.statistics).toMatchObject({
        attempted: 3,
        resolved: 2,
        unreachable: 1,
        timedOut: 0,
        errored: 0,
      });
      expect(run.dispatched).toBe(3);
      expect(run.deadlineReached).toBe(false);
    });

    it('never reports a candidate twice', async () => {
      const { factory } = fakeResolverFactory(ZONE);

      const run = await runScan({ dns: new DnsProbe(factory) }, {}, ['www', 'www', ' www ', 'mail', 'www']);

      expect(names(run)).toEqual(['mail.example.com', 'www.example.com']);
      expect(run.resultSet.statistics.attempted).toBe(2);
    });

    it('finds the same names on every run and at every concurrency', async () => {
      const words = ['www', 'mail', 'a', 'b', 'c', 'd', 'e', 'f'];
      const dns = new FakeDnsProber(
        {
          'www.example.com': resolved(['1.2.3.4']),
          'mail.example.com': resolved(['1.2.3.5']),
          'c.example.com': resolved(['1.2.3.6']),
        },
        2
      );

      const serial = await runScan({ dns }, { concurrency: 1 }, words);
      const parallel = await runScan({ dns }, { concurrency: 8 }, words);
      const again = await runScan({ dns }, { concurrency: 8 }, words);

      expect(names(parallel)).toEqual(names(serial));
      expect(names(again)).toEqual(names(serial));
      expect(parallel.resultSet.statistics).toEqual(serial.resultSet.statistics);
    });

    it('returns an empty result set for an empty wordlist', async () => {
      const dns = new FakeDnsProber({});

      const run = await runScan({ dns }, {}, []);

      expect(run.resultSet.results).toEqual([]);
      expect(run.resultSet.statistics.attempted).toBe(0);
    });
  });

  describe('DNS then HTTP', () => {
    it('probes HTTP only where DNS resolved', async () => {
      const { factory } = fakeResolverFactory(ZONE);
      const http = new FakeHttpProber({
        'www.example.com': { http: httpResponse('www.example.com', 'http', 200) },
      });

      const run = await runScan(
        { dns: new DnsProbe(factory), http },
        { methods: ['dns', 'http'], schemes: ['http'] },
        ['www', 'mail', 'doesnotexist123']
      );

      const www = run.resultSet.get('www.example.com');
      const mail = run.resultSet.get('mail.example.com');
      expect(www?.http.http?.status).toBe(200);
      expect(mail?.addresses).toEqual(['1.2.3.5']);
      expect(mail?.http).toEqual({});
      expect(http.calls.map((call) => call.candidate).sort()).toEqual(['mail.example.com', 'www.example.com']);
      expect(run.resultSet.statistics.resolved).toBe(2);
      expect(run.resultSet.statistics.methods.http).toEqual({
        attempted: 2,
        resolved: 1,
        unreachable: 1,
        timedOut: 0,
        errored: 0,
      });
    });

    it('keeps the answer of every scheme', async () => {
      const dns = new FakeDnsProber({ 'www.example.com': resolved(['1.2.3.4']) });
      const http = new FakeHttpProber({
        'www.example.com': {
          http: httpResponse('www.example.com', 'http', 301),
          https: httpResponse('www.example.com', 'https', 200, 'Secure'),
        },
      });

      const run = await runScan({ dns, http }, { methods: ['dns', 'http'] }, ['www']);

      const www = run.resultSet.get('www.example.com');
      expect(www?.http.http?.status).toBe(301);
      expect(www?.http.https?.title).toBe('Secure');
    });

    it('skips the DNS gate for HTTP-only scans', async () => {
      const dns = new FakeDnsProber({});
      const http = new FakeHttpProber({
        'www.example.com': { https: httpResponse('www.example.com', 'https', 200) },
      });

      const run = await runScan({ dns, http }, { methods: ['http'] }, ['www', 'mail']);

      expect(dns.calls).toEqual([]);
      expect(names(run)).toEqual(['www.example.com']);
      expect(run.resultSet.get('www.example.com')?.addresses).toEqual([]);
      expect(run.resultSet.statistics.unreachable).toBe(1);
    });

    it('hands the DNS answers to the HTTP probe', async () => {
      const { factory } = fakeResolverFactory({ 'www.example.com': { a: ['10.20.30.40', '10.20.30.41'] } });
      const http = new FakeHttpProber({});

      await runScan({ dns: new DnsProbe(factory), http }, { methods: ['dns', 'http'], schemes: ['https'] }, ['www']);

      expect(http.calls).toEqual([
        { candidate: 'www.example.com', scheme: 'https', addresses: ['10.20.30.40', '10.20.30.41'] },
      ]);
    });

    it('lets the HTTP probe resolve names itself in HTTP-only scans', async () => {
      const http = new FakeHttpProber({});

      await runScan({ http }, { methods: ['http'], schemes: ['http'] }, ['www']);

      expect(http.calls).toEqual([{ candidate: 'www.example.com', scheme: 'http', addresses: undefined }]);
    });
  });

  describe('timeouts and deadlines', () => {
    it('marks hanging lookups as timed out without stalling the scan', async () => {
      const { factory } = fakeResolverFactory({
        'a.example.com': { a: ['10.0.0.1'], delayMs: 10_000 },
        'b.example.com': { a: ['10.0.0.2'], delayMs: 10_000 },
        'www.example.com': { a: ['1.2.3.4'] },
      });
      const started = Date.now();

      const run = await runScan({ dns: new DnsProbe(factory) }, { timeout: 50 }, ['a', 'b', 'www']);

      expect(Date.now() - started).toBeLessThan(2000);
      expect(names(run)).toEqual(['www.example.com']);
      expect(run.resultSet.statistics.timedOut).toBe(2);
    });

    it('stops dispatching at the scan deadline and drains what is in flight', async () => {
      const dns = new FakeDnsProber({}, 50);
      const words = Array.from({ length: 20 }, (_, i) => `host${i}`);

      const run = await runScan({ dns }, { concurrency: 1, scanTimeout: 75 }, words);

      expect(run.deadlineReached).toBe(true);
      expect(run.dispatched).toBeGreaterThan(0);
      expect(run.dispatched).toBeLessThan(words.length);
      expect(run.resultSet.statistics.attempted).toBe(run.dispatched);
      expect(dns.calls).toHaveLength(run.dispatched);
    });

    it('stops dispatching when aborted and still reports finished candidates', async () => {
      const controller = new AbortController();
      const dns = new FakeDnsProber(
        {
          'host0.example.com': resolved(['10.0.0.1']),
          'host1.example.com': () => {
            controller.abort();
            return resolved(['10.0.0.2']);
          },
        },
        5
      );
      const words = Array.from({ length: 20 }, (_, i) => `host${i}`);

      const run = await runScan({ dns }, { concurrency: 1, signal: controller.signal }, words);

      expect(run.interrupted).toBe(true);
      expect(run.deadlineReached).toBe(false);
      expect(run.dispatched).toBe(2);
      expect(names(run)).toEqual(['host0.example.com', 'host1.example.com']);
      expect(run.resultSet.statistics.attempted).toBe(2);
    });

    it('dispatches nothing when already aborted', async () => {
      const dns = new FakeDnsProber({});
      const controller = new AbortController();
      controller.abort();

      const run = await runScan({ dns }, { signal: controller.signal }, ['www', 'mail']);

      expect(run.interrupted).toBe(true);
      expect(run.dispatched).toBe(0);
      expect(dns.calls).toEqual([]);
    });
  });

  describe('concurrency', () => {
    it('never runs more probe chains than the concurrency limit', async () => {
      let active = 0;
      let peak = 0;
      const dns: DnsProber = {
        async probe(): Promise<DnsOutcome> {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 10));
          active--;
          return { kind: 'unreachable', reason: 'ENOTFOUND' };
        },
      };
      const words = Array.from({ length: 12 }, (_, i) => `host${i}`);

      await runScan({ dns }, { concurrency: 3 }, words);

      expect(peak).toBe(3);
    });

    it('pulls candidates lazily', async () => {
      let pulled = 0;
      function* words() {
        for (let i = 0; i < 100; i++) {
          pulled++;
          yield `host${i}`;
        }
      }
      const pulledAtProbe: number[] = [];
      const dns: DnsProber = {
        async probe(): Promise<DnsOutcome> {
          pulledAtProbe.push(pulled);
          await new Promise((resolve) => setTimeout(resolve, 1));
          return { kind: 'unreachable', reason: 'ENOTFOUND' };
        },
      };

      const scheduler = new ScanScheduler({ dns }, new ResultAggregator(), {
        concurrency: 2,
        timeout: 1000,
        methods: ['dns'],
      });
      await scheduler.run(generateCandidates('example.com', words()));

      expect(pulledAtProbe).toHaveLength(100);
      expect(pulledAtProbe.every((count, i) => count <= i + 2)).toBe(true);
    });
  });

  describe('failures', () => {
    it('isolates a probe that throws', async () => {
      const dns = new FakeDnsProber({
        'www.example.com': resolved(['1.2.3.4']),
        'bad.example.com': () => {
          throw new Error('resolver crashed');
        },
      });

      const run = await runScan({ dns }, {}, ['bad', 'www']);

      expect(names(run)).toEqual(['www.example.com']);
      expect(run.resultSet.statistics.errored).toBe(1);
      expect(run.resultSet.statistics.resolved).toBe(1);
    });

    it('retries timed-out probes up to the configured count', async () => {
      let attempts = 0;
      const dns = new FakeDnsProber({
        'www.example.com': () => {
          attempts++;
          return attempts < 2 ? { kind: 'timed-out', afterMs: 10 } : resolved(['1.2.3.4']);
        },
      });

      const run = await runScan({ dns }, { retries: 1 }, ['www']);

      expect(attempts).toBe(2);
      expect(names(run)).toEqual(['www.example.com']);
    });

    it('does not retry by default or on unreachable', async () => {
      const dns = new FakeDnsProber({ 'slow.example.com': { kind: 'timed-out', afterMs: 10 } });

      await runScan({ dns }, {}, ['slow']);
      await runScan({ dns }, { retries: 2 }, ['gone']);

      expect(dns.calls).toEqual(['slow.example.com', 'gone.example.com']);
    });

    it('aborts the scan when local resources run out', async () => {
      const dns = new FakeDnsProber({
        'www.example.com': { kind: 'error', cause: codedError('EMFILE', 'too many open files') },
      });
      const words = Array.from({ length: 50 }, (_, i) => `host${i}`);

      const error = await runScan({ dns }, { concurrency: 1 }, ['www', ...words]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResourceExhaustedError);
      expect(error).toHaveProperty('code', 'EMFILE');
      expect(dns.calls).toEqual(['www.example.com']);
    });

    it('keeps scanning when a hook throws', async () => {
      const dns = new FakeDnsProber({ 'www.example.com': resolved(['1.2.3.4']) });

      const run = await runScan(
        { dns },
        {
          hooks: {
            onResult: () => {
              throw new Error('hook failed');
            },
          },
        },
        ['www']
      );

      expect(names(run)).toEqual(['www.example.com']);
    });

    it('propagates a failing candidate source after draining', async () => {
      const dns = new FakeDnsProber({});
      function* words() {
        yield 'www.example.com';
        throw new Error('wordlist stream broke');
      }

      const scheduler = new ScanScheduler({ dns }, new ResultAggregator(), {
        concurrency: 2,
        timeout: 1000,
        methods: ['dns'],
      });

      await expect(scheduler.run(words())).rejects.toThrow('wordlist stream broke');
      expect(dns.calls).toEqual(['www.example.com']);
    });
  });

  describe('lifecycle', () => {
    it('walks each candidate through its states in order', async () => {
      const { factory } = fakeResolverFactory(ZONE);
      const http = new FakeHttpProber({
        'www.example.com': { http: httpResponse('www.example.com', 'http', 200) },
      });
      const states = new Map<string, CandidateState[]>();

      await runScan(
        { dns: new DnsProbe(factory), http },
        {
          methods: ['dns', 'http'],
          schemes: ['http'],
          hooks: {
            onCandidateState: (candidate, state) => {
              states.set(candidate, [...(states.get(candidate) ?? []), state]);
            },
          },
        },
        ['www', 'nope']
      );

      expect(states.get('www.example.com')).toEqual(['pending', 'dns-probing', 'dns-resolved', 'http-probing', 'done']);
      expect(states.get('nope.example.com')).toEqual(['pending', 'dns-probing', 'dns-failed', 'done']);
    });

    it('reports each new result and periodic progress', async () => {
      const dns = new FakeDnsProber({
        'www.example.com': resolved(['1.2.3.4']),
        'mail.example.com': resolved(['1.2.3.5']),
      });
      const found: string[] = [];
      const progress: number[] = [];

      await runScan(
        { dns },
        {
          progressInterval: 2,
          hooks: {
            onResult: (result) => found.push(result.name),
            onProgress: (checked) => progress.push(checked),
          },
        },
        ['www', 'mail', 'a', 'b', 'c']
      );

      expect(found.sort()).toEqual(['mail.example.com', 'www.example.com']);
      expect(progress).toEqual([2, 4]);
    });

    it('runs only once', async () => {
      const scheduler = new ScanScheduler({ dns: new FakeDnsProber({}) }, new ResultAggregator(), {
        concurrency: 1,
        timeout: 1000,
        methods: ['dns'],
      });

      await scheduler.run([]);

      await expect(scheduler.run([])).rejects.toThrow('A scheduler runs a single scan');
    });

    it('rejects a non-positive concurrency', () => {
      expect(
        () =>
          new ScanScheduler({ dns: new FakeDnsProber({}) }, new ResultAggregator(), {
            concurrency: 0,
            timeout: 1000,
            methods: ['dns'],
          })
      ).toThrow(ScanConfigError);
    });

    it('requires a prober for every method', () => {
      expect(
        () =>
          new ScanScheduler({ dns: new FakeDnsProber({}) }, new ResultAggregator(), {
            concurrency: 1,
            timeout: 1000,
            methods: ['dns', 'http'],
          })
      ).toThrow('HTTP probing requested without an HTTP prober');
    });
  });
});
