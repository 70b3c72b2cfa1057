/**
 * src/core/http-probe.ts
 *
 * HTTP/HTTPS liveness probe:
 * - one GET per scheme against the candidate's default port, connecting to the
 *   addresses DNS already returned (Host and SNI stay the candidate name)
 * - redirects followed by hand, at most MAX_REDIRECTS hops
 * - bounded body read, enough to find a <title>
 * - hard deadline per attempt via AbortController + timer race
 */

import { request, type Dispatcher } from 'undici';
import { errorCode, toError } from './errors.js';
import { AddressBook, createHttpAgent, resolveLocation } from '../utils/http.js';
import { isDeadline, raceDeadline } from '../utils/concurrency.js';
import type { HttpOutcome, HttpProber, HttpResponseInfo, HttpScheme } from './types.js';

export const MAX_REDIRECTS = 3;
const DEFAULT_MAX_BODY_BYTES = 64 * 1024;
const MAX_TITLE_LENGTH = 200;

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ENOTFOUND']);

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export class TooManyRedirectsError extends Error {
  readonly redirects: string[];

  constructor(redirects: string[]) {
    super(`Exceeded ${MAX_REDIRECTS} redirects: ${redirects.join(' -> ')}`);
    this.name = 'TooManyRedirectsError';
    this.redirects = redirects;
  }
}

export interface HttpProbeOptions {
  /** Dispatcher to send requests through; the probe creates (and closes) its own when absent */
  dispatcher?: Dispatcher;
  insecure?: boolean;
  /** Connect timeout of the probe's own dispatcher, normally the per-probe timeout */
  connectTimeout?: number;
  maxBodyBytes?: number;
}

const USER_AGENT = 'subprobe/1.0';
const DEFAULT_CONNECT_TIMEOUT = 10000;

/**
 * Map a request failure onto the outcome taxonomy
 */
export function classifyHttpError(error: unknown, elapsedMs: number): HttpOutcome {
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(error) ?? errorCode(cause);

  if (code && UNREACHABLE_CODES.has(code)) {
    return { kind: 'unreachable', reason: code };
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return { kind: 'timed-out', afterMs: elapsedMs };
  }
  return { kind: 'error', cause: toError(error) };
}

/**
 * First <title> text, whitespace collapsed and capped
 */
export function extractTitle(html: string): string | undefined {
  const m = html.match(/<title[^>]*>([^<]*)<\/title>/i);
  if (!m) return undefined;

  const title = m[1].replace(/\s+/g, ' ').trim();
  return title ? title.slice(0, MAX_TITLE_LENGTH) : undefined;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export class HttpProbe implements HttpProber {
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private maxBodyBytes: number;
  private addresses = new AddressBook();

  constructor(options: HttpProbeOptions = {}) {
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      createHttpAgent({
        connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
        insecure: options.insecure,
        lookup: this.addresses.lookup,
      });
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  /**
   * @param addresses Addresses DNS returned for the candidate; the system resolver is used when absent
   */
  async probe(
    candidate: string,
    scheme: HttpScheme,
    timeoutMs: number,
    addresses?: readonly string[]
  ): Promise<HttpOutcome> {
    const started = Date.now();
    const controller = new AbortController();
    const release = addresses && addresses.length > 0 ? this.addresses.pin(candidate, addresses) : undefined;

    const attempt = this.fetch(`${scheme}://${candidate}/`, scheme, controller.signal, timeoutMs).then(
      (info): HttpOutcome => ({ kind: 'resolved', value: info }),
      (error: unknown): HttpOutcome => classifyHttpError(error, Date.now() - started)
    );

    try {
      const outcome = await raceDeadline(attempt, timeoutMs, () => controller.abort());
      if (isDeadline(outcome)) {
        return { kind: 'timed-out', afterMs: timeoutMs };
      }
      return outcome;
    } finally {
      release?.();
    }
  }

  /**
   * Release sockets held by a dispatcher this probe created
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async fetch(
    startUrl: string,
    scheme: HttpScheme,
    signal: AbortSignal,
    timeoutMs: number
  ): Promise<HttpResponseInfo> {
    const redirects: string[] = [];
    let url = startUrl;

    for (;;) {
      const response = await request(url, {
        method: 'GET',
        headers: {
          accept: 'text/html,application/xhtml+xml,*/*;q=0.8',
          'user-agent': USER_AGENT,
        },
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        signal,
        dispatcher: this.dispatcher,
      });

      const status = response.statusCode;
      const location = headerValue(response.headers.location);

      if (status >= 300 && status < 400 && location) {
        await response.body.dump();

        const next = resolveLocation(url, location);
        if (!next || (next.protocol !== 'http:' && next.protocol !== 'https:')) {
          throw new Error(`Unsupported redirect target: ${location}`);
        }
        if (redirects.length >= MAX_REDIRECTS) {
          throw new TooManyRedirectsError([...redirects, next.toString()]);
        }

        redirects.push(next.toString());
        url = next.toString();
        continue;
      }

      const { text, bytes } = await this.readHead(response.body);
      const declared = Number(headerValue(response.headers['content-length']));
      const contentType = headerValue(response.headers['content-type']) ?? '';

      return {
        scheme,
        url,
        status,
        contentLength: Number.isFinite(declared) && declared >= 0 ? declared : bytes,
        title: contentType.toLowerCase().includes('text/html') ? extractTitle(text) : undefined,
        redirects,
      };
    }
  }

  /**
   * Read at most maxBodyBytes; leaving the loop early destroys the rest of the stream
   */
  private async readHead(body: Dispatcher.ResponseData['body']): Promise<{ text: string; bytes: number }> {
    const chunks: Buffer[] = [];
    let bytes = 0;

    for await (const chunk of body) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      chunks.push(buf);
      bytes += buf.length;
      if (bytes >= this.maxBodyBytes) break;
    }

    const head = Buffer.concat(chunks).subarray(0, this.maxBodyBytes);
    return { text: head.toString('utf-8'), bytes };
  }
}
