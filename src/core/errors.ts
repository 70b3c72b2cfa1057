/**
 * Fatal scan errors. Per-candidate failures are outcomes, not exceptions.
 */

export class ScanConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScanConfigError';
  }
}

export class WordlistError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read wordlist ${path}: ${reason}`, { cause });
    this.name = 'WordlistError';
    this.path = path;
  }
}

export class ResourceExhaustedError extends Error {
  readonly code: string;

  constructor(code: string, cause: Error) {
    super(`Local resources exhausted (${code}): ${cause.message}`, { cause });
    this.name = 'ResourceExhaustedError';
    this.code = code;
  }
}

/**
 * Read a Node-style `code` off an unknown error value
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
