export class ConnectionClosedError extends Error {
  constructor(readonly connectionId: number) {
    super(`connection ${connectionId} is closed`);
    this.name = 'ConnectionClosedError';
  }
}

export class WriteTimeoutError extends Error {
  constructor(readonly connectionId: number, readonly timeoutMs: number) {
    super(`write to connection ${connectionId} exceeded ${timeoutMs}ms`);
    this.name = 'WriteTimeoutError';
  }
}

const BENIGN_CODES = new Set([
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

/** Close codes a peer sends when it leaves on purpose (1005: no status received). */
export const NORMAL_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1001, 1005]);

function hasName(error: unknown, name: string): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === name;
}

/** Transport failures that are an ordinary part of peers going away. */
export function isBenignSocketError(error: unknown): boolean {
  if (error instanceof ConnectionClosedError || hasName(error, 'ConnectionClosedError')) {
    return true;
  }
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return BENIGN_CODES.has(error.code);
  }
  return false;
}

// Errors raised inside Node internals are not instances of the caller's Error under a vm realm.
export function isAbortError(error: unknown): boolean {
  return hasName(error, 'AbortError');
}
