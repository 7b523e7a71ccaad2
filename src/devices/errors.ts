/**
 * Error taxonomy for drivers, dummies and the contract verifier.
 *
 * Device operations never throw: connection, timeout and "not connected"
 * failures travel inside a Result. The classes that are thrown
 * (InvalidParametersError, SynthesisError) signal authoring bugs and fire
 * before any device I/O happens.
 */

import type { ZodIssue } from 'zod';

export type ConnectionFailureReason =
  | 'timeout'
  | 'not_found'
  | 'permission_denied'
  | 'refused'
  | 'io_error';

/** The transport could not be opened. Recoverable: initialize() may be retried. */
export class ConnectionError extends Error {
  override readonly name = 'ConnectionError';

  constructor(
    readonly reason: ConnectionFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /**
   * Classify a transport/library failure by its errno code or message.
   * A ConnectionError keeps its reason; `context` is prefixed either way.
   */
  static from(err: Error, context?: string): ConnectionError {
    if (err instanceof ConnectionError && !context) return err;
    const reason = err instanceof ConnectionError ? err.reason : classifyFailure(err);
    const message = context ? `${context}: ${err.message}` : err.message;
    return new ConnectionError(reason, message, { cause: err });
  }
}

/** A query was sent but no response arrived in time */
export class TimeoutError extends Error {
  override readonly name = 'TimeoutError';

  constructor(readonly command: string, readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms waiting for response to: ${command}`);
  }
}

/** An operation was attempted before initialize() or after close() */
export class NotConnectedError extends Error {
  override readonly name = 'NotConnectedError';

  constructor(device: string) {
    super(`${device} is not connected; call initialize() first`);
  }
}

/** Connection parameters failed validation at construction time */
export class InvalidParametersError extends Error {
  override readonly name = 'InvalidParametersError';

  constructor(readonly driver: string, readonly issues: readonly ZodIssue[]) {
    const details = issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(params)'}: ${issue.message}`)
      .join('; ');
    super(`Invalid connection parameters for ${driver}: ${details}`);
  }
}

/** A dummy could not be derived because the source driver breaks the contract */
export class SynthesisError extends Error {
  override readonly name = 'SynthesisError';

  constructor(readonly driver: string, readonly problems: readonly string[]) {
    super(`Cannot synthesize a dummy for ${driver}: ${problems.join('; ')}`);
  }
}

interface ErrnoLike {
  code?: unknown;
}

function classifyFailure(err: Error & ErrnoLike): ConnectionFailureReason {
  const code = typeof err.code === 'string' ? err.code : '';
  const text = `${code} ${err.message}`.toUpperCase();

  if (err instanceof TimeoutError || code === 'ETIMEDOUT' || text.includes('TIMEOUT')) {
    return 'timeout';
  }
  if (code === 'ENOENT' || code === 'EHOSTUNREACH' || text.includes('NOT FOUND') || text.includes('NO_DEVICE')) {
    return 'not_found';
  }
  if (code === 'EACCES' || code === 'EPERM' || text.includes('PERMISSION') || text.includes('ACCESS')) {
    return 'permission_denied';
  }
  if (code === 'ECONNREFUSED' || text.includes('REFUSED')) {
    return 'refused';
  }
  return 'io_error';
}
