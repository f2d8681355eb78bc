/**
 * Error taxonomy for an archive run.
 *
 * `fatal` errors abort the whole run; everything else is contained to the
 * download task that raised it and ends up in the run summary.
 */
export abstract class ArchiveError extends Error {
  abstract readonly fatal: boolean;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Credentials were rejected. Never retried, to keep the account from locking. */
export class AuthenticationError extends ArchiveError {
  readonly fatal = true;
  readonly retryable = false;
}

/**
 * The portal answered with an auth-required response mid-run. Recoverable by
 * logging in again; becomes fatal when it repeats past the re-auth cap.
 */
export class SessionExpiredError extends ArchiveError {
  readonly retryable = true;
  readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown; fatal?: boolean }) {
    super(message, options);
    this.fatal = options?.fatal ?? false;
  }
}

export class FetchError extends ArchiveError {
  readonly fatal = false;
  readonly retryable = true;
}

export class FetchTimeoutError extends FetchError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationError extends ArchiveError {
  readonly fatal = false;
  readonly retryable = true;
}

export class PackagingError extends ArchiveError {
  readonly fatal = false;
  readonly retryable = true;
}

/**
 * A timed-out driver call ignored its abort signal. The session may still be
 * navigating, so nothing else is sent to it for the rest of the run.
 */
export class SessionUnusableError extends ArchiveError {
  readonly fatal = true;
  readonly retryable = false;
}

export class ConfigError extends ArchiveError {
  readonly fatal = true;
  readonly retryable = false;
}

export function isFatal(error: unknown): boolean {
  return error instanceof ArchiveError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorClass(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
