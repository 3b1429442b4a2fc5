/**
 * Error taxonomy for the solve loop.
 *
 * - transient: retry after a backoff (element not ready, stale handle, network hiccup)
 * - reload:    give up on this challenge instance and ask the widget for a new one
 * - fatal:     end the run; the widget's frames are not on the page
 */

export type FailureKind = 'transient' | 'reload' | 'fatal';

export class SolverError extends Error {
  readonly kind: FailureKind;

  constructor(message: string, kind: FailureKind = 'transient', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SolverError';
    this.kind = kind;
  }
}

export class NotFoundError extends SolverError {
  readonly locator: string;
  readonly timeoutMs: number;

  constructor(locator: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Element not found within ${timeoutMs}ms: ${locator}`, 'transient', options);
    this.name = 'NotFoundError';
    this.locator = locator;
    this.timeoutMs = timeoutMs;
  }
}

export class StaleElementError extends SolverError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Stale element: ${detail}`, 'transient', options);
    this.name = 'StaleElementError';
  }
}

export class UnsolvableChallengeError extends SolverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'reload', options);
    this.name = 'UnsolvableChallengeError';
  }
}

export class RootSurfaceMissingError extends SolverError {
  constructor(frame: string, options?: { cause?: unknown }) {
    super(`Challenge frame "${frame}" is not on the page`, 'fatal', options);
    this.name = 'RootSurfaceMissingError';
  }
}

export function failureKind(err: unknown): FailureKind {
  return err instanceof SolverError ? err.kind : 'transient';
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
