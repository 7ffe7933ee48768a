import type { FlowRelayError } from './errors';

/**
 * Flat string-keyed map a handler produces for the remote engine.
 */
export type ResultMap = Readonly<Record<string, string>>;

/**
 * Result returned by a StepHandler.
 * This is the ONLY way handlers communicate with the orchestrator.
 */
export type StepResult =
  | { readonly outcome: 'success'; readonly output: ResultMap }
  | { readonly outcome: 'failure'; readonly error: StepError };

export interface StepError {
  readonly code: string;
  readonly message: string;
  readonly details?: unknown;
}

/**
 * Helper functions for creating results.
 */
export const Result = {
  success(output: ResultMap = {}): StepResult {
    return { outcome: 'success', output };
  },

  failure(code: string, message: string, details?: unknown): StepResult {
    return { outcome: 'failure', error: { code, message, details } };
  },

  /** Result for steps whose only signal is that the user finished them. */
  acknowledged(): StepResult {
    return { outcome: 'success', output: { '': '' } };
  },
} as const;

/**
 * Value-or-error returned from every operation that crosses an async boundary.
 */
export type Outcome<T, E = FlowRelayError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const Outcome = {
  ok<T>(value: T): Outcome<T, never> {
    return { ok: true, value };
  },

  err<E>(error: E): Outcome<never, E> {
    return { ok: false, error };
  },
} as const;
