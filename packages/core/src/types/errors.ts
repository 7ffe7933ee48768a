/**
 * Base error for all FlowRelay errors.
 */
export class FlowRelayError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'FlowRelayError';
  }
}

// === Payload Codec Errors ===

export type DecodeFailureReason =
  | 'INVALID_ENCODING'
  | 'MALFORMED_JSON'
  | 'NOT_AN_OBJECT'
  | 'NO_REQUESTED_KEYS'
  | 'MISSING_STEP';

export type EncodeFailureReason = 'INVALID_VALUE' | 'SERIALIZATION_FAILED';

/**
 * Instruction payload could not be decoded.
 */
export class DecodeError extends FlowRelayError {
  constructor(
    public readonly reason: DecodeFailureReason,
    message: string
  ) {
    super('DECODE_FAILED', message);
    this.name = 'DecodeError';
  }
}

/**
 * Handler result could not be encoded for submission.
 */
export class EncodeError extends FlowRelayError {
  constructor(
    public readonly reason: EncodeFailureReason,
    message: string
  ) {
    super('ENCODE_FAILED', message);
    this.name = 'EncodeError';
  }
}

// === Continuation Errors ===

/**
 * No handler is registered for the step identifier.
 */
export class UnknownStepError extends FlowRelayError {
  constructor(public readonly step: string) {
    super('UNKNOWN_STEP', `No handler registered for step "${step}"`);
    this.name = 'UnknownStepError';
  }
}

/**
 * A step handler reported failure or threw.
 */
export class HandlerFailureError extends FlowRelayError {
  constructor(
    public readonly step: string,
    public readonly handlerCode: string,
    message: string,
    public readonly details?: unknown
  ) {
    super('HANDLER_FAILED', `Step "${step}" failed (${handlerCode}): ${message}`);
    this.name = 'HandlerFailureError';
  }
}

/**
 * A step handler did not complete within the configured timeout.
 */
export class HandlerTimeoutError extends FlowRelayError {
  constructor(
    public readonly step: string,
    public readonly timeoutMs: number
  ) {
    super('HANDLER_TIMEOUT', `Step "${step}" did not complete within ${timeoutMs}ms`);
    this.name = 'HandlerTimeoutError';
  }
}

/**
 * The host presenter failed to dismiss or show a screen.
 */
export class PresentationError extends FlowRelayError {
  constructor(
    public readonly operation: 'dismissTop' | 'showInterstitial',
    message: string
  ) {
    super('PRESENTATION_FAILED', `${operation} failed: ${message}`);
    this.name = 'PresentationError';
  }
}

/**
 * The remote engine rejected the transition, or it never reached it.
 */
export class TransitionSubmitError extends FlowRelayError {
  constructor(
    public readonly transitionId: string,
    public readonly processId: string,
    message: string,
    public readonly underlying?: unknown
  ) {
    super('TRANSITION_SUBMIT_FAILED', `Transition "${transitionId}" of process "${processId}" failed: ${message}`);
    this.name = 'TransitionSubmitError';
  }
}

/**
 * A continuation is already in flight.
 */
export class ContinuationBusyError extends FlowRelayError {
  constructor(public readonly activeRunId: string) {
    super('CONTINUATION_IN_PROGRESS', `Continuation "${activeRunId}" is still in progress`);
    this.name = 'ContinuationBusyError';
  }
}

// === Session Errors ===

export type IndeterminateReason = 'NO_TOKEN' | 'MALFORMED_TOKEN' | 'NO_EXPIRY_CLAIM';

/**
 * The access token has expired.
 */
export class SessionExpiredError extends FlowRelayError {
  constructor(public readonly expiredAt?: number) {
    super(
      'SESSION_EXPIRED',
      expiredAt === undefined ? 'Session has expired' : `Session expired at ${new Date(expiredAt).toISOString()}`
    );
    this.name = 'SessionExpiredError';
  }
}

/**
 * Session validity cannot be derived from the token.
 */
export class SessionIndeterminateError extends FlowRelayError {
  constructor(public readonly reason: IndeterminateReason) {
    super('SESSION_INDETERMINATE', `Session validity is indeterminate: ${reason}`);
    this.name = 'SessionIndeterminateError';
  }
}

export type SessionError = SessionExpiredError | SessionIndeterminateError;

// === Directory Errors ===

/**
 * A directory request failed at the network or HTTP level.
 */
export class DirectoryRequestError extends FlowRelayError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super('DIRECTORY_REQUEST_FAILED', message);
    this.name = 'DirectoryRequestError';
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * A directory response did not match the expected shape.
 */
export class InvalidResponseError extends FlowRelayError {
  constructor(
    public readonly operation: string,
    public readonly issues: ValidationIssue[]
  ) {
    super('INVALID_RESPONSE', `Invalid ${operation} response: ${issues[0]?.path ?? '/'} ${issues[0]?.message ?? ''}`.trim());
    this.name = 'InvalidResponseError';
  }
}
