import { DecodeError, EncodeError } from '../types/errors';
import { Outcome } from '../types/result';
import type { StepInstruction } from '../types/process';

/** Payload key that carries the step identifier. */
export const DEFAULT_STEP_KEY = 'stepName';

/** Keys recognized by default at continuation call sites. */
export const DEFAULT_INSTRUCTION_KEYS: readonly string[] = [
  DEFAULT_STEP_KEY,
  'token',
  'clientID',
  'secondParams',
  'transactionId',
  'amount',
];

// Standard and URL-safe alphabets, padding optional.
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerce(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Converts between the base64 JSON transport form and flat string maps.
 * Never throws: every failure comes back as an Outcome.
 */
export class PayloadCodec {
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  /**
   * Decode a payload, extracting only the requested keys.
   * Fails when nothing requested is present.
   */
  decode(payload: string, requestedKeys: readonly string[]): Outcome<Record<string, string>, DecodeError> {
    const parsed = this.parse(payload);
    if (!parsed.ok) return parsed;

    const found = new Map<string, string>();
    for (const key of new Set(requestedKeys)) {
      if (!Object.prototype.hasOwnProperty.call(parsed.value, key)) continue;
      const value = coerce(parsed.value[key]);
      if (value !== undefined) found.set(key, value);
    }

    if (found.size === 0) {
      return Outcome.err(
        new DecodeError('NO_REQUESTED_KEYS', `Payload contains none of: ${[...new Set(requestedKeys)].join(', ')}`)
      );
    }
    // Own properties, so a requested `__proto__` key is kept
    return Outcome.ok(Object.fromEntries(found));
  }

  /**
   * Decode a payload into a step instruction. The step key is always requested.
   */
  decodeInstruction(
    payload: string,
    requestedKeys: readonly string[] = DEFAULT_INSTRUCTION_KEYS,
    stepKey: string = DEFAULT_STEP_KEY
  ): Outcome<StepInstruction, DecodeError> {
    const decoded = this.decode(payload, [stepKey, ...requestedKeys]);
    if (!decoded.ok) return decoded;

    const step = decoded.value[stepKey];
    if (step === undefined || step.trim() === '') {
      return Outcome.err(new DecodeError('MISSING_STEP', `Payload has no "${stepKey}"`));
    }
    return Outcome.ok({ step, params: decoded.value });
  }

  /**
   * Encode a flat string map into the transport form.
   */
  encode(result: Readonly<Record<string, unknown>>): Outcome<string, EncodeError> {
    if (!isRecord(result)) {
      return Outcome.err(new EncodeError('INVALID_VALUE', 'Result must be a string-keyed map'));
    }
    for (const [key, value] of Object.entries(result)) {
      if (typeof value !== 'string') {
        return Outcome.err(new EncodeError('INVALID_VALUE', `Result value for "${key}" is ${typeof value}, expected string`));
      }
    }

    let json: string;
    try {
      json = JSON.stringify(result);
    } catch (err) {
      return Outcome.err(
        new EncodeError('SERIALIZATION_FAILED', err instanceof Error ? err.message : 'Result could not be serialized')
      );
    }
    return Outcome.ok(Buffer.from(json, 'utf8').toString('base64'));
  }

  // --- Private ---

  private parse(payload: string): Outcome<Record<string, unknown>, DecodeError> {
    const compact = typeof payload === 'string' ? payload.replace(/\s+/g, '') : '';
    if (compact.length === 0 || !BASE64_PATTERN.test(compact)) {
      return Outcome.err(new DecodeError('INVALID_ENCODING', 'Payload is not base64'));
    }

    const unpadded = compact.replace(/=+$/, '').replace(/-/g, '+').replace(/_/g, '/');
    if (unpadded.length % 4 === 1) {
      return Outcome.err(new DecodeError('INVALID_ENCODING', 'Payload has a truncated base64 quantum'));
    }

    let value: unknown;
    try {
      value = JSON.parse(this.utf8.decode(Buffer.from(unpadded, 'base64')));
    } catch (err) {
      return Outcome.err(
        new DecodeError('MALFORMED_JSON', err instanceof Error ? err.message : 'Payload is not JSON')
      );
    }

    if (!isRecord(value)) {
      return Outcome.err(new DecodeError('NOT_AN_OBJECT', 'Payload JSON is not an object'));
    }
    return Outcome.ok(value);
  }
}
