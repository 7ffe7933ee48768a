import { decodeJwt } from 'jose';
import type { TokenProvider } from '../interfaces/process-directory';
import { Outcome } from '../types/result';
import {
  FlowRelayError,
  SessionExpiredError,
  SessionIndeterminateError,
  type IndeterminateReason,
  type SessionError,
} from '../types/errors';

export type SessionVerdict =
  | { readonly status: 'allowed' }
  | { readonly status: 'expired'; readonly expiredAt: number }
  | { readonly status: 'indeterminate'; readonly reason: IndeterminateReason };

/** What to do when the token cannot tell whether the session is alive. */
export type IndeterminatePolicy = 'allow' | 'deny';

export interface SessionGateOptions {
  /** Milliseconds since epoch (default: Date.now) */
  clock?: () => number;
  /** Treat tokens expiring within this window as already expired (default: 0) */
  clockSkewMs?: number;
}

/**
 * Decides whether continuing a flow is permitted, from the access token's
 * `exp` claim. Signatures are not verified; the server remains the authority.
 */
export class SessionGate {
  private readonly tokens: TokenProvider;
  private readonly clock: () => number;
  private readonly clockSkewMs: number;

  constructor(tokens: TokenProvider, options: SessionGateOptions = {}) {
    const clockSkewMs = options.clockSkewMs ?? 0;
    if (!Number.isFinite(clockSkewMs)) {
      throw new FlowRelayError('CONFIG_INVALID', `clockSkewMs must be a finite number, got ${clockSkewMs}`);
    }
    this.tokens = tokens;
    this.clock = options.clock ?? Date.now;
    this.clockSkewMs = Math.max(0, clockSkewMs);
  }

  evaluate(checkTokenExpiry: boolean): SessionVerdict {
    if (!checkTokenExpiry) return { status: 'allowed' };

    const token = this.tokens.getAccessToken();
    if (token === undefined || token.trim() === '') {
      return { status: 'indeterminate', reason: 'NO_TOKEN' };
    }

    let exp: unknown;
    try {
      exp = decodeJwt(token).exp;
    } catch {
      return { status: 'indeterminate', reason: 'MALFORMED_TOKEN' };
    }
    if (typeof exp !== 'number' || !Number.isFinite(exp)) {
      return { status: 'indeterminate', reason: 'NO_EXPIRY_CLAIM' };
    }

    const expiredAt = exp * 1000;
    if (expiredAt <= this.clock() + this.clockSkewMs) {
      return { status: 'expired', expiredAt };
    }
    return { status: 'allowed' };
  }

  isContinuationAllowed(checkTokenExpiry: boolean): SessionVerdict['status'] {
    return this.evaluate(checkTokenExpiry).status;
  }

  /**
   * Turn the verdict into an Outcome, resolving indeterminate sessions with
   * the caller's policy.
   */
  require(checkTokenExpiry: boolean, policy: IndeterminatePolicy): Outcome<true, SessionError> {
    const verdict = this.evaluate(checkTokenExpiry);
    switch (verdict.status) {
      case 'allowed':
        return Outcome.ok(true);
      case 'expired':
        return Outcome.err(new SessionExpiredError(verdict.expiredAt));
      case 'indeterminate':
        return policy === 'allow' ? Outcome.ok(true) : Outcome.err(new SessionIndeterminateError(verdict.reason));
    }
  }
}
