import type { StepHandler } from '@flowrelay/core';
import { webViewHandler, type WebViewLauncher } from './web-view';
import { identityVerificationHandler, type VerificationProvider } from './identity-verification';
import { transactionSigningHandler, type TransactionSigner } from './transaction-signing';

export { StepIds, type StepId } from './step-ids';
export { webViewHandler, type WebViewLauncher, type WebViewRequest } from './web-view';
export {
  identityVerificationHandler,
  type VerificationProvider,
  type VerificationRequest,
  type VerificationOutcome,
} from './identity-verification';
export {
  transactionSigningHandler,
  type TransactionSigner,
  type SigningRequest,
  type SigningOutcome,
} from './transaction-signing';
export { missingParams } from './params';

/** Host capabilities backing the default handlers. Omitted ones are skipped. */
export interface StepCapabilities {
  webView?: WebViewLauncher;
  verification?: VerificationProvider;
  signer?: TransactionSigner;
}

/**
 * Build the default handlers for whatever capabilities the host supplies.
 *
 * ```typescript
 * registry.registerAll(defaultStepHandlers({ webView: browser, signer: keychain }));
 * ```
 */
export function defaultStepHandlers(capabilities: StepCapabilities): StepHandler[] {
  const handlers: StepHandler[] = [];
  if (capabilities.webView) handlers.push(webViewHandler(capabilities.webView));
  if (capabilities.verification) handlers.push(identityVerificationHandler(capabilities.verification));
  if (capabilities.signer) handlers.push(transactionSigningHandler(capabilities.signer));
  return handlers;
}

// ────────────────────────────────────────────────────────────────────────────
// Test utilities
// ────────────────────────────────────────────────────────────────────────────

export { createMockParams, testHandler, assertSuccess, assertFailure } from './test-helpers';
