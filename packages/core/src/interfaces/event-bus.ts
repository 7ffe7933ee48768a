import type { ContinuationState } from '../engine/continuation-orchestrator';
import type { StepResult } from '../types/result';

/**
 * Optional event publishing.
 * Every orchestrator transition and registry mutation emits an event.
 * All methods are optional; subscribe only to what you need.
 *
 * Categories:
 * - Continuation lifecycle: start, state change, failure, transition submitted
 * - Step lifecycle: decoded, start, complete, timeout
 * - Presentation: flow presented, session ended
 * - Handler registry: register, unregister
 */
export interface EventBus {
  // ── Continuation Lifecycle ────────────────────────────────────────
  onContinuationStarted?(e: { runId: string; transitionId: string; processId: string }): void;

  /**
   * Emitted on every state machine change, including the return to idle.
   */
  onStateChanged?(e: { runId: string; from: ContinuationState; to: ContinuationState }): void;

  /**
   * Emitted once per run that ends without publishing a flow.
   */
  onContinuationFailed?(e: {
    runId: string;
    transitionId: string;
    processId: string;
    state: ContinuationState;
    error: { code: string; message: string };
  }): void;

  onTransitionSubmitted?(e: { runId: string; transitionId: string; processId: string; durationMs: number; ok: boolean }): void;

  // ── Step Lifecycle ────────────────────────────────────────────────
  onInstructionDecoded?(e: { runId: string; step: string; keys: string[] }): void;
  onStepStarted?(e: { runId: string; step: string; processId: string }): void;
  onStepCompleted?(e: { runId: string; step: string; result: StepResult; durationMs: number }): void;

  /**
   * Emitted when a handler is aborted due to timeout.
   */
  onStepTimeout?(e: { runId: string; step: string; timeoutMs: number }): void;

  // ── Presentation ──────────────────────────────────────────────────
  onFlowPresented?(e: { processId: string; action: string; delivered: boolean }): void;
  onSessionEnded?(e: { delivered: boolean }): void;

  // ── Handler Registry ──────────────────────────────────────────────
  onHandlerRegistered?(e: { handlerType: string; name?: string; category?: string; replaced: boolean }): void;
  onHandlerUnregistered?(e: { handlerType: string }): void;
}
