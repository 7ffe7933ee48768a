/**
 * EventDispatcher: event bus with multi-listener support,
 * async dispatch, listener isolation, and automatic timestamping.
 *
 * Implements the EventBus interface so it drops into the orchestrator,
 * the flow state bus, and the event-emitting registry.
 *
 * - Multiple listeners per event type via `.on(type, listener)`, each
 *   returning its own unsubscribe function
 * - Wildcard `'*'` listener receives every event
 * - Async dispatch (queueMicrotask) by default; sync mode for tests
 * - A throwing listener is reported, never rethrown
 * - Every dispatched event has `type` and `timestamp` fields
 *
 * Usage:
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * const unsub = dispatcher.on('step.completed', (e) => {
 *   metrics.histogram('step_duration_ms', e.durationMs);
 * });
 *
 * const orchestrator = new ContinuationOrchestrator(handlers, presenter, bus, { events: dispatcher });
 *
 * unsub();
 * ```
 */

import type { EventBus } from '../interfaces/event-bus';
import { now } from '../utils';
import { createConsoleLogger, type Logger } from '../utils/logger';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the system. */
export type EventType =
  // Continuation lifecycle
  | 'continuation.started'
  | 'continuation.state'
  | 'continuation.failed'
  | 'transition.submitted'
  // Step lifecycle
  | 'instruction.decoded'
  | 'step.started'
  | 'step.completed'
  | 'step.timeout'
  // Presentation
  | 'flow.presented'
  | 'session.ended'
  // Handler registry
  | 'handler.registered'
  | 'handler.unregistered';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on next microtask via queueMicrotask.
   * - `'sync'`: listeners fire inline. Use for testing or when you need
   *   to assert events immediately after an operation.
   */
  mode?: 'sync' | 'async';

  /** Called when a listener throws. Defaults to logging the error. */
  onError?: (error: unknown, event: DispatchedEvent) => void;

  logger?: Logger;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements EventBus {
  private readonly _listeners = new Map<string, Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError?: (error: unknown, event: DispatchedEvent) => void;
  private readonly _log: Logger;

  readonly onContinuationStarted: NonNullable<EventBus['onContinuationStarted']> = e =>
    this._dispatch('continuation.started', e);
  readonly onStateChanged: NonNullable<EventBus['onStateChanged']> = e => this._dispatch('continuation.state', e);
  readonly onContinuationFailed: NonNullable<EventBus['onContinuationFailed']> = e =>
    this._dispatch('continuation.failed', e);
  readonly onTransitionSubmitted: NonNullable<EventBus['onTransitionSubmitted']> = e =>
    this._dispatch('transition.submitted', e);
  readonly onInstructionDecoded: NonNullable<EventBus['onInstructionDecoded']> = e =>
    this._dispatch('instruction.decoded', e);
  readonly onStepStarted: NonNullable<EventBus['onStepStarted']> = e => this._dispatch('step.started', e);
  readonly onStepCompleted: NonNullable<EventBus['onStepCompleted']> = e => this._dispatch('step.completed', e);
  readonly onStepTimeout: NonNullable<EventBus['onStepTimeout']> = e => this._dispatch('step.timeout', e);
  readonly onFlowPresented: NonNullable<EventBus['onFlowPresented']> = e => this._dispatch('flow.presented', e);
  readonly onSessionEnded: NonNullable<EventBus['onSessionEnded']> = e => this._dispatch('session.ended', e);
  readonly onHandlerRegistered: NonNullable<EventBus['onHandlerRegistered']> = e =>
    this._dispatch('handler.registered', e);
  readonly onHandlerUnregistered: NonNullable<EventBus['onHandlerUnregistered']> = e =>
    this._dispatch('handler.unregistered', e);

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError = options.onError;
    this._log = options.logger ?? createConsoleLogger('EventDispatcher');
  }

  // ── Public API ──────────────────────────────────────────────────

  /**
   * Subscribe to an event type, or `'*'` for all of them.
   * Returns an unsubscribe function.
   */
  on(type: EventType | '*', listener: EventListener): () => void {
    const listeners = this._listeners.get(type) ?? new Set<EventListener>();
    this._listeners.set(type, listeners);
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  /** Resolves once async dispatches queued so far have run. */
  async flush(): Promise<void> {
    await new Promise<void>(resolve => queueMicrotask(resolve));
  }

  // ── Internal ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: object): void {
    const targets = [...(this._listeners.get(type) ?? []), ...(this._listeners.get('*') ?? [])];
    if (targets.length === 0) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });
    const deliver = () => targets.forEach(listener => this._deliver(listener, event));

    if (this._mode === 'sync') {
      deliver();
    } else {
      queueMicrotask(deliver);
    }
  }

  private _deliver(listener: EventListener, event: DispatchedEvent): void {
    try {
      listener(event);
    } catch (err) {
      if (this._onError) {
        this._onError(err, event);
      } else {
        this._log.error(`Listener for "${event.type}" threw`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
