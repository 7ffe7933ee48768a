import type { EventBus } from '../interfaces/event-bus';
import type { FlowOutcome, ProcessInstance } from '../types/process';
import { createConsoleLogger, type Logger } from '../utils/logger';

export type FlowOutcomeListener = (outcome: FlowOutcome) => void;

export interface FlowStateBusOptions {
  /** Called when the listener throws. Defaults to logging the error. */
  onError?: (error: unknown, outcome: FlowOutcome) => void;
  /** Mirrors delivered and dropped outcomes as events */
  events?: EventBus;
  logger?: Logger;
}

/**
 * Single-slot broadcast channel between the continuation core and the host's
 * navigation layer.
 *
 * Owned by the host: create one at app start, set the navigation listener,
 * clear it at logout. Only the most recently set listener receives outcomes,
 * and outcomes published while no listener is set are dropped.
 */
export class FlowStateBus {
  private listener: FlowOutcomeListener | undefined;
  private readonly onError?: (error: unknown, outcome: FlowOutcome) => void;
  private readonly events?: EventBus;
  private readonly log: Logger;

  constructor(options: FlowStateBusOptions = {}) {
    this.onError = options.onError;
    this.events = options.events;
    this.log = options.logger ?? createConsoleLogger('FlowStateBus');
  }

  /**
   * Replace the current listener. The returned function clears the slot only
   * if this listener still holds it.
   */
  setListener(listener: FlowOutcomeListener): () => void {
    this.listener = listener;
    return () => {
      if (this.listener === listener) this.listener = undefined;
    };
  }

  clearListener(): void {
    this.listener = undefined;
  }

  get hasListener(): boolean {
    return this.listener !== undefined;
  }

  /**
   * Deliver an outcome to the current listener.
   * Returns false when there was nobody to deliver to.
   */
  publish(outcome: FlowOutcome): boolean {
    const listener = this.listener;
    const delivered = listener !== undefined;

    if (listener) {
      try {
        listener(outcome);
      } catch (err) {
        if (this.onError) {
          try {
            this.onError(err, outcome);
          } catch (hookErr) {
            this.log.error(`onError threw while handling ${outcome.kind}`, {
              error: hookErr instanceof Error ? hookErr.message : String(hookErr),
            });
          }
        } else {
          this.log.error(`Listener threw while handling ${outcome.kind}`, {
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    } else {
      this.log.debug(`Dropped ${outcome.kind}: no listener`);
    }

    if (outcome.kind === 'presentFlow') {
      this.events?.onFlowPresented?.({ processId: outcome.instance.id, action: outcome.instance.action, delivered });
    } else {
      this.events?.onSessionEnded?.({ delivered });
    }
    return delivered;
  }

  presentFlow(instance: ProcessInstance): boolean {
    return this.publish({ kind: 'presentFlow', instance });
  }

  endSession(): boolean {
    return this.publish({ kind: 'sessionEnded' });
  }
}
