/**
 * EventEmittingHandlerRegistry: decorator that wraps any HandlerRegistry
 * and emits lifecycle events on register/unregister.
 */

import type { StepHandler, HandlerMetadata } from '../interfaces/step-handler';
import type { HandlerRegistry, RegisterOptions } from '../interfaces/handler-registry';
import type { EventBus } from '../interfaces/event-bus';
import type { UnknownStepError } from '../types/errors';
import type { Outcome } from '../types/result';

export class EventEmittingHandlerRegistry implements HandlerRegistry {
  constructor(
    private readonly inner: HandlerRegistry,
    private readonly events: EventBus
  ) {}

  register(handler: StepHandler, options?: RegisterOptions): void {
    const replaced = this.inner.has(handler.type);
    this.inner.register(handler, options);
    this.events.onHandlerRegistered?.({
      handlerType: handler.type,
      name: handler.metadata.name,
      category: handler.metadata.category,
      replaced,
    });
  }

  registerAll(handlers: StepHandler[], options?: RegisterOptions): void {
    handlers.forEach(h => this.register(h, options));
  }

  get(type: string): StepHandler | undefined {
    return this.inner.get(type);
  }

  resolve(type: string): Outcome<StepHandler, UnknownStepError> {
    return this.inner.resolve(type);
  }

  has(type: string): boolean {
    return this.inner.has(type);
  }

  types(): string[] {
    return this.inner.types();
  }

  unregister(type: string): boolean {
    const ok = this.inner.unregister(type);
    if (ok) {
      this.events.onHandlerUnregistered?.({ handlerType: type });
    }
    return ok;
  }

  getMetadata(type: string): HandlerMetadata | undefined {
    return this.inner.getMetadata(type);
  }

  getAllMetadata(): HandlerMetadata[] {
    return this.inner.getAllMetadata();
  }

  listByCategory(category?: string): HandlerMetadata[] {
    return this.inner.listByCategory(category);
  }
}
