import type { StepHandler, HandlerMetadata } from '../interfaces/step-handler';
import type { HandlerRegistry, RegisterOptions } from '../interfaces/handler-registry';
import { FlowRelayError, UnknownStepError } from '../types/errors';
import { Outcome } from '../types/result';
import { createConsoleLogger, type Logger } from '../utils/logger';

export interface HandlerRegistryOptions {
  logger?: Logger;
}

export class DefaultHandlerRegistry implements HandlerRegistry {
  private entries = new Map<string, StepHandler>();
  private readonly log: Logger;

  constructor(options: HandlerRegistryOptions = {}) {
    this.log = options.logger ?? createConsoleLogger('HandlerRegistry');
  }

  register(handler: StepHandler, options: RegisterOptions = {}): void {
    if (!handler.type || handler.type.trim() === '') {
      throw new FlowRelayError('INVALID_HANDLER', 'Handler type must be a non-empty string');
    }

    const existing = this.entries.get(handler.type);
    if (existing) {
      if (!options.override) {
        throw new FlowRelayError('HANDLER_EXISTS', `Handler "${handler.type}" already registered`);
      }
      this.release(existing);
    }

    this.entries.set(handler.type, handler);
  }

  registerAll(handlers: StepHandler[], options?: RegisterOptions): void {
    handlers.forEach(h => this.register(h, options));
  }

  get(type: string): StepHandler | undefined {
    return this.entries.get(type);
  }

  resolve(type: string): Outcome<StepHandler, UnknownStepError> {
    const handler = this.entries.get(type);
    return handler ? Outcome.ok(handler) : Outcome.err(new UnknownStepError(type));
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  types(): string[] {
    return [...this.entries.keys()];
  }

  unregister(type: string): boolean {
    const handler = this.entries.get(type);
    if (!handler) return false;
    this.release(handler);
    return this.entries.delete(type);
  }

  getMetadata(type: string): HandlerMetadata | undefined {
    return this.entries.get(type)?.metadata;
  }

  getAllMetadata(): HandlerMetadata[] {
    return Array.from(this.entries.values()).map(h => h.metadata);
  }

  listByCategory(category?: string): HandlerMetadata[] {
    if (!category) return this.getAllMetadata();
    return this.getAllMetadata().filter(m => m.category === category);
  }

  private release(handler: StepHandler): void {
    handler.cleanup?.().catch(err => {
      this.log.warn(`Cleanup of handler "${handler.type}" failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }
}
