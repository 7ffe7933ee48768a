import type { StepHandler, HandlerMetadata } from './step-handler';
import type { Outcome } from '../types/result';
import type { UnknownStepError } from '../types/errors';

export interface RegisterOptions {
  /** Replace an existing handler of the same type instead of throwing */
  override?: boolean;
}

/**
 * Registry of step handlers, keyed by step identifier.
 * Open for extension: hosts add or override entries before the first continuation.
 */
export interface HandlerRegistry {
  /** Register a handler under its `type` */
  register(handler: StepHandler, options?: RegisterOptions): void;

  /** Register multiple handlers */
  registerAll(handlers: StepHandler[], options?: RegisterOptions): void;

  /** Get handler by type */
  get(type: string): StepHandler | undefined;

  /** Get handler by type, or an UnknownStepError */
  resolve(type: string): Outcome<StepHandler, UnknownStepError>;

  /** Check if type is registered */
  has(type: string): boolean;

  /** List all registered types */
  types(): string[];

  /** Unregister a handler by type */
  unregister(type: string): boolean;

  /** Get handler metadata */
  getMetadata(type: string): HandlerMetadata | undefined;

  /** Get all handler metadata */
  getAllMetadata(): HandlerMetadata[];

  /** List handlers by category */
  listByCategory(category?: string): HandlerMetadata[];
}
