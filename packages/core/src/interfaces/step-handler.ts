import type { StepInstruction } from '../types/process';
import type { StepResult } from '../types/result';

export type HandlerCategory = 'verification' | 'redirect' | 'signing' | 'utility';

export interface HandlerMetadata {
  type: string;
  name: string;
  description?: string;
  category?: HandlerCategory;
  version?: string;
  /** Instruction keys the handler reads besides the step key */
  instructionKeys?: string[];
  deprecated?: boolean | { since: string; message?: string; useInstead?: string };
}

export interface HandlerParams {
  /** Raw, still-encoded instruction payload */
  payload: string;
  /** Decoded instruction */
  instruction: StepInstruction;
  transitionId: string;
  processId: string;
  /** Aborted when the orchestrator gives up on the handler */
  signal: AbortSignal;
}

/**
 * Performs one step's external interaction (verification UI, web view, ...)
 * and resolves exactly once with its result.
 */
export interface StepHandler {
  readonly type: string;
  readonly metadata: HandlerMetadata;
  execute(params: HandlerParams): Promise<StepResult>;
  cleanup?(): Promise<void>;
}
