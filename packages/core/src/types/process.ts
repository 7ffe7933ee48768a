/**
 * One in-progress run of a remote process.
 * A new value replaces the old one on every transition.
 */
export interface ProcessInstance {
  /** Unique instance id */
  readonly id: string;
  /** Action / intent tag that selects the host screen */
  readonly action: string;
  /** Process definition name */
  readonly name?: string;
  /** Remote status label, if the engine reports one */
  readonly status?: string;
  /** Whatever else the host UI needs to render the step */
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Processes grouped under a business context (e.g. "account").
 * Ordered; the first entry is the default selection.
 */
export interface ContextFlows {
  readonly context: string;
  readonly processes: readonly ProcessInstance[];
}

/**
 * Decoded server instruction: which step to run and its parameters.
 */
export interface StepInstruction {
  /** Non-empty step identifier */
  readonly step: string;
  /** Every requested key found in the payload, including the step key */
  readonly params: Readonly<Record<string, string>>;
}

/**
 * Sent back to the remote engine once a step has produced its result.
 */
export interface TransitionRequest {
  readonly transitionId: string;
  readonly processId: string;
  /** Encoded handler result */
  readonly resultPayload: string;
}

/**
 * Externally observable results carried on the FlowStateBus.
 */
export type FlowOutcome =
  | { readonly kind: 'presentFlow'; readonly instance: ProcessInstance }
  | { readonly kind: 'sessionEnded' };

/** Default selection of a context group. */
export function defaultProcess(flows: ContextFlows): ProcessInstance | undefined {
  return flows.processes[0];
}
