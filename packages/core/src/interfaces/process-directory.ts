import type { ContextFlows, ProcessInstance } from '../types/process';
import type { Outcome } from '../types/result';

/** Flat filter map appended as query parameters (e.g. `{ status: 'active' }`). */
export type DirectoryFilters = Readonly<Record<string, string>>;

/**
 * Remote process directory. Single-shot calls: no retry, no caching,
 * errors returned rather than thrown.
 */
export interface ProcessDirectory {
  getContextProcesses(
    contextName: string,
    filters: DirectoryFilters | undefined,
    checkTokenExpiry: boolean
  ): Promise<Outcome<ContextFlows>>;

  startOrResumeContextProcess(
    name: string,
    data: Readonly<Record<string, unknown>>,
    checkTokenExpiry: boolean
  ): Promise<Outcome<ProcessInstance>>;

  startOrResumeProcess(instanceId: string): Promise<Outcome<ProcessInstance>>;
}

/**
 * Reports a completed step to the remote engine and returns the next state.
 * This is the `submit` callback the orchestrator receives with each instruction.
 */
export type SubmitTransition = (
  transitionId: string,
  processId: string,
  resultPayload: string
) => Promise<Outcome<ProcessInstance>>;

/** Supplies the current access token, if any. */
export interface TokenProvider {
  getAccessToken(): string | undefined;
}
