import type { ValidateFunction } from 'ajv';
import {
  DirectoryRequestError,
  InvalidResponseError,
  Outcome,
  SessionExpiredError,
  SessionGate,
  TransitionSubmitError,
  createConsoleLogger,
  type ContextFlows,
  type DirectoryFilters,
  type FlowRelayError,
  type IndeterminatePolicy,
  type Logger,
  type ProcessDirectory,
  type ProcessInstance,
  type SubmitTransition,
  type TokenProvider,
} from '@flowrelay/core';
import { Routes, buildRoute } from './routes';
import { toIssues, validateContextProcesses, validateProcess, type WireProcess } from './schema';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface DirectoryClientOptions {
  /** Remote engine base URL, e.g. `https://engine.example.test/api` */
  baseUrl: string;
  tokens: TokenProvider;
  /** Defaults to a SessionGate over `tokens` */
  gate?: SessionGate;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Abort requests after this long (default: 30000) */
  timeoutMs?: number;
  /** How to treat a session the token cannot vouch for (default: 'allow') */
  indeterminateSession?: IndeterminatePolicy;
  /** Called when the session turns out to be expired; typically `() => bus.endSession()` */
  onSessionExpired?: () => void;
  logger?: Logger;
}

type Method = 'GET' | 'POST';

/**
 * HTTP client for the remote process directory. Every call is single-shot
 * (no retry, no cache) and resolves to an Outcome.
 */
export class ProcessDirectoryClient implements ProcessDirectory {
  private readonly baseUrl: string;
  private readonly tokens: TokenProvider;
  private readonly gate: SessionGate;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly indeterminateSession: IndeterminatePolicy;
  private readonly onSessionExpired?: () => void;
  private readonly log: Logger;

  constructor(options: DirectoryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.tokens = options.tokens;
    this.gate = options.gate ?? new SessionGate(options.tokens);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.indeterminateSession = options.indeterminateSession ?? 'allow';
    this.onSessionExpired = options.onSessionExpired;
    this.log = options.logger ?? createConsoleLogger('ProcessDirectory');
  }

  async getContextProcesses(
    contextName: string,
    filters: DirectoryFilters | undefined,
    checkTokenExpiry: boolean
  ): Promise<Outcome<ContextFlows>> {
    const session = this.checkSession(checkTokenExpiry);
    if (!session.ok) return session;

    const response = await this.request(
      'getContextProcesses',
      'GET',
      buildRoute(Routes.ContextProcesses, { contextName }, filters),
      undefined,
      validateContextProcesses
    );
    if (!response.ok) return response;

    return Outcome.ok({
      context: response.value.context ?? contextName,
      processes: response.value.processes.map(toInstance),
    });
  }

  async startOrResumeContextProcess(
    name: string,
    data: Readonly<Record<string, unknown>>,
    checkTokenExpiry: boolean
  ): Promise<Outcome<ProcessInstance>> {
    const session = this.checkSession(checkTokenExpiry);
    if (!session.ok) return session;

    const response = await this.request(
      'startOrResumeContextProcess',
      'POST',
      buildRoute(Routes.StartOrResumeContextProcess, { processName: name }),
      { data },
      validateProcess
    );
    return response.ok ? Outcome.ok(toInstance(response.value)) : response;
  }

  async startOrResumeProcess(instanceId: string): Promise<Outcome<ProcessInstance>> {
    const response = await this.request(
      'startOrResumeProcess',
      'POST',
      buildRoute(Routes.ResumeProcess, { instanceId }),
      undefined,
      validateProcess
    );
    return response.ok ? Outcome.ok(toInstance(response.value)) : response;
  }

  /**
   * Submit a step result. Bound so it can be handed to the orchestrator as
   * an instruction's `submit` callback.
   */
  readonly continueTransition: SubmitTransition = async (transitionId, processId, resultPayload) => {
    const response = await this.request(
      'continueTransition',
      'POST',
      buildRoute(Routes.ContinueTransition, { processId, transitionId }),
      { payload: resultPayload },
      validateProcess
    );
    if (!response.ok) {
      return Outcome.err(new TransitionSubmitError(transitionId, processId, response.error.message, response.error));
    }
    return Outcome.ok(toInstance(response.value));
  };

  // --- Private ---

  private checkSession(checkTokenExpiry: boolean): Outcome<true> {
    const session = this.gate.require(checkTokenExpiry, this.indeterminateSession);
    if (!session.ok && session.error instanceof SessionExpiredError) {
      this.log.info('Session expired; skipping request');
      this.onSessionExpired?.();
    }
    return session;
  }

  private async request<T>(
    operation: string,
    method: Method,
    path: string,
    body: unknown,
    validate: ValidateFunction<T>
  ): Promise<Outcome<T, FlowRelayError>> {
    const headers: Record<string, string> = { Accept: 'application/json', ...this.headers };
    const token = this.tokens.getAccessToken();
    if (token) headers.Authorization = `Bearer ${token}`;
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let status: number;
    let text: string;

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const message = controller.signal.aborted
        ? `${operation} timed out after ${this.timeoutMs}ms`
        : `${operation} failed: ${error instanceof Error ? error.message : String(error)}`;
      this.log.error(message, { method, path });
      return Outcome.err(new DirectoryRequestError(message));
    } finally {
      clearTimeout(timer);
    }

    if (status === 401) {
      this.log.warn(`${operation} rejected: session expired`, { method, path });
      this.onSessionExpired?.();
      return Outcome.err(new SessionExpiredError());
    }
    if (status < 200 || status >= 300) {
      this.log.error(`${operation} failed with HTTP ${status}`, { method, path });
      return Outcome.err(new DirectoryRequestError(`${operation} failed with HTTP ${status}`, status));
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return Outcome.err(new InvalidResponseError(operation, [{ path: '/', message: 'body is not JSON' }]));
    }

    if (!validate(json)) {
      const issues = toIssues(validate.errors);
      this.log.error(`${operation} returned an unexpected body`, { issues });
      return Outcome.err(new InvalidResponseError(operation, issues));
    }
    return Outcome.ok(json);
  }
}

function toInstance(wire: WireProcess): ProcessInstance {
  return {
    id: wire.id,
    action: wire.action,
    name: wire.name,
    status: wire.status,
    metadata: wire.metadata ?? {},
  };
}
