import type { HandlerRegistry } from '../interfaces/handler-registry';
import type { StepHandler, HandlerParams } from '../interfaces/step-handler';
import type { EventBus } from '../interfaces/event-bus';
import type { SubmitTransition } from '../interfaces/process-directory';
import { inlineScheduler, type ScreenPresenter, type UiScheduler } from '../interfaces/presenter';
import type { ProcessInstance, TransitionRequest } from '../types/process';
import { Outcome, Result, type ResultMap, type StepResult } from '../types/result';
import {
  ContinuationBusyError,
  FlowRelayError,
  HandlerFailureError,
  HandlerTimeoutError,
  PresentationError,
  TransitionSubmitError,
} from '../types/errors';
import { PayloadCodec, DEFAULT_INSTRUCTION_KEYS, DEFAULT_STEP_KEY } from '../codec/payload-codec';
import type { FlowStateBus } from '../impl/flow-state-bus';
import { createConsoleLogger, type Logger } from '../utils/logger';
import { generateId, now } from '../utils';

export type ContinuationState = 'idle' | 'decoding' | 'dismissing' | 'awaitingHandler' | 'submitting' | 'done';

/**
 * Server-issued instruction plus the callback that reports the step result.
 */
export interface InboundInstruction {
  transitionId: string;
  processId: string;
  /** Opaque base64 payload naming the step and its parameters */
  payload: string;
  submit: SubmitTransition;
}

export type ContinuationResult =
  | { readonly status: 'success'; readonly runId: string; readonly instance: ProcessInstance }
  | {
      readonly status: 'failure';
      readonly runId: string;
      /** State the run was in when it failed */
      readonly failedIn: ContinuationState;
      readonly error: FlowRelayError;
    };

export interface OrchestratorOptions {
  /** Keys decoded from each payload (default: DEFAULT_INSTRUCTION_KEYS) */
  instructionKeys?: readonly string[];
  /** Key holding the step identifier (default: 'stepName') */
  stepKey?: string;
  /** Abort handlers that run longer than this. Unset means wait indefinitely. */
  handlerTimeoutMs?: number;
  codec?: PayloadCodec;
  /** Where presenter calls and bus publications run (default: inline) */
  scheduler?: UiScheduler;
  events?: EventBus;
  logger?: Logger;
}

interface RunContext {
  readonly runId: string;
  readonly transitionId: string;
  readonly processId: string;
}

/**
 * Drives one server instruction through
 * `idle → decoding → dismissing → awaitingHandler → submitting → done → idle`.
 *
 * Owns the host's top screen from dismissal until the run ends. Never rejects:
 * every failure is logged, the interstitial is removed, and nothing is
 * published. Runs do not queue; a second instruction while one is in flight
 * fails with ContinuationBusyError.
 */
export class ContinuationOrchestrator {
  private readonly _handlers: HandlerRegistry;
  private readonly presenter: ScreenPresenter;
  private readonly bus: FlowStateBus;
  private readonly codec: PayloadCodec;
  private readonly scheduler: UiScheduler;
  private readonly events?: EventBus;
  private readonly log: Logger;
  private readonly opts: {
    instructionKeys: readonly string[];
    stepKey: string;
    handlerTimeoutMs?: number;
  };

  private _state: ContinuationState = 'idle';
  private activeRunId: string | undefined;

  constructor(
    handlers: HandlerRegistry,
    presenter: ScreenPresenter,
    bus: FlowStateBus,
    options: OrchestratorOptions = {}
  ) {
    if (options.handlerTimeoutMs !== undefined && !(options.handlerTimeoutMs > 0)) {
      throw new FlowRelayError('CONFIG_INVALID', `handlerTimeoutMs must be positive, got ${options.handlerTimeoutMs}`);
    }
    this._handlers = handlers;
    this.presenter = presenter;
    this.bus = bus;
    this.codec = options.codec ?? new PayloadCodec();
    this.scheduler = options.scheduler ?? inlineScheduler;
    this.events = options.events;
    this.log = options.logger ?? createConsoleLogger('Orchestrator');
    this.opts = {
      instructionKeys: options.instructionKeys ?? DEFAULT_INSTRUCTION_KEYS,
      stepKey: options.stepKey ?? DEFAULT_STEP_KEY,
      handlerTimeoutMs: options.handlerTimeoutMs,
    };
  }

  /** Access to the handler registry. */
  get handlers(): HandlerRegistry {
    return this._handlers;
  }

  get state(): ContinuationState {
    return this._state;
  }

  get busy(): boolean {
    return this.activeRunId !== undefined;
  }

  /**
   * Run one instruction to completion.
   */
  async continue(instruction: InboundInstruction): Promise<ContinuationResult> {
    if (this.activeRunId !== undefined) {
      const error = new ContinuationBusyError(this.activeRunId);
      this.log.warn(error.message, { transitionId: instruction.transitionId, processId: instruction.processId });
      return { status: 'failure', runId: generateId(), failedIn: this._state, error };
    }

    const ctx: RunContext = {
      runId: generateId(),
      transitionId: instruction.transitionId,
      processId: instruction.processId,
    };
    this.activeRunId = ctx.runId;
    this.events?.onContinuationStarted?.({ ...ctx });

    try {
      return await this.run(ctx, instruction);
    } finally {
      this.moveTo(ctx.runId, 'idle');
      this.activeRunId = undefined;
    }
  }

  // --- Private ---

  private async run(ctx: RunContext, instruction: InboundInstruction): Promise<ContinuationResult> {
    // Decode
    this.moveTo(ctx.runId, 'decoding');
    const decoded = this.codec.decodeInstruction(instruction.payload, this.opts.instructionKeys, this.opts.stepKey);
    if (!decoded.ok) {
      return this.fail(ctx, decoded.error);
    }
    const step = decoded.value.step;

    const resolved = this._handlers.resolve(step);
    if (!resolved.ok) {
      return this.fail(ctx, resolved.error);
    }

    // Keys the handler declares are read on top of the configured ones
    let stepInstruction = decoded.value;
    const extraKeys = (resolved.value.metadata.instructionKeys ?? []).filter(
      key => !this.opts.instructionKeys.includes(key)
    );
    if (extraKeys.length > 0) {
      const widened = this.codec.decodeInstruction(
        instruction.payload,
        [...this.opts.instructionKeys, ...extraKeys],
        this.opts.stepKey
      );
      if (!widened.ok) {
        return this.fail(ctx, widened.error);
      }
      stepInstruction = widened.value;
    }
    this.events?.onInstructionDecoded?.({ runId: ctx.runId, step, keys: Object.keys(stepInstruction.params) });

    // Take the screen
    this.moveTo(ctx.runId, 'dismissing');
    const presentationError = await this.acquireScreen();
    if (presentationError) {
      return this.fail(ctx, presentationError);
    }

    // Run the step
    this.moveTo(ctx.runId, 'awaitingHandler');
    const output = await this.runHandler(ctx, resolved.value, {
      payload: instruction.payload,
      instruction: stepInstruction,
      transitionId: ctx.transitionId,
      processId: ctx.processId,
    });
    if (!output.ok) {
      await this.releaseScreen(ctx);
      return this.fail(ctx, output.error);
    }

    // Report back
    this.moveTo(ctx.runId, 'submitting');
    const encoded = this.codec.encode(output.value);
    if (!encoded.ok) {
      await this.releaseScreen(ctx);
      return this.fail(ctx, encoded.error);
    }

    const request: TransitionRequest = {
      transitionId: ctx.transitionId,
      processId: ctx.processId,
      resultPayload: encoded.value,
    };
    const submitted = await this.submitTransition(ctx, instruction.submit, request);
    await this.releaseScreen(ctx);
    if (!submitted.ok) {
      return this.fail(ctx, submitted.error);
    }

    const instance = submitted.value;
    this.moveTo(ctx.runId, 'done');
    try {
      await this.scheduler.run(() => this.bus.presentFlow(instance));
    } catch (err) {
      this.log.error('Failed to publish the next flow', { runId: ctx.runId, error: errorMessage(err) });
    }
    this.log.info(`Step "${step}" completed; presenting ${instance.action}`, {
      runId: ctx.runId,
      processId: instance.id,
    });
    return { status: 'success', runId: ctx.runId, instance };
  }

  private async acquireScreen(): Promise<PresentationError | undefined> {
    try {
      await this.scheduler.run(() => this.presenter.dismissTop({ animated: false }));
    } catch (err) {
      return new PresentationError('dismissTop', errorMessage(err));
    }
    try {
      await this.scheduler.run(() => this.presenter.showInterstitial());
    } catch (err) {
      return new PresentationError('showInterstitial', errorMessage(err));
    }
    return undefined;
  }

  private async releaseScreen(ctx: RunContext): Promise<void> {
    try {
      await this.scheduler.run(() => this.presenter.hideInterstitial());
    } catch (err) {
      this.log.error('Failed to hide interstitial', { runId: ctx.runId, error: errorMessage(err) });
    }
  }

  private async runHandler(
    ctx: RunContext,
    handler: StepHandler,
    params: Omit<HandlerParams, 'signal'>
  ): Promise<Outcome<ResultMap, HandlerFailureError | HandlerTimeoutError>> {
    const step = params.instruction.step;
    const controller = new AbortController();
    const startTime = now();
    this.events?.onStepStarted?.({ runId: ctx.runId, step, processId: ctx.processId });

    const execution = Promise.resolve()
      .then(() => handler.execute({ ...params, signal: controller.signal }))
      .catch((err: unknown): StepResult => Result.failure('HANDLER_ERROR', errorMessage(err)));

    const timeoutMs = this.opts.handlerTimeoutMs;
    const result = timeoutMs === undefined ? await execution : await withTimeout(execution, timeoutMs);

    if (result === TIMED_OUT) {
      controller.abort();
      this.events?.onStepTimeout?.({ runId: ctx.runId, step, timeoutMs: timeoutMs ?? 0 });
      return Outcome.err(new HandlerTimeoutError(step, timeoutMs ?? 0));
    }

    this.events?.onStepCompleted?.({ runId: ctx.runId, step, result, durationMs: now() - startTime });

    if (result.outcome === 'failure') {
      return Outcome.err(new HandlerFailureError(step, result.error.code, result.error.message, result.error.details));
    }
    return Outcome.ok(result.output);
  }

  private async submitTransition(
    ctx: RunContext,
    submit: SubmitTransition,
    request: TransitionRequest
  ): Promise<Outcome<ProcessInstance, TransitionSubmitError>> {
    const startTime = now();
    let outcome: Outcome<ProcessInstance, TransitionSubmitError>;

    try {
      const response = await submit(request.transitionId, request.processId, request.resultPayload);
      outcome = response.ok
        ? response
        : Outcome.err(
            response.error instanceof TransitionSubmitError
              ? response.error
              : new TransitionSubmitError(request.transitionId, request.processId, response.error.message, response.error)
          );
    } catch (err) {
      outcome = Outcome.err(new TransitionSubmitError(request.transitionId, request.processId, errorMessage(err), err));
    }

    this.events?.onTransitionSubmitted?.({ ...ctx, durationMs: now() - startTime, ok: outcome.ok });
    return outcome;
  }

  private fail(ctx: RunContext, error: FlowRelayError): ContinuationResult {
    const failedIn = this._state;
    this.moveTo(ctx.runId, 'done');
    this.log.error(`Continuation failed while ${failedIn}: ${error.message}`, {
      runId: ctx.runId,
      transitionId: ctx.transitionId,
      processId: ctx.processId,
      code: error.code,
    });
    this.events?.onContinuationFailed?.({
      ...ctx,
      state: failedIn,
      error: { code: error.code, message: error.message },
    });
    return { status: 'failure', runId: ctx.runId, failedIn, error };
  }

  private moveTo(runId: string, to: ContinuationState): void {
    const from = this._state;
    if (from === to) return;
    this._state = to;
    this.log.debug(`${from} → ${to}`, { runId });
    this.events?.onStateChanged?.({ runId, from, to });
  }
}

const TIMED_OUT = Symbol('timed-out');

async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>(resolve => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
