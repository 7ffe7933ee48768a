import type { StepHandler, HandlerMetadata, HandlerParams } from '../interfaces/step-handler';
import { Result, type ResultMap, type StepResult } from '../types/result';
import { createConsoleLogger, type Logger } from '../utils/logger';

/**
 * Single-fire completion handed to callback-style handlers.
 * Only the first call counts.
 */
export interface StepCompletion {
  succeed(output?: ResultMap): void;
  fail(code: string, message: string, details?: unknown): void;
}

export type CallbackStepRunner = (params: HandlerParams, completion: StepCompletion) => void;

export interface CallbackHandlerOptions {
  logger?: Logger;
}

/**
 * Adapt a callback-style handler (typical of UI SDKs that report through
 * delegates) to the promise-based StepHandler contract.
 *
 * ```typescript
 * const selfie = callbackHandler({ type: 'SELFIE', name: 'Selfie' }, (params, done) => {
 *   sdk.start(params.instruction.params.token, {
 *     onFinish: (ref) => done.succeed({ reference: ref }),
 *     onError: (e) => done.fail('SDK_ERROR', e.message),
 *   });
 * });
 * ```
 */
export function callbackHandler(
  metadata: HandlerMetadata,
  run: CallbackStepRunner,
  options: CallbackHandlerOptions = {}
): StepHandler {
  const log = options.logger ?? createConsoleLogger(`Handler:${metadata.type}`);

  return {
    type: metadata.type,
    metadata,
    execute(params: HandlerParams): Promise<StepResult> {
      return new Promise<StepResult>(resolve => {
        let settled = false;

        const settle = (result: StepResult, via: string): void => {
          if (settled) {
            log.warn(`Completion already delivered; ignoring ${via}`);
            return;
          }
          settled = true;
          resolve(result);
        };

        const completion: StepCompletion = {
          succeed: (output = {}) => settle(Result.success(output), 'succeed'),
          fail: (code, message, details) => settle(Result.failure(code, message, details), 'fail'),
        };

        try {
          run(params, completion);
        } catch (err) {
          settle(Result.failure('HANDLER_ERROR', err instanceof Error ? err.message : 'Handler threw'), 'throw');
        }
      });
    },
  };
}
