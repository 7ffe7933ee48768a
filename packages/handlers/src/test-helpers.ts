import type { StepHandler, HandlerParams, StepResult, StepError, ResultMap } from '@flowrelay/core';
import { DEFAULT_STEP_KEY } from '@flowrelay/core';

/**
 * Create mock handler params for testing
 */
export function createMockParams(overrides?: Partial<HandlerParams>): HandlerParams {
  const params = { [DEFAULT_STEP_KEY]: 'TEST' };
  return {
    payload: Buffer.from(JSON.stringify(params), 'utf8').toString('base64'),
    instruction: { step: 'TEST', params },
    transitionId: 'transition_test_123',
    processId: 'process_test_123',
    signal: new AbortController().signal,
    ...overrides,
  };
}

/**
 * Run a handler against the given instruction params.
 * The step key is filled in from the handler type.
 */
export async function testHandler(
  handler: StepHandler,
  instructionParams: Record<string, string>,
  overrides?: Partial<Omit<HandlerParams, 'instruction' | 'payload'>>
): Promise<StepResult> {
  const params = { [DEFAULT_STEP_KEY]: handler.type, ...instructionParams };
  return handler.execute(
    createMockParams({
      payload: Buffer.from(JSON.stringify(params), 'utf8').toString('base64'),
      instruction: { step: handler.type, params },
      ...overrides,
    })
  );
}

/**
 * Assert handler result is success
 */
export function assertSuccess(result: StepResult): asserts result is { outcome: 'success'; output: ResultMap } {
  if (result.outcome !== 'success') {
    throw new Error(`Expected success, got ${result.outcome}: ${result.error.code} ${result.error.message}`);
  }
}

/**
 * Assert handler result is failure, optionally with a given code
 */
export function assertFailure(
  result: StepResult,
  code?: string
): asserts result is { outcome: 'failure'; error: StepError } {
  if (result.outcome !== 'failure') {
    throw new Error(`Expected failure, got ${result.outcome}`);
  }
  if (code !== undefined && result.error.code !== code) {
    throw new Error(`Expected code ${code}, got ${result.error.code}`);
  }
}
