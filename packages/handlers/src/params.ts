import { Result, type StepInstruction, type StepResult } from '@flowrelay/core';

/**
 * Failure result naming every required key that is absent or blank.
 */
export function missingParams(instruction: StepInstruction, required: readonly string[]): StepResult {
  const missing = required.filter(key => !instruction.params[key]?.trim());
  return Result.failure('MISSING_PARAMS', `Step "${instruction.step}" requires ${missing.join(', ')}`, { missing });
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
