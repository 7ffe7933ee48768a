import { Result, type StepHandler, type HandlerParams, type ResultMap } from '@flowrelay/core';
import { StepIds } from './step-ids';
import { errorMessage, missingParams } from './params';

export interface VerificationRequest {
  /** Session token issued by the verification vendor */
  token: string;
  clientId: string;
  processId: string;
}

export type VerificationOutcome =
  | { status: 'completed'; result?: ResultMap }
  | { status: 'cancelled' }
  | { status: 'failed'; reason: string };

/**
 * Host capability that runs the vendor's identity verification UI.
 */
export interface VerificationProvider {
  verify(request: VerificationRequest, signal: AbortSignal): Promise<VerificationOutcome>;
}

export function identityVerificationHandler(provider: VerificationProvider): StepHandler {
  return {
    type: StepIds.IDENTITY_VERIFICATION,

    metadata: {
      type: StepIds.IDENTITY_VERIFICATION,
      name: 'Identity Verification',
      description: 'Run the identity verification UI with a server-issued token',
      category: 'verification',
      instructionKeys: ['token', 'clientID'],
    },

    async execute(params: HandlerParams) {
      const { token, clientID } = params.instruction.params;
      if (!token?.trim() || !clientID?.trim()) {
        return missingParams(params.instruction, ['token', 'clientID']);
      }

      let outcome: VerificationOutcome;
      try {
        outcome = await provider.verify({ token, clientId: clientID, processId: params.processId }, params.signal);
      } catch (error) {
        return Result.failure('VERIFICATION_ERROR', errorMessage(error, 'Verification could not be started'));
      }

      switch (outcome.status) {
        case 'completed':
          return outcome.result && Object.keys(outcome.result).length > 0
            ? Result.success(outcome.result)
            : Result.acknowledged();
        case 'cancelled':
          return Result.failure('VERIFICATION_CANCELLED', 'User cancelled verification');
        case 'failed':
          return Result.failure('VERIFICATION_FAILED', outcome.reason);
      }
    },
  };
}
