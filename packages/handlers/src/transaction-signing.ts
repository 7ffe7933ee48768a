import { Result, type StepHandler, type HandlerParams } from '@flowrelay/core';
import { StepIds } from './step-ids';
import { errorMessage, missingParams } from './params';

export interface SigningRequest {
  transactionId: string;
  /** Decimal amount exactly as the server sent it */
  amount: string;
  processId: string;
}

export type SigningOutcome =
  | { status: 'signed'; signature: string }
  | { status: 'rejected' }
  | { status: 'failed'; reason: string };

/**
 * Host capability that asks the user to approve and sign a transaction.
 */
export interface TransactionSigner {
  sign(request: SigningRequest, signal: AbortSignal): Promise<SigningOutcome>;
}

const DECIMAL = /^[+-]?\d+(\.\d+)?$/;

export function transactionSigningHandler(signer: TransactionSigner): StepHandler {
  return {
    type: StepIds.TRANSACTION_SIGNING,

    metadata: {
      type: StepIds.TRANSACTION_SIGNING,
      name: 'Transaction Signing',
      description: 'Have the user approve and sign a transaction',
      category: 'signing',
      instructionKeys: ['transactionId', 'amount'],
    },

    async execute(params: HandlerParams) {
      const { transactionId, amount } = params.instruction.params;
      if (!transactionId?.trim() || !amount?.trim()) {
        return missingParams(params.instruction, ['transactionId', 'amount']);
      }
      if (!DECIMAL.test(amount.trim()) || !Number.isFinite(Number(amount))) {
        return Result.failure('INVALID_AMOUNT', `Amount is not a decimal number: ${amount}`);
      }

      let outcome: SigningOutcome;
      try {
        outcome = await signer.sign({ transactionId, amount: amount.trim(), processId: params.processId }, params.signal);
      } catch (error) {
        return Result.failure('SIGNING_ERROR', errorMessage(error, 'Signing could not be started'));
      }

      switch (outcome.status) {
        case 'signed':
          return Result.success({ transactionId, signature: outcome.signature });
        case 'rejected':
          return Result.failure('SIGNING_REJECTED', 'User rejected the transaction');
        case 'failed':
          return Result.failure('SIGNING_FAILED', outcome.reason);
      }
    },
  };
}
