/**
 * Default Step Handler Tests
 *
 * Each handler is driven through a fake host capability.
 */
import { describe, it, expect, vi } from 'vitest';
import { ContinuationHarness } from '@flowrelay/core/test';
import {
  StepIds,
  defaultStepHandlers,
  webViewHandler,
  identityVerificationHandler,
  transactionSigningHandler,
  testHandler,
  assertSuccess,
  assertFailure,
  type WebViewLauncher,
  type VerificationProvider,
  type VerificationOutcome,
  type TransactionSigner,
  type SigningOutcome,
} from '..';

function launcher(open: WebViewLauncher['open'] = async () => undefined) {
  return { open: vi.fn(open) } satisfies WebViewLauncher;
}

function provider(outcome: VerificationOutcome | Error): VerificationProvider {
  return {
    verify: vi.fn(async () => {
      if (outcome instanceof Error) throw outcome;
      return outcome;
    }),
  };
}

function signer(outcome: SigningOutcome): TransactionSigner {
  return { sign: vi.fn(async () => outcome) };
}

describe('webViewHandler', () => {
  it('opens the URL and acknowledges once the view closes', async () => {
    const web = launcher();

    const result = await testHandler(webViewHandler(web), { secondParams: 'https://x.test', clientID: 'c1' });

    assertSuccess(result);
    expect(result.output).toEqual({ '': '' });
    expect(web.open).toHaveBeenCalledWith({ url: 'https://x.test', clientId: 'c1' }, expect.any(AbortSignal));
  });

  it('works without a client id', async () => {
    const web = launcher();

    await testHandler(webViewHandler(web), { secondParams: 'https://x.test/path?a=1' });

    expect(web.open).toHaveBeenCalledWith({ url: 'https://x.test/path?a=1', clientId: undefined }, expect.any(AbortSignal));
  });

  it('passes the URL on exactly as the server sent it', async () => {
    const web = launcher();

    await testHandler(webViewHandler(web), { secondParams: 'HTTPS://Bank.Example.test/Return?ref=a b' });

    expect(web.open).toHaveBeenCalledWith(
      { url: 'HTTPS://Bank.Example.test/Return?ref=a b', clientId: undefined },
      expect.any(AbortSignal)
    );
  });

  it('requires secondParams', async () => {
    const web = launcher();

    const result = await testHandler(webViewHandler(web), { clientID: 'c1' });

    assertFailure(result, 'MISSING_PARAMS');
    expect(result.error.message).toBe('Step "WEB_VIEW" requires secondParams');
    expect(web.open).not.toHaveBeenCalled();
  });

  it('rejects values that are not http(s) URLs', async () => {
    const web = launcher();

    assertFailure(await testHandler(webViewHandler(web), { secondParams: 'not a url' }), 'INVALID_URL');
    const result = await testHandler(webViewHandler(web), { secondParams: 'javascript:alert(1)' });
    assertFailure(result, 'INVALID_URL');
    expect(result.error.message).toBe('Unsupported protocol: javascript:');
    expect(web.open).not.toHaveBeenCalled();
  });

  it('fails when the view cannot be opened', async () => {
    const web = launcher(async () => {
      throw new Error('No browser available');
    });

    const result = await testHandler(webViewHandler(web), { secondParams: 'https://x.test' });

    assertFailure(result, 'WEB_VIEW_ERROR');
    expect(result.error.message).toBe('No browser available');
  });
});

describe('identityVerificationHandler', () => {
  it('passes token, client and process to the provider', async () => {
    const verification = provider({ status: 'completed' });

    const result = await testHandler(identityVerificationHandler(verification), { token: 'tok', clientID: 'c1' }, {
      processId: 'proc-3',
    });

    assertSuccess(result);
    expect(result.output).toEqual({ '': '' });
    expect(verification.verify).toHaveBeenCalledWith(
      { token: 'tok', clientId: 'c1', processId: 'proc-3' },
      expect.any(AbortSignal)
    );
  });

  it('returns the provider result when there is one', async () => {
    const result = await testHandler(
      identityVerificationHandler(provider({ status: 'completed', result: { verificationId: 'v-9' } })),
      { token: 'tok', clientID: 'c1' }
    );

    assertSuccess(result);
    expect(result.output).toEqual({ verificationId: 'v-9' });
  });

  it('reports cancellation and failure', async () => {
    const cancelled = await testHandler(identityVerificationHandler(provider({ status: 'cancelled' })), {
      token: 'tok',
      clientID: 'c1',
    });
    assertFailure(cancelled, 'VERIFICATION_CANCELLED');

    const failed = await testHandler(identityVerificationHandler(provider({ status: 'failed', reason: 'Document expired' })), {
      token: 'tok',
      clientID: 'c1',
    });
    assertFailure(failed, 'VERIFICATION_FAILED');
    expect(failed.error.message).toBe('Document expired');
  });

  it('reports a provider that throws', async () => {
    const result = await testHandler(identityVerificationHandler(provider(new Error('SDK offline'))), {
      token: 'tok',
      clientID: 'c1',
    });

    assertFailure(result, 'VERIFICATION_ERROR');
    expect(result.error.message).toBe('SDK offline');
  });

  it('requires both token and clientID', async () => {
    const verification = provider({ status: 'completed' });

    const result = await testHandler(identityVerificationHandler(verification), { token: 'tok' });

    assertFailure(result, 'MISSING_PARAMS');
    expect(result.error.details).toEqual({ missing: ['clientID'] });
    expect(verification.verify).not.toHaveBeenCalled();
  });
});

describe('transactionSigningHandler', () => {
  it('returns the transaction id and signature', async () => {
    const signing = signer({ status: 'signed', signature: 'c2lnbmF0dXJl' });

    const result = await testHandler(transactionSigningHandler(signing), { transactionId: 'tx-42', amount: '150.25' });

    assertSuccess(result);
    expect(result.output).toEqual({ transactionId: 'tx-42', signature: 'c2lnbmF0dXJl' });
    expect(signing.sign).toHaveBeenCalledWith(
      { transactionId: 'tx-42', amount: '150.25', processId: 'process_test_123' },
      expect.any(AbortSignal)
    );
  });

  it('rejects amounts that are not decimal numbers', async () => {
    const signing = signer({ status: 'signed', signature: 'sig' });

    for (const amount of ['ten', '1e3', 'Infinity', '1.', '--1']) {
      const result = await testHandler(transactionSigningHandler(signing), { transactionId: 'tx-1', amount });
      assertFailure(result, 'INVALID_AMOUNT');
    }
    expect(signing.sign).not.toHaveBeenCalled();
  });

  it('reports rejection and failure', async () => {
    assertFailure(
      await testHandler(transactionSigningHandler(signer({ status: 'rejected' })), { transactionId: 'tx-1', amount: '1' }),
      'SIGNING_REJECTED'
    );
    assertFailure(
      await testHandler(transactionSigningHandler(signer({ status: 'failed', reason: 'Key locked' })), {
        transactionId: 'tx-1',
        amount: '1',
      }),
      'SIGNING_FAILED'
    );
  });

  it('requires transactionId and amount', async () => {
    const result = await testHandler(transactionSigningHandler(signer({ status: 'rejected' })), {});

    assertFailure(result, 'MISSING_PARAMS');
    expect(result.error.details).toEqual({ missing: ['transactionId', 'amount'] });
  });
});

describe('defaultStepHandlers', () => {
  it('builds handlers only for the supplied capabilities', () => {
    const handlers = defaultStepHandlers({ webView: launcher(), signer: signer({ status: 'rejected' }) });

    expect(handlers.map(h => h.type)).toEqual([StepIds.WEB_VIEW, StepIds.TRANSACTION_SIGNING]);
  });

  it('drives a full continuation through the orchestrator', async () => {
    const web = launcher();
    const t = new ContinuationHarness({ handlers: defaultStepHandlers({ webView: web }) });

    const result = await t.continue({ stepName: 'WEB_VIEW', secondParams: 'https://x.test', clientID: 'c1' });

    expect(result.status).toBe('success');
    expect(t.trace).toEqual([
      'dismissTop',
      'showInterstitial',
      'handler(WEB_VIEW)',
      'submit(t-1)',
      'hideInterstitial',
      'presentFlow(proc-1)',
    ]);
    expect(ContinuationHarness.decode(t.submissions[0]?.resultPayload ?? '')).toEqual({ '': '' });
  });
});
