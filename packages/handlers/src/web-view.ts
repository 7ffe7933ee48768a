import { Result, type StepHandler, type HandlerParams } from '@flowrelay/core';
import { StepIds } from './step-ids';
import { errorMessage, missingParams } from './params';

export interface WebViewRequest {
  url: string;
  clientId?: string;
}

/**
 * Host capability that shows a URL in an in-app browser.
 * Resolves once the user closes the view; rejects if it could not be shown.
 */
export interface WebViewLauncher {
  open(request: WebViewRequest, signal: AbortSignal): Promise<void>;
}

const ALLOWED_PROTOCOLS = new Set(['https:', 'http:']);

/**
 * Web redirect step. Opens `secondParams` and reports back once the user is
 * done with it. The remote engine only needs to know the view was closed, so
 * the result is the `{ "": "" }` acknowledgement.
 */
export function webViewHandler(launcher: WebViewLauncher): StepHandler {
  return {
    type: StepIds.WEB_VIEW,

    metadata: {
      type: StepIds.WEB_VIEW,
      name: 'Web View',
      description: 'Open a web page and continue once the user closes it',
      category: 'redirect',
      instructionKeys: ['secondParams', 'clientID'],
    },

    async execute(params: HandlerParams) {
      const { secondParams: url, clientID } = params.instruction.params;
      if (!url?.trim()) {
        return missingParams(params.instruction, ['secondParams']);
      }

      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch {
        return Result.failure('INVALID_URL', `Not a valid URL: ${url}`);
      }
      if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
        return Result.failure('INVALID_URL', `Unsupported protocol: ${parsed.protocol}`);
      }

      try {
        await launcher.open({ url, clientId: clientID }, params.signal);
      } catch (error) {
        return Result.failure('WEB_VIEW_ERROR', errorMessage(error, 'Web view could not be opened'));
      }

      return Result.acknowledged();
    },
  };
}
