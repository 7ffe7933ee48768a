/**
 * Host navigation boundary. Only the orchestrator calls these, and only while
 * it owns the screen (between dismissal and the end of a run).
 */
export interface ScreenPresenter {
  /** Dismiss whatever screen is on top; resolves once dismissal completes */
  dismissTop(options: { animated: boolean }): Promise<void>;
  /** Show the neutral, input-blocking interstitial */
  showInterstitial(): Promise<void>;
  /** Remove the interstitial */
  hideInterstitial(): Promise<void>;
}

/**
 * Runs UI work on the host's UI thread (main queue, render loop, ...).
 */
export interface UiScheduler {
  run<T>(task: () => T | Promise<T>): Promise<T>;
}

/** Runs tasks inline. Suitable when the caller is already on the UI thread. */
export const inlineScheduler: UiScheduler = {
  async run<T>(task: () => T | Promise<T>): Promise<T> {
    return task();
  },
};
