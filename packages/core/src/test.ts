// Re-export everything
export * from './index';

// Test utilities (below)
export {
  ContinuationHarness,
  RecordingPresenter,
  NEXT_INSTANCE,
  type ContinuationHarnessOptions,
  type PresenterOperation,
} from './test/harness';
export * from './test/handlers';
