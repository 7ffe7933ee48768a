export {
  callbackHandler,
  type StepCompletion,
  type CallbackStepRunner,
  type CallbackHandlerOptions,
} from './callback';
