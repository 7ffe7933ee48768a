// Types
export type {
  ProcessInstance,
  ContextFlows,
  StepInstruction,
  TransitionRequest,
  FlowOutcome,
} from './types/process';
export { defaultProcess } from './types/process';
export type { StepResult, StepError, ResultMap } from './types/result';
export { Result, Outcome } from './types/result';
export {
  FlowRelayError,
  DecodeError,
  EncodeError,
  UnknownStepError,
  HandlerFailureError,
  HandlerTimeoutError,
  PresentationError,
  TransitionSubmitError,
  ContinuationBusyError,
  SessionExpiredError,
  SessionIndeterminateError,
  DirectoryRequestError,
  InvalidResponseError,
} from './types/errors';
export type {
  DecodeFailureReason,
  EncodeFailureReason,
  IndeterminateReason,
  SessionError,
  ValidationIssue,
} from './types/errors';

// Interfaces
export type { StepHandler, HandlerParams, HandlerMetadata, HandlerCategory } from './interfaces/step-handler';
export type { HandlerRegistry, RegisterOptions } from './interfaces/handler-registry';
export type { EventBus } from './interfaces/event-bus';
export type { ScreenPresenter, UiScheduler } from './interfaces/presenter';
export { inlineScheduler } from './interfaces/presenter';
export type {
  ProcessDirectory,
  DirectoryFilters,
  SubmitTransition,
  TokenProvider,
} from './interfaces/process-directory';

// Codec
export { PayloadCodec, DEFAULT_INSTRUCTION_KEYS, DEFAULT_STEP_KEY } from './codec/payload-codec';

// Handlers
export {
  callbackHandler,
  type StepCompletion,
  type CallbackStepRunner,
  type CallbackHandlerOptions,
} from './handlers';

// Implementations
export { DefaultHandlerRegistry, type HandlerRegistryOptions } from './impl/handler-registry';
export { EventEmittingHandlerRegistry } from './impl/event-emitting-handler-registry';
export {
  EventDispatcher,
  type EventType,
  type DispatchedEvent,
  type EventListener,
  type EventDispatcherOptions,
} from './impl/event-dispatcher';
export { FlowStateBus, type FlowOutcomeListener, type FlowStateBusOptions } from './impl/flow-state-bus';

// Engine
export {
  ContinuationOrchestrator,
  type ContinuationState,
  type ContinuationResult,
  type InboundInstruction,
  type OrchestratorOptions,
} from './engine/continuation-orchestrator';
export {
  SessionGate,
  type SessionVerdict,
  type SessionGateOptions,
  type IndeterminatePolicy,
} from './engine/session-gate';
export {
  NotificationResumer,
  parseNotification,
  type ResumeNotification,
  type NotificationResumerOptions,
} from './engine/notification-resumer';

// Utils
export { generateId, now } from './utils/id';
export {
  createConsoleLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type ConsoleLoggerOptions,
} from './utils/logger';
