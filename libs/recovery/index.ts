export type { DispatchContext, DispatchOutcome, FailureCallback } from './dispatcher.js';
export { dispatchFailure } from './dispatcher.js';
export type { ErrorSlot, Recovered } from './result.js';
export type { FailureHandlerOptions, RegistrySource } from './failureHandler.js';
export { FailureHandler } from './failureHandler.js';
