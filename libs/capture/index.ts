export type { FailureRecord } from './failure.js';
export { captureTrace, createFailureRecord, FailureSignal, isFailureSignal } from './failure.js';
export type { FailureMetadata, ValueOrError } from './guards.js';
export { assert, checkAsync, checkResult, unwrap } from './guards.js';
