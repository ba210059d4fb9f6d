/**
 * casefile
 *
 * Failure capture, non-local recovery and rule-based error classification.
 */

export * from './errors/index.js';
export * from './classification/index.js';
export * from './capture/index.js';
export * from './sink/index.js';
export * from './recovery/index.js';
export * from './scope/index.js';
export { GuardContext, type GuardFrame } from './context/guardContext.js';
export { loadCasefileConfig, CasefileEnvSchema } from './bootstrap/config.js';
export type { CasefileConfig, PatternSyntax, UnmatchedPolicy } from './bootstrap/config.js';
export { logger, getScopeLogger } from './logging/logger.js';
