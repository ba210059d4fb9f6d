export type { ErrorIdentity } from './identities.js';
export { IMPROPER_USE_ERROR, UNEXPECTED_ERROR, isErrorIdentity } from './identities.js';
export type { CasefileErrorCategory } from './casefileError.js';
export { CasefileError, ConfigurationError, RegistrySealedError, SinkFaultError } from './casefileError.js';
export { redactCredentials, sanitizeMessage } from './sanitizer.js';
