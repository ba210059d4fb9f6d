import { REDACT_CENSOR, REDACT_KEYS } from '../logging/redactionConfig.js';

const MAX_MESSAGE_LENGTH = 500;

/**
 * Root-level keys from the log redaction list, longest first so that
 * `client_secret` wins over `secret`.
 */
const CREDENTIAL_KEYS = [...new Set(REDACT_KEYS.filter(key => !key.includes('.')))]
    .sort((a, b) => b.length - a.length)
    .map(key => key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));

const CREDENTIAL_PAIR = new RegExp(`(${CREDENTIAL_KEYS.join('|')})[=:]\\s*\\S+`, 'gi');

/**
 * Replace the value of every `key=value` or `key: value` pair whose key is on
 * the log redaction list. The key keeps its original spelling.
 */
export function redactCredentials(message: string): string {
    return message.replace(CREDENTIAL_PAIR, (_pair, key: string) => `${key}=${REDACT_CENSOR}`);
}

/**
 * Redacted and truncated form of an error message, for structured logs.
 * Case files keep the raw text.
 */
export function sanitizeMessage(message: string, maxLength = MAX_MESSAGE_LENGTH): string {
    return redactCredentials(message).substring(0, maxLength);
}
