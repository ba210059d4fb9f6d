/**
 * Centralized Redaction Configuration
 * Keys whose values must never reach a log line, including those in
 * caller-supplied failure metadata.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'password', '*.password',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'key', '*.key',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Failure metadata
    'metadata.password', 'metadata.token', 'metadata.secret', 'metadata.apiKey'
];

export const REDACT_CENSOR = '[REDACTED]';
