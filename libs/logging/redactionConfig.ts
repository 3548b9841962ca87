/**
 * Centralized Redaction Configuration
 * Keys that must never reach the log stream in clear text.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'headers.authorization', 'req.headers.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'id_token', '*.id_token',
    'bearer', '*.bearer',
    'password', '*.password',
    'secret', '*.secret',
    'jwtSecret', '*.jwtSecret',

    // Student / guardian PII (Root and Nested)
    'national_id', '*.national_id',
    'date_of_birth', '*.date_of_birth',
    'phone', '*.phone',

    // Internal
    'jwt', '*.jwt',
    'rawToken', '*.rawToken'
];

export const REDACT_CENSOR = '[REDACTED]';
