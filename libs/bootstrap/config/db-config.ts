import { GuardRule } from '../config-guard.js';

/**
 * Database connection parameters. No inline defaults.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: (env) =>
            !['production', 'staging'].includes(env.NODE_ENV ?? '') ||
            !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    }
];
