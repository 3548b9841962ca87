import { GuardRule } from '../config-guard.js';

/**
 * Bearer token verification settings.
 */
export const AUTH_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'JWT_SECRET', sensitive: true },
    { type: 'minLength', name: 'JWT_SECRET', length: 32 },
    { type: 'required', name: 'JWT_ISSUER' },
    { type: 'required', name: 'JWT_AUDIENCE' },

    {
        type: 'forbidIf',
        name: 'EmbeddedPermissionsInProduction',
        when: (env) => env.NODE_ENV === 'production' && env.PERMISSION_SOURCE === 'claims' && env.ALLOW_CLAIM_PERMISSIONS !== 'true',
        message: 'Token-embedded permissions must be explicitly allowed in production',
    },
];
