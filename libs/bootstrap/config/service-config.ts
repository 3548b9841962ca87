import { z } from 'zod';
import type { PermissionSource } from '../../context/resolveIdentity.js';

const ServiceEnvSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DB_HOST: z.string().min(1),
    DB_PORT: z.coerce.number().int().positive(),
    DB_USER: z.string().min(1),
    DB_PASSWORD: z.string().min(1),
    DB_NAME: z.string().min(1),
    DB_POOL_MAX: z.coerce.number().int().positive().default(20),
    DB_CA_CERT: z.string().optional(),
    JWT_SECRET: z.string().min(32),
    JWT_ISSUER: z.string().min(1),
    JWT_AUDIENCE: z.string().min(1),
    JWT_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(30),
    AUTHZ_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    PERMISSION_SOURCE: z.enum(['claims', 'store']).default('store'),
});

export interface ServiceConfig {
    nodeEnv: string;
    port: number;
    db: {
        host: string;
        port: number;
        user: string;
        password: string;
        database: string;
        poolMax: number;
        caCert?: string;
    };
    auth: {
        secret: string;
        issuer: string;
        audience: string;
        clockToleranceSeconds: number;
    };
    authorizationTimeoutMs: number;
    permissionSource: PermissionSource;
}

/**
 * Parse the process environment into a typed service configuration.
 * Run after ConfigGuard so that missing values are reported as fatal config first.
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const parsed = ServiceEnvSchema.safeParse(env);

    if (!parsed.success) {
        const message = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${message}`);
    }

    const values = parsed.data;
    return {
        nodeEnv: values.NODE_ENV,
        port: values.PORT,
        db: {
            host: values.DB_HOST,
            port: values.DB_PORT,
            user: values.DB_USER,
            password: values.DB_PASSWORD,
            database: values.DB_NAME,
            poolMax: values.DB_POOL_MAX,
            ...(values.DB_CA_CERT ? { caCert: values.DB_CA_CERT } : {})
        },
        auth: {
            secret: values.JWT_SECRET,
            issuer: values.JWT_ISSUER,
            audience: values.JWT_AUDIENCE,
            clockToleranceSeconds: values.JWT_CLOCK_TOLERANCE_SECONDS
        },
        authorizationTimeoutMs: values.AUTHZ_TIMEOUT_MS,
        permissionSource: values.PERMISSION_SOURCE
    };
}
