import pg from 'pg';
import type { ServiceConfig } from '../bootstrap/config/service-config.js';
import type { ConnectionSource } from './index.js';

const { Pool } = pg;

/**
 * Hardened PostgreSQL pool. TLS is mandatory in protected environments.
 */
export function createPool(config: Pick<ServiceConfig, 'nodeEnv' | 'db'>): pg.Pool {
    const isProtectedEnv = config.nodeEnv === 'production' || config.nodeEnv === 'staging';
    if (isProtectedEnv && !config.db.caCert) {
        throw new Error("CRITICAL: Missing DB_CA_CERT in protected environment (production/staging). Database connection aborted.");
    }

    return new Pool({
        host: config.db.host,
        port: config.db.port,
        user: config.db.user,
        password: config.db.password,
        database: config.db.database,
        max: config.db.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.db.caCert
            ? { rejectUnauthorized: true, ca: config.db.caCert }
            : false
    });
}

/**
 * Narrow the pg pool to the connection contract the tenant layer uses.
 */
export function asConnectionSource(pool: pg.Pool): ConnectionSource {
    return {
        connect: async () => {
            const client = await pool.connect();
            return {
                query: (text: string, params?: unknown[]) => client.query(text, params),
                release: (err?: Error | boolean) => client.release(err)
            };
        }
    };
}
