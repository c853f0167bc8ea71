/**
 * src/utils/db.ts
 *
 * PostgreSQL connection pool for the row-store sink.
 *
 * The pool is created once by initDb() from the parsed environment and is
 * lazy: it does not connect until the first query, so building it never
 * blocks startup. DATABASE_URL takes priority over the individual PG*
 * settings.
 */

import pkg from 'pg';
import { log } from '@crawlee/core';

const { Pool } = pkg;

export interface DbConfig {
    connectionString?: string;
    host: string;
    port: number;
    user?: string;
    password?: string;
    database: string;
    ssl: boolean;
    max: number;
}

let pool: pkg.Pool | null = null;

// ─── Lifecycle ──────────────────────────────────────────────────────────────

export function buildPoolConfig(config: DbConfig): pkg.PoolConfig {
    const ssl =
        config.ssl || config.connectionString?.includes('sslmode=require') ? { rejectUnauthorized: false } : undefined;
    const common = { ssl, max: config.max, idleTimeoutMillis: 30_000, connectionTimeoutMillis: 5_000 };
    if (config.connectionString) return { connectionString: config.connectionString, ...common };
    return {
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        ...common,
    };
}

export function initDb(config: DbConfig): pkg.Pool {
    if (pool) return pool;
    pool = new Pool(buildPoolConfig(config));
    // Idle-client errors would otherwise crash the process.
    pool.on('error', (err: Error) => {
        log.error(`[DB] Unexpected pool error: ${err.message}`);
    });
    return pool;
}

export function getPool(): pkg.Pool {
    if (!pool) throw new Error('[DB] initDb() has not been called');
    return pool;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Execute a parameterised SQL query.
 *
 * @example
 *   const { rows } = await query('SELECT * FROM products WHERE platform = $1', ['jd']);
 */
export async function query<T extends pkg.QueryResultRow = pkg.QueryResultRow>(
    sql: string,
    values?: unknown[],
): Promise<pkg.QueryResult<T>> {
    return getPool().query<T>(sql, values);
}

export async function closeDb(): Promise<void> {
    if (!pool) return;
    const current = pool;
    pool = null;
    await current.end();
}

/** True when the database answers. */
export async function pingDb(): Promise<boolean> {
    try {
        await query('SELECT 1');
        return true;
    } catch (err) {
        log.warning(`[DB] Ping failed: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}
