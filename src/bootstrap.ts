/**
 * src/bootstrap.ts
 *
 * Builds the component graph a process runs on from the parsed environment:
 * shared store, queue, controller, pools, monitor, sinks and pipeline.
 *
 * --dry-run swaps Redis and PostgreSQL for their in-process counterparts;
 * the file sinks still follow CSV_SINK_ENABLED / JSON_SINK_ENABLED.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from '@crawlee/core';
import type { Env } from './config/env.js';
import { loadSourceTable, type EgressSeed, type SourceProfileTable } from './config/sources.js';
import type { SharedStore } from './broker/sharedStore.js';
import { MemoryStore } from './broker/memoryStore.js';
import { connectRedisStore, describeRedisTarget, type RedisConnectionConfig } from './broker/redisStore.js';
import { DIRECT_EGRESS } from './fetch/requestBuilder.js';
import { RecordDeduplicator } from './pipeline/dedup.js';
import { IngestionPipeline } from './pipeline/pipeline.js';
import { CsvSink } from './pipeline/sinks/csvSink.js';
import { JsonSink } from './pipeline/sinks/jsonSink.js';
import { MemoryRowStore } from './pipeline/sinks/memoryRowStore.js';
import { PgRowStore } from './pipeline/sinks/pgRowStore.js';
import type { RecordSink, RowStore } from './pipeline/sinks/types.js';
import { AdaptiveController } from './utils/adaptiveController.js';
import { closeDb, initDb, type DbConfig } from './utils/db.js';
import { FatalError } from './utils/errors.js';
import { ErrorRateWindow } from './utils/errorRateWindow.js';
import { Monitor } from './utils/monitor.js';
import { topUpTokens } from './utils/poolMaintenance.js';
import { ResourcePool, type ResourceSeed } from './utils/resourcePool.js';
import { TaskQueue } from './utils/taskQueue.js';
import type { WorkerPools } from './worker.js';

// ─── Config mapping ───────────────────────────────────────────────────────────

export function redisConfigFromEnv(env: Env): RedisConnectionConfig {
    return {
        url: env.REDIS_URL,
        host: env.REDIS_HOST,
        port: env.REDIS_PORT,
        password: env.REDIS_PASSWORD,
        db: env.REDIS_DB,
    };
}

export function dbConfigFromEnv(env: Env): DbConfig {
    return {
        connectionString: env.DATABASE_URL,
        host: env.PGHOST,
        port: env.PGPORT,
        user: env.PGUSER,
        password: env.PGPASSWORD,
        database: env.PGDATABASE,
        ssl: env.PGSSL,
        max: env.PG_POOL_MAX,
    };
}

export function loadProfiles(env: Env): SourceProfileTable {
    const overrides = env.IDENTITY_ROTATE_MS ? { identity: { rotateMs: env.IDENTITY_ROTATE_MS } } : {};
    return loadSourceTable(env.SOURCES_CONFIG, overrides);
}

export function splitList(value: string | undefined): string[] {
    if (!value) return [];
    return value
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
}

/** Requested ids, or every enabled source. Unknown ids run on the defaults profile. */
export function resolveSources(profiles: SourceProfileTable, requested: string[]): string[] {
    const sources = requested.length > 0 ? requested : profiles.enabledIds();
    if (sources.length === 0) throw new FatalError('No sources selected and none enabled in the source table');
    for (const id of sources) {
        if (!profiles.has(id)) log.warning(`[Bootstrap] Source "${id}" is not in the table; using the defaults profile`);
    }
    return sources;
}

// ─── Pool seeds ───────────────────────────────────────────────────────────────

/** One user agent per line; blank lines and `#` comments are skipped. */
export function parseUserAgents(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/** PROXY_URLS first, then the table's list; a lone `direct` when both are empty and that is allowed. */
export function egressSeeds(proxyUrls: string[], tableEgress: EgressSeed[], allowDirect: boolean): ResourceSeed[] {
    const seeds: ResourceSeed[] = [...proxyUrls.map((value) => ({ value })), ...tableEgress];
    if (seeds.length > 0) return seeds;
    if (!allowDirect) {
        throw new FatalError('No egress configured: set PROXY_URLS, add "egress" to the source table, or allow direct egress');
    }
    return [{ value: DIRECT_EGRESS }];
}

// ─── Services ─────────────────────────────────────────────────────────────────

export interface Services {
    env: Env;
    profiles: SourceProfileTable;
    store: SharedStore;
    queue: TaskQueue;
    window: ErrorRateWindow;
    controller: AdaptiveController;
    pools: WorkerPools;
    monitor: Monitor;
    rowStore: RowStore;
    dedup: RecordDeduplicator;
    pipeline: IngestionPipeline;
    close(): Promise<void>;
}

export interface ServiceOptions {
    dryRun: boolean;
}

export async function connectStore(env: Env, dryRun: boolean): Promise<SharedStore> {
    if (dryRun || env.STORE_DRIVER === 'memory') {
        log.info('[Bootstrap] Using the in-process store');
        return new MemoryStore();
    }
    const config = redisConfigFromEnv(env);
    log.info(`[Bootstrap] Connecting to Redis at ${describeRedisTarget(config)}`);
    return connectRedisStore(config);
}

async function openRowStore(env: Env, dryRun: boolean): Promise<RowStore> {
    if (dryRun || env.ROW_STORE === 'memory') {
        log.info('[Bootstrap] Using the in-process row-store');
        return new MemoryRowStore();
    }
    const rowStore = new PgRowStore(initDb(dbConfigFromEnv(env)));
    await rowStore.verify();
    return rowStore;
}

function fileSinks(env: Env): RecordSink[] {
    const dataDir = path.resolve(process.cwd(), env.DATA_DIR);
    const sinks: RecordSink[] = [];
    if (env.CSV_SINK_ENABLED) sinks.push(new CsvSink(dataDir));
    if (env.JSON_SINK_ENABLED) sinks.push(new JsonSink(dataDir));
    if (sinks.length > 0) log.info(`[Bootstrap] File sinks (${sinks.map((s) => s.name).join(', ')}) write to ${dataDir}`);
    return sinks;
}

/** Seeds every pool; existing resources keep their health and live tokens count toward `tokenCount`. */
export async function seedPools(env: Env, profiles: SourceProfileTable, pools: WorkerPools, sources: string[]): Promise<void> {
    const agents = parseUserAgents(fs.readFileSync(path.resolve(process.cwd(), env.USER_AGENTS_PATH), 'utf-8'));
    if (agents.length === 0) throw new FatalError(`${env.USER_AGENTS_PATH} lists no user agents`);

    const egress = await pools.egress.seed(egressSeeds(env.PROXY_URLS, profiles.egress, env.ALLOW_DIRECT_EGRESS));
    const identity = await pools.identity.seed(agents.map((value) => ({ value })));
    const token = await topUpTokens(pools.token, profiles, sources, Date.now());
    log.info(`[Bootstrap] Pools seeded: ${egress} egress, ${identity} identity, ${token} token (new resources)`);
}

/** Connects the shared store and the row-store, then wires every worker component. */
export async function createServices(env: Env, profiles: SourceProfileTable, options: ServiceOptions): Promise<Services> {
    const namespace = env.STORE_NAMESPACE;
    const store = await connectStore(env, options.dryRun);

    let rowStore: RowStore;
    try {
        rowStore = await openRowStore(env, options.dryRun);
    } catch (err) {
        await store.close();
        await closeDb();
        throw err;
    }

    const queue = new TaskQueue(store, { namespace, visibilityTimeoutMs: env.VISIBILITY_TIMEOUT_MS });
    const window = new ErrorRateWindow(store, {
        namespace,
        windowMs: env.ERROR_WINDOW_MS,
        bucketMs: env.ERROR_BUCKET_MS,
    });
    const controller = new AdaptiveController(window, store, (source) => profiles.get(source).pacing, { namespace });
    const pools: WorkerPools = {
        egress: new ResourcePool('egress', store, profiles.pools.egress, { namespace }),
        identity: new ResourcePool('identity', store, profiles.pools.identity, { namespace }),
        token: new ResourcePool('token', store, profiles.pools.token, { namespace }),
    };
    const monitor = new Monitor(store, {
        namespace,
        retentionDays: env.STATS_RETENTION_DAYS,
        alertFailureRate: env.ALERT_FAILURE_RATE,
        workerTimeoutMs: env.WORKER_TIMEOUT_MS,
    });
    const dedup = new RecordDeduplicator(store, rowStore.policies, { namespace });
    const pipeline = new IngestionPipeline(rowStore, fileSinks(env), dedup, monitor, queue, {
        batchSize: env.BATCH_SIZE,
        flushIntervalMs: env.BATCH_FLUSH_INTERVAL_MS,
        maxConsecutiveSinkFailures: env.MAX_SINK_FAILURES,
    });

    // Closing the pipeline closes the row-store, which ends its pg pool.
    const close = async (): Promise<void> => {
        try {
            await pipeline.close();
        } finally {
            await store.close();
        }
    };

    return { env, profiles, store, queue, window, controller, pools, monitor, rowStore, dedup, pipeline, close };
}
