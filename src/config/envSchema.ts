import { z } from 'zod';
import * as path from 'path';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const positiveMs = numFromEnv.pipe(z.number().positive());

const rate = numFromEnv.pipe(z.number().min(0).max(1));

const csvList = z.preprocess((v) => {
    if (v === undefined) return [];
    if (typeof v === 'string') {
        return v
            .split(/[,\n]/)
            .map((s) => s.trim())
            .filter(Boolean);
    }
    return v;
}, z.array(z.string()));

export const envSchema = z.object({
    // Shared store
    REDIS_URL: z.string().optional(),
    REDIS_HOST: z.string().default('127.0.0.1'),
    REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
    REDIS_PASSWORD: z.string().optional(),
    REDIS_DB: z.coerce.number().int().min(0).default(0),
    STORE_DRIVER: z.enum(['redis', 'memory']).default('redis'),
    STORE_NAMESPACE: z.string().min(1).default('crawl'),

    // Row-store
    DATABASE_URL: z.string().optional(),
    PGHOST: z.string().default('localhost'),
    PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
    PGUSER: z.string().optional(),
    PGPASSWORD: z.string().optional(),
    PGDATABASE: z.string().default('market_crawl'),
    PGSSL: boolStrictTrue.default(false),
    PG_POOL_MAX: numFromEnv.default(10),
    ROW_STORE: z.enum(['postgres', 'memory']).default('postgres'),

    // File sinks
    DATA_DIR: z.string().default(path.join(process.cwd(), 'data')),
    CSV_SINK_ENABLED: boolUnlessFalse.default(true),
    JSON_SINK_ENABLED: boolUnlessFalse.default(true),

    // Sources and pools
    SOURCES_CONFIG: z.string().default('config/sources.json'),
    USER_AGENTS_PATH: z.string().default('config/user_agents.txt'),
    PROXY_URLS: csvList,
    ALLOW_DIRECT_EGRESS: boolUnlessFalse.default(true),
    IDENTITY_ROTATE_MS: positiveMs.optional(),

    // Queue
    VISIBILITY_TIMEOUT_MS: positiveMs.default(5 * 60_000),
    MAX_TASK_ATTEMPTS: numFromEnv.pipe(z.number().int().min(1)).default(5),
    RETRY_BASE_DELAY_MS: positiveMs.default(5_000),
    RETRY_MAX_DELAY_MS: positiveMs.default(5 * 60_000),
    IDLE_BACKOFF_MS: positiveMs.default(2_000),
    MAX_IDLE_POLLS: numFromEnv.pipe(z.number().int().min(0)).default(0),
    MAX_STORE_OUTAGES: numFromEnv.pipe(z.number().int().min(1)).default(20),

    // Pipeline
    BATCH_SIZE: numFromEnv.pipe(z.number().int().min(1)).default(50),
    BATCH_FLUSH_INTERVAL_MS: positiveMs.default(5_000),
    MAX_SINK_FAILURES: numFromEnv.pipe(z.number().int().min(1)).default(3),

    // Controller window
    ERROR_WINDOW_MS: positiveMs.default(60_000),
    ERROR_BUCKET_MS: positiveMs.default(10_000),

    // Monitor
    STATS_RETENTION_DAYS: numFromEnv.pipe(z.number().int().min(1)).default(30),
    HEARTBEAT_INTERVAL_MS: positiveMs.default(30_000),
    WORKER_TIMEOUT_MS: positiveMs.default(120_000),
    ALERT_FAILURE_RATE: rate.default(0.5),

    // Logging
    LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF']).default('INFO'),
    LOG_FILE: z.string().optional(),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
