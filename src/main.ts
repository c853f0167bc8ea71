#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT. One binary, two roles:
 *
 *   --role master   seed search tasks (keyword × page) for the selected
 *                   sources onto the shared queue, report, exit.
 *   --role worker   poll the queues round-robin and run the fetch → detect →
 *                   extract → ingest loop until stopped (or idle, when
 *                   MAX_IDLE_POLLS is set).
 *   migrate         create or grow the row-store schema.
 *
 * SHUTDOWN
 * ────────
 *  • SIGINT / SIGTERM let the worker finish the task in hand, then the
 *    pipeline flushes and connections close. A second signal kills.
 *  • A FatalError (row-store schema mismatch, sink failing repeatedly, no
 *    egress) is logged and the process exits with code 1.
 */

import 'dotenv/config';
import * as fs from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { log } from '@crawlee/core';
import { z } from 'zod';
import {
    connectStore,
    createServices,
    dbConfigFromEnv,
    loadProfiles,
    resolveSources,
    seedPools,
    splitList,
} from './bootstrap.js';
import { loadEnv, type Env } from './config/env.js';
import { migrate } from './db/migrate.js';
import { selectorExtractor } from './extractors/selectorExtractor.js';
import { httpFetcher } from './fetch/httpFetcher.js';
import { planSeedTasks, runMaster } from './master.js';
import { isProcessRole, PROCESS_ROLES, type ProcessRole } from './sources/types.js';
import { closeDb, initDb, pingDb, query } from './utils/db.js';
import { describeError, FatalError, isFatal } from './utils/errors.js';
import { closeFileLogger, initFileLogger } from './utils/fileLogger.js';
import { PoolMaintainer } from './utils/poolMaintenance.js';
import { createRunContext } from './utils/runContext.js';
import { TaskQueue } from './utils/taskQueue.js';
import { CrawlWorker } from './worker.js';

const pkg = z
    .object({ name: z.string(), version: z.string() })
    .parse(JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

interface CliOptions {
    role: ProcessRole;
    sources?: string;
    keywords?: string;
    maxTasks?: number;
    dryRun?: boolean;
    verbose?: boolean;
}

// ─── Argument parsing ─────────────────────────────────────────────────────────

function parseRole(value: string): ProcessRole {
    if (!isProcessRole(value)) throw new InvalidArgumentError(`Expected one of: ${PROCESS_ROLES.join(', ')}.`);
    return value;
}

function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
    return n;
}

// ─── Logging ──────────────────────────────────────────────────────────────────

const LOG_LEVELS = {
    DEBUG: log.LEVELS.DEBUG,
    INFO: log.LEVELS.INFO,
    WARNING: log.LEVELS.WARNING,
    ERROR: log.LEVELS.ERROR,
    OFF: log.LEVELS.OFF,
} satisfies Record<Env['LOG_LEVEL'], unknown>;

function configureLogging(env: Env, verbose: boolean): void {
    if (env.LOG_FILE) initFileLogger(env.LOG_FILE);
    log.setLevel(verbose ? log.LEVELS.DEBUG : LOG_LEVELS[env.LOG_LEVEL]);
}

// ─── Roles ────────────────────────────────────────────────────────────────────

async function runMasterRole(env: Env, options: CliOptions): Promise<number> {
    const profiles = loadProfiles(env);
    const sources = resolveSources(profiles, splitList(options.sources));
    if (options.dryRun) log.warning('[Main] --dry-run master seeds an in-process queue that no worker will see');

    const store = await connectStore(env, options.dryRun ?? false);
    try {
        const queue = new TaskQueue(store, { namespace: env.STORE_NAMESPACE, visibilityTimeoutMs: env.VISIBILITY_TIMEOUT_MS });
        const report = await runMaster(queue, planSeedTasks(profiles, sources, splitList(options.keywords)));
        return report.failed > 0 ? 1 : 0;
    } finally {
        await store.close();
    }
}

async function runWorkerRole(env: Env, options: CliOptions): Promise<number> {
    const dryRun = options.dryRun ?? false;
    const profiles = loadProfiles(env);
    const sources = resolveSources(profiles, splitList(options.sources));
    const services = await createServices(env, profiles, { dryRun });

    try {
        await seedPools(env, profiles, services.pools, sources);
        if (dryRun) {
            // Nothing else can fill an in-process queue.
            await runMaster(services.queue, planSeedTasks(profiles, sources, splitList(options.keywords)));
        }

        const lanes = Math.max(...sources.map((s) => profiles.get(s).pacing.concurrencyCeiling));
        const worker = new CrawlWorker(
            {
                context: createRunContext('worker'),
                queue: services.queue,
                controller: services.controller,
                pools: services.pools,
                profiles,
                pipeline: services.pipeline,
                monitor: services.monitor,
                fetcher: httpFetcher,
                extractor: selectorExtractor,
                maintenance: new PoolMaintainer(services.pools, profiles, sources),
            },
            {
                sources,
                maxAttempts: env.MAX_TASK_ATTEMPTS,
                retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
                retryMaxDelayMs: env.RETRY_MAX_DELAY_MS,
                idleBackoffMs: env.IDLE_BACKOFF_MS,
                maxIdlePolls: dryRun ? Math.max(1, env.MAX_IDLE_POLLS) : env.MAX_IDLE_POLLS,
                heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS,
                maxStoreOutages: env.MAX_STORE_OUTAGES,
                lanes,
                maxTasks: options.maxTasks,
            },
        );

        const stop = (signal: string) => {
            log.info(`[Main] 🛑 Received ${signal}. Finishing the current task...`);
            worker.stop();
        };
        process.once('SIGINT', () => stop('SIGINT (Ctrl+C)'));
        process.once('SIGTERM', () => stop('SIGTERM'));

        const summary = await worker.run();
        log.info(
            `[Main] Worker finished: ${summary.processed} task(s), ` +
                `${summary.results.done} done, ${summary.results.requeued} requeued, ${summary.results.buried} buried`,
        );
        return 0;
    } finally {
        await services.close();
    }
}

async function runMigrate(env: Env): Promise<number> {
    initDb(dbConfigFromEnv(env));
    try {
        if (!(await pingDb())) throw new FatalError('PostgreSQL is not reachable; check DATABASE_URL / PG* settings');
        await migrate((sql, values) => query(sql, values));
        log.info('[migrate] ✓ Schema is up to date.');
        return 0;
    } finally {
        await closeDb();
    }
}

// ─── CLI ──────────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
    let exitCode = 0;
    const program = new Command();

    program
        .name(pkg.name)
        .description('Distributed e-commerce crawl coordinator')
        .version(pkg.version)
        .option('-r, --role <role>', `process role (${PROCESS_ROLES.join(' | ')})`, parseRole, 'worker')
        .option('-s, --sources <ids>', 'comma-separated source ids (default: every enabled source)')
        .option('-k, --keywords <list>', 'comma-separated seed keywords, replacing each profile list (master)')
        .option('--max-tasks <n>', 'stop after this many tasks (worker)', parsePositiveInt)
        .option('--dry-run', 'in-process store and row-store; no Redis or PostgreSQL')
        .option('-v, --verbose', 'debug logging');

    program
        .command('migrate')
        .description('Create or update the row-store schema')
        .action(async () => {
            const env = loadEnv();
            configureLogging(env, program.opts<CliOptions>().verbose ?? false);
            exitCode = await runMigrate(env);
        });

    program.action(async () => {
        const options = program.opts<CliOptions>();
        const env = loadEnv();
        configureLogging(env, options.verbose ?? false);
        log.info(`[Main] ${pkg.name} ${pkg.version} starting as ${options.role}${options.dryRun ? ' (dry run)' : ''}`);
        exitCode = options.role === 'master' ? await runMasterRole(env, options) : await runWorkerRole(env, options);
    });

    await program.parseAsync(process.argv);
    return exitCode;
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        log.error(`[Main] ${isFatal(err) ? 'Fatal' : 'Unexpected'} error: ${describeError(err)}`);
        if (!isFatal(err) && err instanceof Error && err.stack) log.debug(err.stack);
        process.exitCode = 1;
    })
    .finally(() => {
        closeFileLogger();
    });
