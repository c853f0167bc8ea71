/**
 * src/worker.ts
 *
 * The Worker role: pop → borrow resources → pace → fetch → classify →
 * report → extract → ingest → ack once the row-store commit lands.
 *
 * ┌──────────┐  dequeue   ┌─────────────┐ acquire ┌────────────────────────┐
 * │TaskQueue │──────────► │ CrawlWorker │ ──────► │ egress/identity/token  │
 * └──────────┘ ◄──────────│             │ ◄────── │ pools (release/score)  │
 *   ack/requeue/bury      │             │         └────────────────────────┘
 *                         │  before/    │ ──────► AdaptiveController
 *                         │  report     │ ──────► Monitor
 *                         │  ingest     │ ──────► IngestionPipeline
 *                         └─────────────┘
 *
 * Blocked and failed requests are requeued with exponential backoff until
 * MAX_TASK_ATTEMPTS, then buried on the source's dead-letter list. Queue or
 * pool outages are transient: the task goes back (or its lease expires) and
 * the loop backs off. A FatalError from the pipeline ends the loop, and so
 * does a store outage lasting MAX_STORE_OUTAGES consecutive polls.
 *
 * A task stays leased while its records sit in the pipeline buffer. The
 * pipeline's commit callback acks it, or requeues it without counting an
 * attempt when the row-store rejected the batch.
 */

import { log } from '@crawlee/core';
import type { SourceProfileTable } from './config/sources.js';
import type { Extractor } from './extractors/selectorExtractor.js';
import type { Fetcher } from './fetch/httpFetcher.js';
import { buildRequest } from './fetch/requestBuilder.js';
import type { IngestionPipeline } from './pipeline/pipeline.js';
import type { FetchOutcome, FetchResponse, RequestVerdict, Task } from './sources/types.js';
import type { AdaptiveController, ImplicatedResource } from './utils/adaptiveController.js';
import { classify, type Verdict } from './utils/blockDetector.js';
import { describeError, FatalError, isFatal, type Outcome } from './utils/errors.js';
import { buildClientIdentity } from './utils/identity.js';
import type { Monitor } from './utils/monitor.js';
import type { PoolMaintainer, PoolSet } from './utils/poolMaintenance.js';
import type { PoolLease } from './utils/resourcePool.js';
import type { RunContext } from './utils/runContext.js';
import type { TaskQueue } from './utils/taskQueue.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type WorkerPools = PoolSet;

export interface WorkerDeps {
    context: RunContext;
    queue: TaskQueue;
    controller: AdaptiveController;
    pools: WorkerPools;
    profiles: SourceProfileTable;
    pipeline: IngestionPipeline;
    monitor: Monitor;
    fetcher: Fetcher;
    extractor: Extractor;
    /** Pool upkeep, run on the heartbeat cadence. */
    maintenance?: Pick<PoolMaintainer, 'run'>;
}

export interface WorkerOptions {
    sources: string[];
    maxAttempts?: number;
    retryBaseDelayMs?: number;
    retryMaxDelayMs?: number;
    idleBackoffMs?: number;
    /** Consecutive empty polls of every source before run() returns; 0 polls forever. */
    maxIdlePolls?: number;
    heartbeatIntervalMs?: number;
    /** Consecutive rounds with every queue unreachable before the worker gives up. */
    maxStoreOutages?: number;
    /** Parallel task loops in this process; the controller's slots still cap requests. */
    lanes?: number;
    /** Stop after this many processed tasks. */
    maxTasks?: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export type TaskResult = 'idle' | 'done' | 'requeued' | 'deferred' | 'buried' | 'unavailable';

interface Leases {
    egress: PoolLease;
    identity: PoolLease;
    token: PoolLease | null;
}

export interface WorkerSummary {
    processed: number;
    results: Record<TaskResult, number>;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

const BODY_SAMPLE_CHARS = 2_000;

// ─── Worker ───────────────────────────────────────────────────────────────────

export class CrawlWorker {
    private readonly maxAttempts: number;
    private readonly retryBaseDelayMs: number;
    private readonly retryMaxDelayMs: number;
    private readonly idleBackoffMs: number;
    private readonly maxIdlePolls: number;
    private readonly heartbeatIntervalMs: number;
    private readonly maxStoreOutages: number;
    private readonly lanes: number;
    private readonly maxTasks: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    private stopping = false;
    private processed = 0;
    private claimed = 0;
    private nextSource = 0;
    private lastHeartbeatAt = 0;
    private readonly results: Record<TaskResult, number> = {
        idle: 0,
        done: 0,
        requeued: 0,
        deferred: 0,
        buried: 0,
        unavailable: 0,
    };

    constructor(
        private readonly deps: WorkerDeps,
        private readonly options: WorkerOptions,
    ) {
        this.maxAttempts = options.maxAttempts ?? 5;
        this.retryBaseDelayMs = options.retryBaseDelayMs ?? 5_000;
        this.retryMaxDelayMs = options.retryMaxDelayMs ?? 300_000;
        this.idleBackoffMs = options.idleBackoffMs ?? 2_000;
        this.maxIdlePolls = options.maxIdlePolls ?? 0;
        this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000;
        this.maxStoreOutages = options.maxStoreOutages ?? 20;
        this.lanes = Math.max(1, options.lanes ?? 1);
        this.maxTasks = options.maxTasks ?? Infinity;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? sleep;
    }

    /** Lets the loop finish the task in hand, then return. */
    stop(): void {
        if (!this.stopping) log.info(`[Worker] ${this.deps.context.workerId} stopping after current task`);
        this.stopping = true;
    }

    get summary(): WorkerSummary {
        return { processed: this.processed, results: { ...this.results } };
    }

    // ─── Loop ─────────────────────────────────────────────────────────────────

    async run(): Promise<WorkerSummary> {
        const { context, monitor, pipeline } = this.deps;
        log.info(
            `[Worker] ${context.workerId} polling ${this.options.sources.join(', ')} with ${this.lanes} lane(s)`,
        );
        pipeline.start();
        await this.heartbeat(true);
        try {
            // A fatal error in one lane stops the others after their current task.
            const settled = await Promise.allSettled(
                Array.from({ length: this.lanes }, (_, lane) =>
                    this.lane(lane).catch((err: unknown) => {
                        this.stop();
                        throw err;
                    }),
                ),
            );
            const failed = settled.find((r): r is PromiseRejectedResult => r.status === 'rejected');
            if (failed) throw failed.reason;
        } finally {
            await monitor.unregister(context.workerId).catch((err: unknown) => {
                log.warning(`[Worker] Could not unregister: ${describeError(err)}`);
            });
            monitor.logSummary();
        }
        return this.summary;
    }

    private async lane(lane: number): Promise<void> {
        let idlePolls = 0;
        let outages = 0;
        while (!this.stopping && this.claimed < this.maxTasks) {
            const { outcome, polled } = await this.pollRound();
            await this.heartbeat(false);

            if (outcome === 'unavailable') {
                outages++;
                if (outages >= this.maxStoreOutages) {
                    throw new FatalError(`Shared store unreachable for ${outages} consecutive polls`);
                }
                const wait = this.deps.controller.retryDelay(outages - 1, this.idleBackoffMs, this.retryMaxDelayMs);
                log.warning(`[Worker] lane ${lane}: queue unavailable, retrying in ${wait}ms`);
                await this.sleep(wait);
                continue;
            }
            outages = 0;

            if (outcome === 'idle') {
                idlePolls++;
                if (this.maxIdlePolls > 0 && idlePolls >= this.maxIdlePolls) {
                    log.info(`[Worker] lane ${lane}: queues empty after ${idlePolls} poll(s) of ${polled} source(s)`);
                    return;
                }
                await this.sleep(this.idleBackoffMs);
                continue;
            }
            idlePolls = 0;
        }
    }

    /** Tries each source once, round-robin, until one yields a task. */
    private async pollRound(): Promise<{ outcome: TaskResult; polled: number }> {
        const { sources } = this.options;
        let sawOutage = false;
        for (let i = 0; i < sources.length; i++) {
            const source = sources[this.nextSource % sources.length];
            this.nextSource++;
            if (source === undefined) continue;
            const outcome = await this.processNext(source);
            if (outcome === 'unavailable') {
                sawOutage = true;
                continue;
            }
            if (outcome !== 'idle') return { outcome, polled: i + 1 };
        }
        return { outcome: sawOutage ? 'unavailable' : 'idle', polled: sources.length };
    }

    private async heartbeat(force: boolean): Promise<void> {
        const now = this.now();
        if (!force && now - this.lastHeartbeatAt < this.heartbeatIntervalMs) return;
        this.lastHeartbeatAt = now;
        const { context, monitor } = this.deps;
        await monitor.heartbeat({ ...context, processed: this.processed });
        try {
            await monitor.pruneWorkers();
        } catch (err) {
            log.debug(`[Worker] Prune skipped: ${describeError(err)}`);
        }
        if (force) return;
        if (this.deps.maintenance) {
            try {
                await this.deps.maintenance.run();
            } catch (err) {
                log.warning(`[Worker] Pool maintenance failed: ${describeError(err)}`);
            }
        }
        monitor.logSummary();
    }

    // ─── One task ─────────────────────────────────────────────────────────────

    async processNext(source: string): Promise<TaskResult> {
        if (this.claimed >= this.maxTasks) return 'idle';
        const popped = await this.deps.queue.dequeue(source);
        if (!popped.ok) {
            log.warning(`[Worker] ${popped.error.message}`);
            return this.count('unavailable');
        }
        if (popped.value === null) return this.count('idle');

        this.claimed++;
        const result = await this.process(popped.value);
        this.processed++;
        return this.count(result);
    }

    private count(result: TaskResult): TaskResult {
        this.results[result]++;
        return result;
    }

    private async process(task: Task): Promise<TaskResult> {
        const { queue, controller, profiles, monitor, fetcher, context } = this.deps;
        const profile = profiles.get(task.source);

        const leases = await this.borrow(task.source);
        if (!leases.ok) {
            log.info(`[Worker] ${task.source}/${task.key} deferred: ${leases.message}`);
            await this.settle(task, queue.requeue(task, this.idleBackoffMs, false), 'requeue');
            return 'deferred';
        }

        const identity = buildClientIdentity(leases.value.identity.resource, this.now(), profile.identity);
        const plan = buildRequest(
            task,
            profile,
            {
                egress: leases.value.egress.resource.value,
                identity,
                cookie: leases.value.token?.resource.value ?? null,
            },
            this.now(),
        );
        if (!plan.ok) {
            await this.returnLeases(leases.value, null);
            await this.settle(task, queue.bury(task, plan.error.message), 'bury');
            return 'buried';
        }

        const ticket = await controller.beforeRequest(task.source, context.role, `${context.workerId}/${task.key}`);
        if (!ticket.ok) {
            log.warning(`[Worker] ${task.source}/${task.key} not paced: ${ticket.error.message}`);
            await this.returnLeases(leases.value, null);
            await this.settle(task, queue.requeue(task, this.idleBackoffMs, false), 'requeue');
            return 'unavailable';
        }

        let response: FetchResponse | null = null;
        let fetchError: string | null = null;
        const started = this.now();
        try {
            response = await fetcher(plan.value);
        } catch (err) {
            fetchError = describeError(err);
        }
        const elapsedMs = response?.elapsedMs ?? this.now() - started;

        const detection: Verdict | null = response
            ? classify({ status: response.status, body: response.body, elapsedMs, kind: task.kind }, profile.detection)
            : null;
        const outcome: FetchOutcome = {
            task,
            status: response?.status ?? null,
            bodySample: response?.body?.slice(0, BODY_SAMPLE_CHARS) ?? null,
            bodyBytes: response?.body ? Buffer.byteLength(response.body, 'utf8') : 0,
            elapsedMs,
            blocked: detection?.classification === 'blocked',
        };
        const verdict: RequestVerdict = outcome.blocked
            ? 'blocked'
            : response && response.status >= 200 && response.status < 300
              ? 'success'
              : 'failure';

        const implicated: ImplicatedResource[] = [leases.value.egress, leases.value.identity, leases.value.token]
            .filter((lease): lease is PoolLease => lease !== null)
            .map((lease) => ({ pool: lease.pool, resourceId: lease.resource.id }));
        await controller.report(task.source, context.role, { verdict, ticket: ticket.value, resources: implicated });
        await monitor.recordRequest(task.source, verdict, outcome.elapsedMs);
        await this.returnLeases(leases.value, verdict === 'success');

        if (verdict !== 'success' || !response) {
            const reason = outcome.blocked
                ? `blocked (${detection?.reasons.join(', ') ?? ''})`
                : (fetchError ?? `status ${outcome.status ?? 'none'}`);
            log.info(`[Worker] ${task.source}/${task.key} ${verdict}: ${reason}`);
            return this.retryOrBury(task, reason);
        }

        log.debug(`[Worker] ${task.source}/${task.key} ${outcome.status} in ${outcome.elapsedMs}ms (${outcome.bodyBytes}B)`);
        const extracted = this.deps.extractor({
            task,
            body: response.body ?? '',
            profile,
            pageUrl: response.finalUrl,
        });
        try {
            await this.deps.pipeline.ingest(extracted.records, extracted.tasks, (committed) =>
                this.finish(task, committed),
            );
        } catch (err) {
            if (isFatal(err)) throw err;
            log.warning(`[Worker] ${task.source}/${task.key} ingest deferred: ${describeError(err)}`);
            return this.retryOrBury(task, describeError(err));
        }
        return 'done';
    }

    /** Commit callback: the task is acked only after its records are stored. */
    private async finish(task: Task, committed: boolean): Promise<void> {
        const { queue, controller } = this.deps;
        if (committed) {
            await this.settle(task, queue.ack(task), 'ack');
            return;
        }
        const delay = controller.retryDelay(task.attempts, this.retryBaseDelayMs, this.retryMaxDelayMs);
        log.warning(`[Worker] ${task.source}/${task.key} records not committed, retrying in ${delay}ms`);
        await this.settle(task, queue.requeue(task, delay, false), 'requeue');
    }

    private async retryOrBury(task: Task, reason: string): Promise<TaskResult> {
        const { queue, controller } = this.deps;
        if (task.attempts + 1 >= this.maxAttempts) {
            await this.settle(task, queue.bury({ ...task, attempts: task.attempts + 1 }, reason), 'bury');
            return 'buried';
        }
        const delay = controller.retryDelay(task.attempts, this.retryBaseDelayMs, this.retryMaxDelayMs);
        await this.settle(task, queue.requeue(task, delay), 'requeue');
        return 'requeued';
    }

    /**
     * A failed finalization leaves the lease to expire, which hands the task
     * back to the queue.
     */
    private async settle(task: Task, pending: Promise<Outcome<unknown>>, action: string): Promise<void> {
        const result = await pending;
        if (!result.ok) log.warning(`[Worker] ${action} of ${task.source}/${task.key} failed: ${result.error.message}`);
    }

    // ─── Resources ────────────────────────────────────────────────────────────

    private async borrow(source: string): Promise<{ ok: true; value: Leases } | { ok: false; message: string }> {
        const { pools, profiles } = this.deps;
        const taken: PoolLease[] = [];
        const giveBack = async (message: string): Promise<{ ok: false; message: string }> => {
            for (const lease of taken) await lease.pool.abandon(lease);
            return { ok: false, message };
        };

        const egress = await pools.egress.acquire(source);
        if (!egress.ok) return giveBack(egress.message);
        taken.push(egress.lease);

        const identity = await pools.identity.acquire(source);
        if (!identity.ok) return giveBack(identity.message);
        taken.push(identity.lease);

        let token: PoolLease | null = null;
        if (profiles.get(source).identity.tokenCount > 0) {
            const acquired = await pools.token.acquire(source);
            if (!acquired.ok) return giveBack(acquired.message);
            token = acquired.lease;
        }
        return { ok: true, value: { egress: egress.lease, identity: identity.lease, token } };
    }

    /** `success` null returns the leases unscored. */
    private async returnLeases(leases: Leases, success: boolean | null): Promise<void> {
        for (const lease of [leases.egress, leases.identity, leases.token]) {
            if (!lease) continue;
            if (success === null) await lease.pool.abandon(lease);
            else await lease.pool.release(lease, success);
        }
    }
}
