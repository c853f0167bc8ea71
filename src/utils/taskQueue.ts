/**
 * src/utils/taskQueue.ts
 *
 * Shared per-source task backlog on top of the SharedStore.
 *
 * KEYS (per source, under the namespace)
 * ──────────────────────────────────────
 *   queue:{source}:pending   list of task keys, popped from the head
 *   queue:{source}:tasks     hash key → task JSON
 *   queue:{source}:seen      every key ever enqueued (dedup identity)
 *   queue:{source}:leases    schedule of popped keys → visibility deadline
 *   queue:{source}:delayed   schedule of requeued keys → due time
 *   queue:{source}:dead      list of tasks that ran out of attempts
 *
 * A pop moves the key from pending into leases in one atomic step, so two
 * workers never hold the same key. A lease not acked before its deadline goes
 * back to the head of pending on the next dequeue (at-least-once).
 *
 * Seen keys are never forgotten by the crawl path once a task is queued:
 * re-deriving a completed key is dropped silently. An enqueue that fails
 * after claiming its key gives the claim back, so a retry can queue it.
 */

import { log } from '@crawlee/core';
import { z } from 'zod';
import { storeKey, type SharedStore } from '../broker/sharedStore.js';
import { describeError, ok, transientFailure, type Outcome } from './errors.js';
import { TASK_KINDS, type NewTask, type Task } from '../sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TaskQueueOptions {
    namespace?: string;
    /** Must exceed the expected fetch + extract latency. */
    visibilityTimeoutMs: number;
    /** Upper bound on keys moved back per reclaim pass. */
    reclaimBatch?: number;
    now?: () => number;
}

export interface QueueStats {
    source: string;
    pending: number;
    inFlight: number;
    delayed: number;
    seen: number;
    dead: number;
}

const TaskSchema = z.object({
    source: z.string().min(1),
    key: z.string().min(1),
    kind: z.enum(TASK_KINDS),
    payload: z.object({
        keyword: z.string().optional(),
        page: z.number().int().optional(),
        productId: z.string().optional(),
        shopId: z.string().optional(),
        parentKey: z.string().optional(),
    }),
    priority: z.number(),
    enqueuedAt: z.number(),
    attempts: z.number().int().nonnegative(),
});

const MAX_STALE_POPS = 10;

// ─── Queue ────────────────────────────────────────────────────────────────────

export class TaskQueue {
    private readonly namespace: string;
    private readonly visibilityTimeoutMs: number;
    private readonly reclaimBatch: number;
    private readonly now: () => number;

    constructor(private readonly store: SharedStore, options: TaskQueueOptions) {
        this.namespace = options.namespace ?? 'crawl';
        this.visibilityTimeoutMs = options.visibilityTimeoutMs;
        this.reclaimBatch = options.reclaimBatch ?? 100;
        this.now = options.now ?? Date.now;
    }

    private key(source: string, part: string): string {
        return storeKey(this.namespace, 'queue', source, part);
    }

    /** Resolves true when the task was inserted, false when its key was already known. */
    async enqueue(input: NewTask): Promise<Outcome<boolean>> {
        let claimed = false;
        try {
            const fresh = await this.store.addToSet(this.key(input.source, 'seen'), input.key);
            claimed = fresh;
            if (!fresh) {
                log.debug(`[TaskQueue] Skipped known key ${input.source}/${input.key}`);
                return ok(false);
            }
            const task: Task = {
                source: input.source,
                key: input.key,
                kind: input.kind,
                payload: input.payload,
                priority: input.priority ?? 0,
                enqueuedAt: this.now(),
                attempts: 0,
            };
            // Payload first: a consumer must never pop a key without one.
            await this.store.hashSet(this.key(input.source, 'tasks'), { [task.key]: JSON.stringify(task) });
            await this.store.push(this.key(input.source, 'pending'), task.priority > 0 ? 'head' : 'tail', task.key);
            return ok(true);
        } catch (err) {
            if (claimed) await this.unclaim(input);
            return transientFailure(`enqueue ${input.source}/${input.key}`, err);
        }
    }

    private async unclaim(input: NewTask): Promise<void> {
        try {
            await this.store.removeFromSet(this.key(input.source, 'seen'), input.key);
        } catch (err) {
            log.error(`[TaskQueue] ${input.source}/${input.key} stays marked seen without a task: ${describeError(err)}`);
        }
    }

    /** Returns expired leases and due retries to the pending list. */
    async reclaim(source: string): Promise<number> {
        const now = this.now();
        const pending = this.key(source, 'pending');
        const expired = await this.store.moveDue(this.key(source, 'leases'), pending, now, this.reclaimBatch, 'head');
        const due = await this.store.moveDue(this.key(source, 'delayed'), pending, now, this.reclaimBatch, 'tail');
        if (expired > 0) {
            log.info(`[TaskQueue] ${source}: ${expired} lease(s) timed out and were returned to the queue`);
        }
        return expired + due;
    }

    async dequeue(source: string): Promise<Outcome<Task | null>> {
        try {
            await this.reclaim(source);
            for (let attempt = 0; attempt < MAX_STALE_POPS; attempt++) {
                const deadline = this.now() + this.visibilityTimeoutMs;
                const key = await this.store.popLease(this.key(source, 'pending'), this.key(source, 'leases'), deadline);
                if (key === null) return ok(null);

                const task = await this.load(source, key);
                if (task) return ok(task);

                // Acked while it sat in pending after a lease timeout.
                await this.store.scheduleRemove(this.key(source, 'leases'), key);
            }
            return ok(null);
        } catch (err) {
            return transientFailure(`dequeue ${source}`, err);
        }
    }

    /** Finalizes a task. Resolves false when the lease had already expired. */
    async ack(task: Task): Promise<Outcome<boolean>> {
        try {
            const held = await this.store.scheduleRemove(this.key(task.source, 'leases'), task.key);
            await this.store.hashDelete(this.key(task.source, 'tasks'), task.key);
            if (!held) {
                log.debug(`[TaskQueue] Ack for ${task.source}/${task.key} after its lease expired`);
            }
            return ok(held);
        } catch (err) {
            return transientFailure(`ack ${task.source}/${task.key}`, err);
        }
    }

    /** `countAttempt` is false when the task itself did not fail, e.g. an empty pool. */
    async requeue(task: Task, delayMs: number, countAttempt = true): Promise<Outcome<void>> {
        try {
            const next: Task = { ...task, attempts: countAttempt ? task.attempts + 1 : task.attempts };
            await this.store.hashSet(this.key(task.source, 'tasks'), { [task.key]: JSON.stringify(next) });
            await this.store.scheduleRemove(this.key(task.source, 'leases'), task.key);
            if (delayMs <= 0) {
                await this.store.push(this.key(task.source, 'pending'), 'tail', task.key);
            } else {
                await this.store.scheduleAdd(this.key(task.source, 'delayed'), task.key, this.now() + delayMs);
            }
            return ok(undefined);
        } catch (err) {
            return transientFailure(`requeue ${task.source}/${task.key}`, err);
        }
    }

    /** Parks a task that ran out of attempts on the dead-letter list. */
    async bury(task: Task, reason: string): Promise<Outcome<void>> {
        try {
            const entry = JSON.stringify({ ...task, reason, buriedAt: this.now() });
            await this.store.push(this.key(task.source, 'dead'), 'tail', entry);
            await this.store.scheduleRemove(this.key(task.source, 'leases'), task.key);
            await this.store.hashDelete(this.key(task.source, 'tasks'), task.key);
            log.warning(`[TaskQueue] ${task.source}/${task.key} moved to dead letters after ${task.attempts} attempt(s): ${reason}`);
            return ok(undefined);
        } catch (err) {
            return transientFailure(`bury ${task.source}/${task.key}`, err);
        }
    }

    async stats(source: string): Promise<Outcome<QueueStats>> {
        try {
            return ok({
                source,
                pending: await this.store.listLength(this.key(source, 'pending')),
                inFlight: await this.store.scheduleSize(this.key(source, 'leases')),
                delayed: await this.store.scheduleSize(this.key(source, 'delayed')),
                seen: await this.store.setSize(this.key(source, 'seen')),
                dead: await this.store.listLength(this.key(source, 'dead')),
            });
        } catch (err) {
            return transientFailure(`stats ${source}`, err);
        }
    }

    private async load(source: string, key: string): Promise<Task | null> {
        const raw = await this.store.hashGet(this.key(source, 'tasks'), key);
        if (raw === null) return null;
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            log.warning(`[TaskQueue] Dropping unreadable payload for ${source}/${key}`);
            return null;
        }
        const parsed = TaskSchema.safeParse(json);
        if (!parsed.success) {
            log.warning(`[TaskQueue] Dropping invalid payload for ${source}/${key}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
            return null;
        }
        return parsed.data;
    }
}
