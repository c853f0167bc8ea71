/**
 * src/pipeline/pipeline.ts
 *
 * Ingestion pipeline: normalize → dedup → buffer → batch commit.
 *
 * Records from one fetch are normalized against their zod schema (rejects are
 * counted, never thrown), checked against the shared seen-sets and buffered.
 * The buffer is committed when it reaches BATCH_SIZE or when the flush timer
 * finds it older than BATCH_FLUSH_INTERVAL_MS. A commit is attempted on every
 * sink and reported per sink:
 *
 *   primary (row-store)  records it did not persist release their dedup key,
 *                        so a redelivered task can retry them
 *   file sinks           failures are logged; the batch carries on
 *
 * After MAX_SINK_FAILURES consecutive whole-batch failures of the primary the
 * pipeline raises FatalError and the worker stops.
 *
 * Derived tasks (comment pages, shop pages) are enqueued before the records
 * are buffered. Each ingest may pass a commit callback; it runs once the
 * row-store has answered for every record of that ingest, with `true` only
 * when all of them were persisted. The worker acks its task from there.
 */

import { log } from '@crawlee/core';
import type { NewTask, RawRecord, RecordKind } from '../sources/types.js';
import { normalizeRecord, type CrawlRecord } from './normalize.js';
import type { RecordDeduplicator } from './dedup.js';
import type { RecordSink, RowStore, SinkBatch, SinkEntry, SinkWriteResult } from './sinks/types.js';
import type { Monitor } from '../utils/monitor.js';
import { dayKey } from '../utils/calendar.js';
import { FatalError, TransientError, describeError, type Outcome } from '../utils/errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Where derived tasks go; TaskQueue satisfies it. */
export interface TaskSink {
    enqueue(task: NewTask): Promise<Outcome<boolean>>;
}

/** Runs after the commit that covers one ingest's records. */
export type CommitCallback = (committed: boolean) => Promise<void>;

interface Waiting {
    entries: SinkEntry[];
    onCommit: CommitCallback;
}

export interface PipelineOptions {
    batchSize?: number;
    flushIntervalMs?: number;
    maxConsecutiveSinkFailures?: number;
    now?: () => number;
}

export interface IngestReport {
    accepted: number;
    rejected: number;
    duplicates: number;
    /** Comments whose product is neither stored nor pending. */
    orphaned: number;
    derivedEnqueued: number;
    derivedDuplicates: number;
}

export type SinkReport = { ok: true; result: SinkWriteResult } | { ok: false; error: string };

export interface FlushReport {
    day: string;
    attempted: number;
    committed: number;
    sinks: Record<string, SinkReport>;
}

// ─── Pipeline ─────────────────────────────────────────────────────────────────

export class IngestionPipeline {
    private readonly batchSize: number;
    private readonly flushIntervalMs: number;
    private readonly maxConsecutiveSinkFailures: number;
    private readonly now: () => number;

    private buffer: SinkEntry[] = [];
    private waiting: Waiting[] = [];
    private bufferedSince: number | null = null;
    private flushChain: Promise<unknown> = Promise.resolve();
    private consecutivePrimaryFailures = 0;
    private timer: ReturnType<typeof setInterval> | null = null;
    private fatal: FatalError | null = null;

    constructor(
        private readonly primary: RowStore,
        private readonly secondary: RecordSink[],
        private readonly dedup: RecordDeduplicator,
        private readonly monitor: Monitor | null,
        private readonly tasks: TaskSink | null,
        options: PipelineOptions = {},
    ) {
        this.batchSize = options.batchSize ?? 50;
        this.flushIntervalMs = options.flushIntervalMs ?? 5_000;
        this.maxConsecutiveSinkFailures = options.maxConsecutiveSinkFailures ?? 3;
        this.now = options.now ?? Date.now;
    }

    get pending(): number {
        return this.buffer.length;
    }

    /** Starts the time-threshold flush. */
    start(): void {
        if (this.timer !== null) return;
        const tick = Math.max(100, Math.floor(this.flushIntervalMs / 2));
        this.timer = setInterval(() => {
            if (this.bufferedSince === null || this.now() - this.bufferedSince < this.flushIntervalMs) return;
            this.flush().catch((err: unknown) => {
                log.error(`[Pipeline] Timed flush failed: ${describeError(err)}`);
            });
        }, tick);
        this.timer.unref();
    }

    // ─── Ingest ───────────────────────────────────────────────────────────────

    /**
     * Throws TransientError when the shared store or the queue is unreachable
     * (the caller requeues the task) and FatalError once the row-store is
     * considered down. `onCommit` is not called when ingest throws.
     */
    async ingest(raws: RawRecord[], derived: NewTask[] = [], onCommit?: CommitCallback): Promise<IngestReport> {
        if (this.fatal) throw this.fatal;
        const report: IngestReport = {
            accepted: 0,
            rejected: 0,
            duplicates: 0,
            orphaned: 0,
            derivedEnqueued: 0,
            derivedDuplicates: 0,
        };
        const rejectedByKind = new Map<RecordKind, number>();
        const duplicatesByKind = new Map<RecordKind, number>();
        const crawlTime = new Date(this.now());
        const accepted: SinkEntry[] = [];

        try {
            for (const raw of raws) {
                const normalized = normalizeRecord(raw, crawlTime);
                if (!normalized.ok) {
                    report.rejected++;
                    rejectedByKind.set(normalized.kind, (rejectedByKind.get(normalized.kind) ?? 0) + 1);
                    log.debug(`[Pipeline] Rejected ${raw.kind} from ${raw.source}: ${normalized.errors.join('; ')}`);
                    continue;
                }
                const { record } = normalized;

                if (record.kind === 'comment' && !(await this.dedup.isKnown('product', record.row.product_id))) {
                    report.rejected++;
                    report.orphaned++;
                    rejectedByKind.set('comment', (rejectedByKind.get('comment') ?? 0) + 1);
                    log.debug(`[Pipeline] Comment ${record.key} references unknown product ${record.row.product_id}`);
                    continue;
                }

                const decision = await this.dedup.check(record);
                if (decision === 'duplicate') {
                    report.duplicates++;
                    duplicatesByKind.set(record.kind, (duplicatesByKind.get(record.kind) ?? 0) + 1);
                    continue;
                }
                accepted.push({ record, decision });
            }
        } catch (err) {
            await this.release(accepted);
            throw new TransientError(`dedup store: ${describeError(err)}`, { cause: err });
        } finally {
            for (const [kind, count] of rejectedByKind) await this.monitor?.recordRejected(kind, count);
            for (const [kind, count] of duplicatesByKind) await this.monitor?.recordDuplicates(kind, count);
        }

        for (const task of derived) {
            const outcome = await this.tasks?.enqueue(task);
            if (!outcome) continue;
            if (!outcome.ok) {
                await this.release(accepted);
                throw outcome.error;
            }
            if (outcome.value) report.derivedEnqueued++;
            else report.derivedDuplicates++;
        }

        report.accepted = accepted.length;
        if (accepted.length === 0) {
            await onCommit?.(true);
            return report;
        }
        this.buffer.push(...accepted);
        this.bufferedSince ??= this.now();
        if (onCommit) this.waiting.push({ entries: accepted, onCommit });

        if (this.buffer.length >= this.batchSize) await this.flush();
        return report;
    }

    // ─── Commit ───────────────────────────────────────────────────────────────

    /** Commits whatever is buffered. Flushes never overlap. */
    flush(): Promise<FlushReport | null> {
        const run = this.flushChain.then(() => this.commit());
        this.flushChain = run.catch(() => undefined);
        return run;
    }

    private async commit(): Promise<FlushReport | null> {
        if (this.fatal) throw this.fatal;
        if (this.buffer.length === 0) return null;

        const entries = this.buffer;
        const waiting = this.waiting;
        this.buffer = [];
        this.waiting = [];
        this.bufferedSince = null;
        const batch: SinkBatch = { day: dayKey(new Date(this.now())), entries };

        const sinks: RecordSink[] = [this.primary, ...this.secondary];
        const settled = await Promise.allSettled(sinks.map((sink) => sink.write(batch)));

        const report: FlushReport = { day: batch.day, attempted: entries.length, committed: 0, sinks: {} };
        settled.forEach((outcome, i) => {
            const name = sinks[i]?.name ?? `sink${i}`;
            report.sinks[name] =
                outcome.status === 'fulfilled'
                    ? { ok: true, result: outcome.value }
                    : { ok: false, error: describeError(outcome.reason) };
        });

        for (const sink of this.secondary) {
            const sinkReport = report.sinks[sink.name];
            if (sinkReport && !sinkReport.ok) {
                log.warning(`[Pipeline] ${sink.name} sink failed for ${entries.length} records: ${sinkReport.error}`);
            } else if (sinkReport?.ok && sinkReport.result.failed.length > 0) {
                log.warning(`[Pipeline] ${sink.name} sink failed ${sinkReport.result.failed.length} records`);
            }
        }

        const primaryReport = report.sinks[this.primary.name];
        const lost = primaryReport?.ok
            ? this.failedEntries(entries, primaryReport.result)
            : entries;
        await this.release(lost);
        const lostSet = new Set(lost);
        const settle = (): Promise<void> =>
            this.notify(waiting, (w) => primaryReport?.ok === true && !w.entries.some((e) => lostSet.has(e)));

        if (!primaryReport?.ok) {
            this.consecutivePrimaryFailures++;
            log.error(
                `[Pipeline] Row-store commit failed (${this.consecutivePrimaryFailures}/` +
                    `${this.maxConsecutiveSinkFailures}): ${primaryReport?.error ?? 'no result'}`,
            );
            if (this.consecutivePrimaryFailures >= this.maxConsecutiveSinkFailures) {
                this.fatal = new FatalError(
                    `Row-store failed ${this.consecutivePrimaryFailures} consecutive commits: ${primaryReport?.error ?? ''}`,
                );
                await settle();
                throw this.fatal;
            }
            await settle();
            return report;
        }

        this.consecutivePrimaryFailures = 0;
        const committed = entries.filter((e) => !lostSet.has(e));
        report.committed = committed.length;
        for (const [kind, count] of countByKind(committed.map((e) => e.record))) {
            await this.monitor?.recordItems(kind, count);
        }
        log.debug(`[Pipeline] Committed ${committed.length}/${entries.length} records for ${batch.day}`);
        await settle();
        return report;
    }

    private async notify(waiting: Waiting[], committed: (w: Waiting) => boolean): Promise<void> {
        for (const w of waiting) {
            try {
                await w.onCommit(committed(w));
            } catch (err) {
                log.warning(`[Pipeline] Commit callback failed: ${describeError(err)}`);
            }
        }
    }

    private failedEntries(entries: SinkEntry[], result: SinkWriteResult): SinkEntry[] {
        const failed = new Set(result.failed.map((f) => `${f.kind}:${f.key}`));
        return entries.filter((e) => failed.has(`${e.record.kind}:${e.record.key}`));
    }

    /** Releases the dedup keys of records first seen in this batch. */
    private async release(lost: SinkEntry[]): Promise<void> {
        for (const { record, decision } of lost) {
            if (decision !== 'new') continue;
            try {
                await this.dedup.forget(record.kind, record.key);
            } catch (err) {
                log.warning(`[Pipeline] Could not release ${record.kind} ${record.key}: ${describeError(err)}`);
            }
        }
    }

    // ─── Shutdown ─────────────────────────────────────────────────────────────

    async close(): Promise<void> {
        if (this.timer !== null) {
            clearInterval(this.timer);
            this.timer = null;
        }
        try {
            if (!this.fatal) await this.flush();
        } finally {
            const closed = await Promise.allSettled([this.primary, ...this.secondary].map((s) => s.close()));
            closed.forEach((outcome) => {
                if (outcome.status === 'rejected') log.warning(`[Pipeline] Sink close failed: ${describeError(outcome.reason)}`);
            });
        }
    }
}

function countByKind(records: CrawlRecord[]): Map<RecordKind, number> {
    const counts = new Map<RecordKind, number>();
    for (const r of records) counts.set(r.kind, (counts.get(r.kind) ?? 0) + 1);
    return counts;
}
