/**
 * src/utils/monitor.ts
 *
 * Crawl counters, worker heartbeats and failure-rate alerts.
 *
 * Shared counters live in one hash per calendar day, `stats:YYYYMMDD`, so any
 * operator can read a day's totals with a single HGETALL:
 *
 *   requests | successes | failures | blocked
 *   items:{kind} | rejected:{kind} | duplicates:{kind}
 *   source:{id}:{requests|successes|failures|blocked}
 *
 * The hash expires STATS_RETENTION_DAYS after its last write. Alongside it the
 * Monitor keeps an in-process snapshot (rolling RPM, average response time)
 * for the periodic summary line.
 *
 * Counter writes are best-effort: a store error is logged and the request
 * carries on, so the broker being slow never stalls a fetch.
 */

import * as os from 'os';
import { log } from '@crawlee/core';
import { storeKey, type SharedStore } from '../broker/sharedStore.js';
import { RECORD_KINDS, type ProcessRole, type RecordKind, type RequestVerdict } from '../sources/types.js';
import { dayKey } from './calendar.js';
import { describeError } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface DailyStats {
    day: string;
    requests: number;
    successes: number;
    failures: number;
    blocked: number;
    items: Record<RecordKind, number>;
    rejected: Record<RecordKind, number>;
    duplicates: Record<RecordKind, number>;
    /** source id → field → count */
    sources: Record<string, Record<string, number>>;
}

export interface MonitorSnapshot {
    snapshotAt: string;
    uptimeSeconds: number;
    requests: number;
    successes: number;
    failures: number;
    blocked: number;
    successRatePct: number;
    itemsCommitted: number;
    itemsRejected: number;
    duplicates: number;
    requestsPerMinute: number;
    avgResponseTimeMs: number;
}

export interface WorkerInfo {
    workerId: string;
    role: ProcessRole;
    host?: string;
    pid?: number;
    startedAt: number;
    processed: number;
}

export interface CrawlAlert {
    kind: 'failure_rate';
    day: string;
    at: string;
    rate: number;
    threshold: number;
    requests: number;
}

export interface MonitorOptions {
    namespace?: string;
    retentionDays?: number;
    alertFailureRate?: number;
    /** Requests a day must see before its failure rate can alert. */
    alertMinRequests?: number;
    workerTimeoutMs?: number;
    now?: () => number;
}

const VERDICT_FIELD: Record<RequestVerdict, 'successes' | 'failures' | 'blocked'> = {
    success: 'successes',
    failure: 'failures',
    blocked: 'blocked',
};

const ALERT_LIST_CAP = 100;
const ALERT_COOLDOWN_MS = 60 * 60_000;
const RT_RING_SIZE = 100;

function emptyByKind(): Record<RecordKind, number> {
    return { product: 0, comment: 0, shop: 0 };
}

// ─── Monitor ──────────────────────────────────────────────────────────────────

export class Monitor {
    private readonly namespace: string;
    private readonly retentionSeconds: number;
    private readonly alertFailureRate: number;
    private readonly alertMinRequests: number;
    private readonly workerTimeoutMs: number;
    private readonly now: () => number;
    private readonly startedAt: number;

    private readonly expiring = new Set<string>();
    private readonly lastAlertAt = new Map<string, number>();
    private readonly local = {
        requests: 0,
        successes: 0,
        failures: 0,
        blocked: 0,
        itemsCommitted: 0,
        itemsRejected: 0,
        duplicates: 0,
    };
    private readonly rpmWindow: number[] = [];
    private readonly responseTimes: number[] = [];

    constructor(
        private readonly store: SharedStore,
        options: MonitorOptions = {},
    ) {
        this.namespace = options.namespace ?? 'crawl';
        this.retentionSeconds = (options.retentionDays ?? 30) * 86_400;
        this.alertFailureRate = options.alertFailureRate ?? 0.5;
        this.alertMinRequests = options.alertMinRequests ?? 20;
        this.workerTimeoutMs = options.workerTimeoutMs ?? 120_000;
        this.now = options.now ?? Date.now;
        this.startedAt = this.now();
    }

    private statsKey(day: string): string {
        return storeKey(this.namespace, 'stats', day);
    }

    private today(): string {
        return dayKey(new Date(this.now()));
    }

    // ─── Counters ─────────────────────────────────────────────────────────────

    private async bump(fields: Record<string, number>): Promise<void> {
        const day = this.today();
        const key = this.statsKey(day);
        try {
            for (const [field, by] of Object.entries(fields)) {
                if (by !== 0) await this.store.hashIncrement(key, field, by);
            }
            if (!this.expiring.has(day)) {
                await this.store.expire(key, this.retentionSeconds);
                this.expiring.add(day);
            }
        } catch (err) {
            log.warning(`[Monitor] Counter update failed: ${describeError(err)}`);
        }
    }

    async recordRequest(source: string, verdict: RequestVerdict, elapsedMs?: number): Promise<void> {
        const field = VERDICT_FIELD[verdict];
        this.local.requests++;
        this.local[field]++;

        const now = this.now();
        this.rpmWindow.push(now);
        while (this.rpmWindow.length > 0 && (this.rpmWindow[0] ?? now) < now - 60_000) this.rpmWindow.shift();
        if (elapsedMs !== undefined && Number.isFinite(elapsedMs) && elapsedMs >= 0) {
            if (this.responseTimes.length >= RT_RING_SIZE) this.responseTimes.shift();
            this.responseTimes.push(elapsedMs);
        }

        await this.bump({
            requests: 1,
            [field]: 1,
            [`source:${source}:requests`]: 1,
            [`source:${source}:${field}`]: 1,
        });
        await this.checkFailureRate();
    }

    async recordItems(kind: RecordKind, count: number): Promise<void> {
        this.local.itemsCommitted += count;
        await this.bump({ [`items:${kind}`]: count });
    }

    async recordRejected(kind: RecordKind, count: number): Promise<void> {
        this.local.itemsRejected += count;
        await this.bump({ [`rejected:${kind}`]: count });
    }

    async recordDuplicates(kind: RecordKind, count: number): Promise<void> {
        this.local.duplicates += count;
        await this.bump({ [`duplicates:${kind}`]: count });
    }

    /** The shared totals of one calendar day (today by default). */
    async readDay(day: string = this.today()): Promise<DailyStats> {
        const raw = await this.store.hashGetAll(this.statsKey(day));
        const stats: DailyStats = {
            day,
            requests: 0,
            successes: 0,
            failures: 0,
            blocked: 0,
            items: emptyByKind(),
            rejected: emptyByKind(),
            duplicates: emptyByKind(),
            sources: {},
        };
        for (const [field, text] of Object.entries(raw)) {
            const value = Number(text);
            if (!Number.isFinite(value)) continue;
            const [head, second, third] = field.split(':');
            if (head === 'requests' || head === 'successes' || head === 'failures' || head === 'blocked') {
                stats[head] = value;
            } else if (head === 'items' || head === 'rejected' || head === 'duplicates') {
                const kind = RECORD_KINDS.find((k) => k === second);
                if (kind) stats[head][kind] = value;
            } else if (head === 'source' && second && third) {
                stats.sources[second] = { ...(stats.sources[second] ?? {}), [third]: value };
            }
        }
        return stats;
    }

    // ─── Alerts ───────────────────────────────────────────────────────────────

    private async checkFailureRate(): Promise<void> {
        const now = this.now();
        if (now - (this.lastAlertAt.get('failure_rate') ?? -Infinity) < ALERT_COOLDOWN_MS) return;
        try {
            const day = await this.readDay();
            if (day.requests < this.alertMinRequests) return;
            const rate = (day.failures + day.blocked) / day.requests;
            if (rate <= this.alertFailureRate) return;

            const alert: CrawlAlert = {
                kind: 'failure_rate',
                day: day.day,
                at: new Date(now).toISOString(),
                rate: Math.round(rate * 1000) / 1000,
                threshold: this.alertFailureRate,
                requests: day.requests,
            };
            const list = storeKey(this.namespace, 'alerts');
            await this.store.push(list, 'head', JSON.stringify(alert));
            await this.store.listTrim(list, 0, ALERT_LIST_CAP - 1);
            this.lastAlertAt.set('failure_rate', now);
            log.warning(
                `[Monitor] ALERT failure rate ${(alert.rate * 100).toFixed(1)}% over ${day.requests} requests ` +
                    `exceeds ${(this.alertFailureRate * 100).toFixed(0)}%`,
            );
        } catch (err) {
            log.warning(`[Monitor] Alert check failed: ${describeError(err)}`);
        }
    }

    async recentAlerts(limit = 10): Promise<CrawlAlert[]> {
        const raw = await this.store.listRange(storeKey(this.namespace, 'alerts'), 0, limit - 1);
        const alerts: CrawlAlert[] = [];
        for (const text of raw) {
            const parsed: unknown = JSON.parse(text);
            if (isCrawlAlert(parsed)) alerts.push(parsed);
        }
        return alerts;
    }

    // ─── Heartbeats ───────────────────────────────────────────────────────────

    async heartbeat(worker: WorkerInfo): Promise<void> {
        const key = storeKey(this.namespace, 'worker', worker.workerId);
        try {
            await this.store.addToSet(storeKey(this.namespace, 'active_workers'), worker.workerId);
            await this.store.hashSet(key, {
                role: worker.role,
                host: worker.host ?? os.hostname(),
                pid: worker.pid ?? process.pid,
                started: worker.startedAt,
                lastHeartbeat: this.now(),
                processed: worker.processed,
            });
            await this.store.expire(key, Math.ceil((this.workerTimeoutMs * 2) / 1000));
        } catch (err) {
            log.warning(`[Monitor] Heartbeat failed: ${describeError(err)}`);
        }
    }

    /** Drops workers whose last heartbeat is older than the timeout; returns their ids. */
    async pruneWorkers(): Promise<string[]> {
        const active = storeKey(this.namespace, 'active_workers');
        const pruned: string[] = [];
        for (const workerId of await this.store.setMembers(active)) {
            const key = storeKey(this.namespace, 'worker', workerId);
            const last = Number((await this.store.hashGet(key, 'lastHeartbeat')) ?? 0);
            if (this.now() - last <= this.workerTimeoutMs) continue;
            await this.store.removeFromSet(active, workerId);
            await this.store.deleteKey(key);
            pruned.push(workerId);
        }
        if (pruned.length > 0) log.info(`[Monitor] Pruned silent workers: ${pruned.join(', ')}`);
        return pruned;
    }

    async activeWorkers(): Promise<string[]> {
        return (await this.store.setMembers(storeKey(this.namespace, 'active_workers'))).sort();
    }

    async unregister(workerId: string): Promise<void> {
        await this.store.removeFromSet(storeKey(this.namespace, 'active_workers'), workerId);
        await this.store.deleteKey(storeKey(this.namespace, 'worker', workerId));
    }

    // ─── Local snapshot ───────────────────────────────────────────────────────

    snapshot(): MonitorSnapshot {
        const now = this.now();
        const decided = this.local.requests;
        const avg =
            this.responseTimes.length > 0
                ? Math.round(this.responseTimes.reduce((a, b) => a + b, 0) / this.responseTimes.length)
                : 0;
        return {
            snapshotAt: new Date(now).toISOString(),
            uptimeSeconds: Math.round((now - this.startedAt) / 1000),
            ...this.local,
            successRatePct: decided > 0 ? Math.round((this.local.successes / decided) * 100) : 100,
            requestsPerMinute: this.rpmWindow.filter((t) => t >= now - 60_000).length,
            avgResponseTimeMs: avg,
        };
    }

    logSummary(): void {
        const s = this.snapshot();
        log.info(
            `[Monitor] ✓${s.successes} ✗${s.failures} ⛔${s.blocked} (${s.successRatePct}% ok) | ` +
                `items:${s.itemsCommitted} rejected:${s.itemsRejected} dup:${s.duplicates} | ` +
                `rpm:${s.requestsPerMinute} avgRt:${s.avgResponseTimeMs}ms | up:${s.uptimeSeconds}s`,
        );
    }
}

function isCrawlAlert(value: unknown): value is CrawlAlert {
    return (
        typeof value === 'object' &&
        value !== null &&
        'kind' in value &&
        value.kind === 'failure_rate' &&
        'rate' in value &&
        typeof value.rate === 'number'
    );
}
