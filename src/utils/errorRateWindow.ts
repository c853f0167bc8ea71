/**
 * src/utils/errorRateWindow.ts
 *
 * Rolling outcome counters per (source, role), kept in the shared store so
 * every worker process of a source reads the same rate.
 *
 * The trailing window is split into fixed-width buckets; each bucket is a
 * hash {total, failures, blocked} incremented atomically and left to expire.
 * Reading sums the buckets that overlap the window.
 */

import { storeKey, type SharedStore } from '../broker/sharedStore.js';
import type { ProcessRole, RequestVerdict } from '../sources/types.js';

export interface WindowCounts {
    total: number;
    failures: number;
    blocked: number;
}

export interface ErrorRateWindowOptions {
    namespace?: string;
    windowMs?: number;
    bucketMs?: number;
    now?: () => number;
}

/** min(1, (failures + blockedWeight · blocked) / total); 0 for an empty window. */
export function weightedErrorRate(counts: WindowCounts, blockedWeight: number): number {
    if (counts.total <= 0) return 0;
    return Math.min(1, (counts.failures + blockedWeight * counts.blocked) / counts.total);
}

export class ErrorRateWindow {
    private readonly namespace: string;
    readonly windowMs: number;
    private readonly bucketMs: number;
    private readonly now: () => number;

    constructor(private readonly store: SharedStore, options: ErrorRateWindowOptions = {}) {
        this.namespace = options.namespace ?? 'crawl';
        this.windowMs = options.windowMs ?? 60_000;
        this.bucketMs = Math.min(options.bucketMs ?? 10_000, this.windowMs);
        this.now = options.now ?? Date.now;
    }

    private bucketKey(source: string, role: ProcessRole, bucket: number): string {
        return storeKey(this.namespace, 'rate', source, role, bucket);
    }

    async record(source: string, role: ProcessRole, verdict: RequestVerdict): Promise<void> {
        const key = this.bucketKey(source, role, Math.floor(this.now() / this.bucketMs));
        await this.store.hashIncrement(key, 'total', 1);
        if (verdict === 'failure') await this.store.hashIncrement(key, 'failures', 1);
        if (verdict === 'blocked') await this.store.hashIncrement(key, 'blocked', 1);
        await this.store.expire(key, (this.windowMs + this.bucketMs) / 1000);
    }

    async read(source: string, role: ProcessRole): Promise<WindowCounts> {
        const current = Math.floor(this.now() / this.bucketMs);
        const span = Math.ceil(this.windowMs / this.bucketMs);
        const counts: WindowCounts = { total: 0, failures: 0, blocked: 0 };
        for (let bucket = current - span + 1; bucket <= current; bucket++) {
            const fields = await this.store.hashGetAll(this.bucketKey(source, role, bucket));
            counts.total += Number(fields.total ?? 0);
            counts.failures += Number(fields.failures ?? 0);
            counts.blocked += Number(fields.blocked ?? 0);
        }
        return counts;
    }
}
