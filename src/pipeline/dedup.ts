/**
 * src/pipeline/dedup.ts
 *
 * Persistent seen-key sets per record kind, shared by every worker.
 *
 * check() is a single insert-if-absent on `seen:{kind}`, so two workers
 * racing on the same key get exactly one 'new'. What a repeat means depends
 * on the kind's policy:
 *
 *   drop    first write wins, the repeat is discarded (products, shops)
 *   upsert  the repeat goes through as an update (comment vote counters)
 *
 * A key whose record never reached the primary sink is released again with
 * forget(), so a redelivered task can retry it. The row-store's unique
 * constraint stays the final backstop for whatever slips through.
 */

import { log } from '@crawlee/core';
import { storeKey, type SharedStore } from '../broker/sharedStore.js';
import type { RecordKind } from '../sources/types.js';
import type { CrawlRecord } from './normalize.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type DedupPolicy = 'drop' | 'upsert';
export type DedupDecision = 'new' | 'duplicate' | 'update';

export const DEFAULT_DEDUP_POLICIES: Record<RecordKind, DedupPolicy> = {
    product: 'drop',
    comment: 'upsert',
    shop: 'drop',
};

interface DedupStats {
    checked: number;
    fresh: number;
    duplicates: number;
    updates: number;
}

// ─── Deduplicator ─────────────────────────────────────────────────────────────

export class RecordDeduplicator {
    private readonly namespace: string;
    private readonly logSkipped: boolean;
    private readonly stats: DedupStats = { checked: 0, fresh: 0, duplicates: 0, updates: 0 };

    constructor(
        private readonly store: SharedStore,
        readonly policies: Record<RecordKind, DedupPolicy> = DEFAULT_DEDUP_POLICIES,
        options: { namespace?: string; logSkipped?: boolean } = {},
    ) {
        this.namespace = options.namespace ?? 'crawl';
        this.logSkipped = options.logSkipped ?? true;
    }

    private seenKey(kind: RecordKind): string {
        return storeKey(this.namespace, 'seen', kind);
    }

    async check(record: CrawlRecord): Promise<DedupDecision> {
        this.stats.checked++;
        const fresh = await this.store.addToSet(this.seenKey(record.kind), record.key);
        if (fresh) {
            this.stats.fresh++;
            return 'new';
        }
        if (this.policies[record.kind] === 'upsert') {
            this.stats.updates++;
            return 'update';
        }
        this.stats.duplicates++;
        if (this.logSkipped) log.debug(`[Dedup] Skipped repeat ${record.kind} ${record.key}`);
        return 'duplicate';
    }

    /** Whether a key is known, committed or pending. */
    async isKnown(kind: RecordKind, key: string): Promise<boolean> {
        return this.store.isSetMember(this.seenKey(kind), key);
    }

    async forget(kind: RecordKind, key: string): Promise<void> {
        await this.store.removeFromSet(this.seenKey(kind), key);
    }

    async storeSize(kind: RecordKind): Promise<number> {
        return this.store.setSize(this.seenKey(kind));
    }

    getStats(): Readonly<DedupStats> {
        return { ...this.stats };
    }
}
