/**
 * src/pipeline/sinks/memoryRowStore.ts
 *
 * In-process row-store for dry runs and tests. Same key constraint, policy
 * handling and write order as the PostgreSQL sink, including the comment →
 * product reference check.
 */

import type { RecordKind } from '../../sources/types.js';
import type { CrawlRecord } from '../normalize.js';
import { DEFAULT_DEDUP_POLICIES, type DedupPolicy } from '../dedup.js';
import type { RecordFailure, RowStore, SinkBatch, SinkWriteResult } from './types.js';

const WRITE_ORDER: RecordKind[] = ['product', 'shop', 'comment'];

export class MemoryRowStore implements RowStore {
    readonly name = 'memory';
    readonly primary = true;
    private readonly tables: Record<RecordKind, Map<string, CrawlRecord>> = {
        product: new Map(),
        comment: new Map(),
        shop: new Map(),
    };

    constructor(readonly policies: Record<RecordKind, DedupPolicy> = DEFAULT_DEDUP_POLICIES) {}

    async write(batch: SinkBatch): Promise<SinkWriteResult> {
        const failed: RecordFailure[] = [];
        let written = 0;
        for (const kind of WRITE_ORDER) {
            for (const { record } of batch.entries.filter((e) => e.record.kind === kind)) {
                if (record.kind === 'comment' && !this.tables.product.has(record.row.product_id)) {
                    failed.push({
                        kind: record.kind,
                        key: record.key,
                        error: `product ${record.row.product_id} not found`,
                    });
                    continue;
                }
                const table = this.tables[record.kind];
                // A drop-policy conflict leaves the stored row as it is.
                if (!table.has(record.key) || this.policies[record.kind] === 'upsert') table.set(record.key, record);
                written++;
            }
        }
        return { written, failed };
    }

    async count(kind: RecordKind): Promise<number> {
        return this.tables[kind].size;
    }

    rows(kind: RecordKind): CrawlRecord[] {
        return [...this.tables[kind].values()];
    }

    async close(): Promise<void> {
        // nothing to release
    }
}
