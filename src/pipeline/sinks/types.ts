/**
 * src/pipeline/sinks/types.ts
 *
 * Contract shared by the row-store and the two file sinks.
 */

import type { RecordKind } from '../../sources/types.js';
import type { CrawlRecord } from '../normalize.js';
import type { DedupPolicy } from '../dedup.js';

export interface SinkEntry {
    record: CrawlRecord;
    /** 'update' entries take the upsert path where the sink has one. */
    decision: 'new' | 'update';
}

export interface SinkBatch {
    /** YYYYMMDD partition. */
    day: string;
    entries: SinkEntry[];
}

export interface RecordFailure {
    kind: RecordKind;
    key: string;
    error: string;
}

export interface SinkWriteResult {
    written: number;
    failed: RecordFailure[];
}

export interface RecordSink {
    readonly name: string;
    /**
     * The primary sink is the source of truth: dedup keys of records it did
     * not persist are released for a retry.
     */
    readonly primary: boolean;
    write(batch: SinkBatch): Promise<SinkWriteResult>;
    close(): Promise<void>;
}

export interface RowStore extends RecordSink {
    readonly policies: Record<RecordKind, DedupPolicy>;
    count(kind: RecordKind): Promise<number>;
}
