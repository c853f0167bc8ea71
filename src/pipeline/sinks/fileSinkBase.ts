/**
 * src/pipeline/sinks/fileSinkBase.ts
 *
 * Shared plumbing for the day-partitioned file sinks: one file per record
 * kind per day (`{kind}s_YYYYMMDD.{ext}`), writes to the same file chained so
 * they never interleave. Assumes a single writing process per data dir.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from '@crawlee/core';
import { RECORD_KINDS, type RecordKind } from '../../sources/types.js';
import { RECORD_COLUMNS, type CrawlRecord } from '../normalize.js';
import { describeError } from '../../utils/errors.js';
import type { RecordFailure, RecordSink, SinkBatch, SinkWriteResult } from './types.js';

export abstract class DayFileSink implements RecordSink {
    abstract readonly name: string;
    readonly primary = false;
    private readonly chains = new Map<string, Promise<void>>();

    constructor(
        readonly dataDir: string,
        private readonly extension: string,
    ) {}

    filePath(kind: RecordKind, day: string): string {
        return path.join(this.dataDir, `${kind}s_${day}.${this.extension}`);
    }

    /** Appends rows to an existing file, or creates it. */
    protected abstract appendRows(file: string, columns: string[], rows: Array<Record<string, unknown>>): Promise<void>;

    async write(batch: SinkBatch): Promise<SinkWriteResult> {
        const failed: RecordFailure[] = [];
        let written = 0;
        await fs.promises.mkdir(this.dataDir, { recursive: true });

        for (const kind of RECORD_KINDS) {
            const records = batch.entries.map((e) => e.record).filter((r) => r.kind === kind);
            if (records.length === 0) continue;
            const file = this.filePath(kind, batch.day);
            try {
                await this.serialized(file, () => this.appendRows(file, RECORD_COLUMNS[kind], records.map(toPlainRow)));
                written += records.length;
            } catch (err) {
                log.warning(`[${this.name}] Write to ${path.basename(file)} failed: ${describeError(err)}`);
                for (const r of records) failed.push({ kind, key: r.key, error: describeError(err) });
            }
        }
        return { written, failed };
    }

    private serialized(file: string, task: () => Promise<void>): Promise<void> {
        const previous = this.chains.get(file) ?? Promise.resolve();
        const next = previous.catch(() => undefined).then(task);
        this.chains.set(file, next);
        return next;
    }

    async close(): Promise<void> {
        await Promise.allSettled([...this.chains.values()]);
        this.chains.clear();
    }
}

function toPlainRow(record: CrawlRecord): Record<string, unknown> {
    return { ...record.row };
}

export async function fileExists(file: string): Promise<boolean> {
    try {
        await fs.promises.access(file);
        return true;
    } catch {
        return false;
    }
}
