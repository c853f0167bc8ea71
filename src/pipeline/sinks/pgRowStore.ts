/**
 * src/pipeline/sinks/pgRowStore.ts
 *
 * PostgreSQL row-store, the primary sink.
 *
 * One transaction per batch, one SAVEPOINT per record: a row that violates a
 * constraint is rolled back on its own and reported, the rest of the batch
 * commits. Products and shops go in before comments so a comment's product
 * row exists by the time its foreign key is checked.
 *
 *   drop    INSERT … ON CONFLICT (key) DO NOTHING
 *   upsert  INSERT … ON CONFLICT (key) DO UPDATE SET …, update_time = NOW()
 */

import { log } from '@crawlee/core';
import type { RecordKind } from '../../sources/types.js';
import { RECORD_COLUMNS, type CrawlRecord } from '../normalize.js';
import { DEFAULT_DEDUP_POLICIES, type DedupPolicy } from '../dedup.js';
import { TABLE_FOR_KIND, verifySchema } from '../../db/migrate.js';
import { describeError } from '../../utils/errors.js';
import type { RecordFailure, RowStore, SinkBatch, SinkEntry, SinkWriteResult } from './types.js';

// ─── Driver surface ─────────────────────────────────────────────────────────

/** The part of pg's PoolClient the sink uses. */
export interface SqlClient {
    query(sql: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>>; rowCount: number | null }>;
    release(): void;
}

/** The part of pg's Pool the sink uses. */
export interface SqlPool {
    query(sql: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>>; rowCount: number | null }>;
    connect(): Promise<SqlClient>;
    end(): Promise<void>;
}

// ─── SQL ────────────────────────────────────────────────────────────────────

const KEY_COLUMN: Record<RecordKind, string> = {
    product: 'product_id',
    comment: 'comment_id',
    shop: 'shop_id',
};

/** Insert order inside a batch. */
const WRITE_ORDER: RecordKind[] = ['product', 'shop', 'comment'];

export function buildInsertSql(kind: RecordKind, policy: DedupPolicy): string {
    const columns = RECORD_COLUMNS[kind];
    const key = KEY_COLUMN[kind];
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');
    const head = `INSERT INTO ${TABLE_FOR_KIND[kind]} (${columns.join(', ')}) VALUES (${placeholders})`;
    if (policy === 'drop') return `${head} ON CONFLICT (${key}) DO NOTHING`;
    const updates = columns.filter((c) => c !== key).map((c) => `${c} = EXCLUDED.${c}`);
    return `${head} ON CONFLICT (${key}) DO UPDATE SET ${[...updates, 'update_time = NOW()'].join(', ')}`;
}

export function rowValues(record: CrawlRecord): unknown[] {
    const row: Record<string, unknown> = record.row;
    return RECORD_COLUMNS[record.kind].map((column) => row[column] ?? null);
}

function ordered(entries: SinkEntry[]): SinkEntry[] {
    return WRITE_ORDER.flatMap((kind) => entries.filter((e) => e.record.kind === kind));
}

// ─── Sink ───────────────────────────────────────────────────────────────────

export class PgRowStore implements RowStore {
    readonly name = 'postgres';
    readonly primary = true;
    private readonly statements: Record<RecordKind, string>;

    constructor(
        private readonly pool: SqlPool,
        readonly policies: Record<RecordKind, DedupPolicy> = DEFAULT_DEDUP_POLICIES,
    ) {
        this.statements = {
            product: buildInsertSql('product', policies.product),
            comment: buildInsertSql('comment', policies.comment),
            shop: buildInsertSql('shop', policies.shop),
        };
    }

    /** Throws FatalError when the tables lack a column the sink writes. */
    async verify(): Promise<void> {
        await verifySchema((sql, values) => this.pool.query(sql, values));
        log.info('[RowStore] Schema verified.');
    }

    async write(batch: SinkBatch): Promise<SinkWriteResult> {
        if (batch.entries.length === 0) return { written: 0, failed: [] };

        const client = await this.pool.connect();
        const failed: RecordFailure[] = [];
        let written = 0;
        try {
            await client.query('BEGIN');
            for (const entry of ordered(batch.entries)) {
                const { record } = entry;
                await client.query('SAVEPOINT record_write');
                try {
                    await client.query(this.statements[record.kind], rowValues(record));
                    await client.query('RELEASE SAVEPOINT record_write');
                    written++;
                } catch (err) {
                    await client.query('ROLLBACK TO SAVEPOINT record_write');
                    failed.push({ kind: record.kind, key: record.key, error: describeError(err) });
                    log.warning(`[RowStore] ${record.kind} ${record.key} rejected: ${describeError(err)}`);
                }
            }
            await client.query('COMMIT');
        } catch (err) {
            await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
                log.warning(`[RowStore] Rollback failed: ${describeError(rollbackErr)}`);
            });
            throw err;
        } finally {
            client.release();
        }
        return { written, failed };
    }

    async count(kind: RecordKind): Promise<number> {
        const { rows } = await this.pool.query(`SELECT COUNT(*)::text AS count FROM ${TABLE_FOR_KIND[kind]}`);
        return Number(rows[0]?.count ?? 0);
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
