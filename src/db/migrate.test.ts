import { describe, expect, it, vi } from 'vitest';
import { migrate, verifySchema, TABLE_FOR_KIND, type RunSql } from './migrate.js';
import { RECORD_COLUMNS } from '../pipeline/normalize.js';
import { RECORD_KINDS } from '../sources/types.js';
import { FatalError } from '../utils/errors.js';

function presentColumns(except: string[] = []): Array<Record<string, unknown>> {
    const rows: Array<Record<string, unknown>> = [];
    for (const kind of RECORD_KINDS) {
        const table = TABLE_FOR_KIND[kind];
        for (const column of ['id', ...RECORD_COLUMNS[kind], 'update_time']) {
            if (!except.includes(`${table}.${column}`)) rows.push({ table_name: table, column_name: column });
        }
    }
    return rows;
}

describe('migrate', () => {
    it('creates products before the tables that reference it, then columns and indexes', async () => {
        const run = vi.fn<RunSql>(async () => ({ rows: [] }));
        await migrate(run);

        const statements = run.mock.calls.map(([sql]) => sql.trim());
        expect(statements).toHaveLength(13);
        expect(statements[0]).toMatch(/^CREATE TABLE IF NOT EXISTS products /);
        expect(statements[1]).toMatch(/^CREATE TABLE IF NOT EXISTS shops /);
        expect(statements[2]).toMatch(/^CREATE TABLE IF NOT EXISTS comments /);
        expect(statements[3]).toBe('ALTER TABLE comments ADD COLUMN IF NOT EXISTS user_name TEXT;');
        expect(statements[12]).toBe('CREATE INDEX IF NOT EXISTS idx_shops_shop_name      ON shops(shop_name);');
    });
});

describe('verifySchema', () => {
    it('passes when every written column exists', async () => {
        const run = vi.fn<RunSql>(async () => ({ rows: presentColumns() }));
        await expect(verifySchema(run)).resolves.toBeUndefined();
        expect(run.mock.calls[0]?.[1]).toEqual([['products', 'comments', 'shops']]);
    });

    it('lists the missing columns in a fatal error', async () => {
        const run = vi.fn<RunSql>(async () => ({ rows: presentColumns(['shops.location', 'comments.update_time']) }));
        const failure = verifySchema(run);
        await expect(failure).rejects.toThrow(FatalError);
        await expect(failure).rejects.toThrow(
            'Row-store schema mismatch, missing: comments.update_time, shops.location. Run the migrate command.',
        );
    });
});
