/**
 * src/db/migrate.ts
 *
 * Idempotent row-store schema for products, comments and shops.
 *
 * Run:  npm run db:migrate   (main.ts `migrate` command)
 *
 * CREATE TABLE IF NOT EXISTS plus ALTER TABLE ADD COLUMN IF NOT EXISTS, so it
 * is safe to run any number of times and grows an older schema in place.
 * verifySchema() is what a worker runs at startup: a missing column is a
 * fatal configuration error, not something to discover mid-batch.
 */

import { log } from '@crawlee/core';
import { FatalError } from '../utils/errors.js';
import { RECORD_COLUMNS } from '../pipeline/normalize.js';
import { RECORD_KINDS, type RecordKind } from '../sources/types.js';

// ─── Schema ─────────────────────────────────────────────────────────────────

export const TABLE_FOR_KIND: Record<RecordKind, string> = {
    product: 'products',
    comment: 'comments',
    shop: 'shops',
};

const CREATE_PRODUCTS = `
CREATE TABLE IF NOT EXISTS products (
    id              BIGSERIAL PRIMARY KEY,
    platform        TEXT        NOT NULL,
    product_id      TEXT        NOT NULL UNIQUE,
    name            TEXT        NOT NULL,
    price           NUMERIC(12, 2) NOT NULL,
    original_price  NUMERIC(12, 2),
    sales           BIGINT      NOT NULL DEFAULT 0,
    comments_count  BIGINT      NOT NULL DEFAULT 0,
    shop_name       TEXT,
    category        TEXT,
    url             TEXT,
    crawl_time      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    update_time     TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const CREATE_SHOPS = `
CREATE TABLE IF NOT EXISTS shops (
    id                 BIGSERIAL PRIMARY KEY,
    shop_id            TEXT        NOT NULL UNIQUE,
    shop_name          TEXT        NOT NULL,
    shop_type          TEXT,
    score_service      NUMERIC(6, 2),
    score_delivery     NUMERIC(6, 2),
    score_description  NUMERIC(6, 2),
    location           TEXT,
    registered_time    TEXT,
    crawl_time         TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    update_time        TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const CREATE_COMMENTS = `
CREATE TABLE IF NOT EXISTS comments (
    id            BIGSERIAL PRIMARY KEY,
    comment_id    TEXT        NOT NULL UNIQUE,
    product_id    TEXT        NOT NULL REFERENCES products(product_id),
    user_id       TEXT,
    user_name     TEXT,
    content       TEXT,
    rating        NUMERIC(3, 1),
    comment_time  TEXT,
    useful_votes  BIGINT      NOT NULL DEFAULT 0,
    reply_count   BIGINT      NOT NULL DEFAULT 0,
    crawl_time    TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    update_time   TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

// Columns added after the first release; safe to re-run.
const ALTER_COLUMNS = [
    `ALTER TABLE comments ADD COLUMN IF NOT EXISTS user_name TEXT;`,
    `ALTER TABLE comments ADD COLUMN IF NOT EXISTS update_time TIMESTAMPTZ NOT NULL DEFAULT NOW();`,
    `ALTER TABLE shops ADD COLUMN IF NOT EXISTS score_description NUMERIC(6, 2);`,
    `ALTER TABLE shops ADD COLUMN IF NOT EXISTS location TEXT;`,
    `ALTER TABLE shops ADD COLUMN IF NOT EXISTS registered_time TEXT;`,
    `ALTER TABLE shops ADD COLUMN IF NOT EXISTS update_time TIMESTAMPTZ NOT NULL DEFAULT NOW();`,
];

const INDEXES = [
    `CREATE INDEX IF NOT EXISTS idx_products_platform    ON products(platform);`,
    `CREATE INDEX IF NOT EXISTS idx_products_crawl_time  ON products(crawl_time DESC);`,
    `CREATE INDEX IF NOT EXISTS idx_comments_product_id  ON comments(product_id);`,
    `CREATE INDEX IF NOT EXISTS idx_shops_shop_name      ON shops(shop_name);`,
];

// ─── Runner ─────────────────────────────────────────────────────────────────

export type RunSql = (sql: string, values?: unknown[]) => Promise<{ rows: Array<Record<string, unknown>> }>;

export async function migrate(run: RunSql): Promise<void> {
    log.info('[migrate] Creating tables…');
    for (const ddl of [CREATE_PRODUCTS, CREATE_SHOPS, CREATE_COMMENTS]) {
        await run(ddl);
    }
    for (const alt of ALTER_COLUMNS) {
        await run(alt);
    }
    log.info(`[migrate] ✓ ${ALTER_COLUMNS.length} later columns ensured.`);
    for (const idx of INDEXES) {
        await run(idx);
    }
    log.info(`[migrate] ✓ ${INDEXES.length} indexes in place.`);
}

/** Throws FatalError listing every column the sinks write but the database lacks. */
export async function verifySchema(run: RunSql): Promise<void> {
    const { rows } = await run(
        `SELECT table_name, column_name FROM information_schema.columns
         WHERE table_schema = current_schema() AND table_name = ANY($1)`,
        [Object.values(TABLE_FOR_KIND)],
    );
    const present = new Set(rows.map((r) => `${String(r.table_name)}.${String(r.column_name)}`));
    const missing: string[] = [];
    for (const kind of RECORD_KINDS) {
        const table = TABLE_FOR_KIND[kind];
        for (const column of [...RECORD_COLUMNS[kind], 'update_time']) {
            if (!present.has(`${table}.${column}`)) missing.push(`${table}.${column}`);
        }
    }
    if (missing.length > 0) {
        throw new FatalError(`Row-store schema mismatch, missing: ${missing.join(', ')}. Run the migrate command.`);
    }
}
