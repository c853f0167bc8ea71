/**
 * src/pipeline/normalize.ts
 *
 * Field cleaning and record validation.
 *
 * Extracted values arrive as loosely-typed strings ("¥1,999.00", "12.3万+",
 * " 旗舰店 \n"). Each record kind has a zod schema whose preprocessors clean
 * the fields; a record missing its id, name or price-bearing field is
 * rejected with the list of issues and never reaches a sink.
 */

import { z } from 'zod';
import type { RawRecord, RecordKind } from '../sources/types.js';

// ─── Field cleaners ───────────────────────────────────────────────────────────

const UNIT_MULTIPLIERS: Record<string, number> = {
    亿: 100_000_000,
    万: 10_000,
    w: 10_000,
    千: 1_000,
    k: 1_000,
};

/** Trimmed, whitespace-collapsed text; null when nothing is left. */
export function cleanText(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    if (typeof value !== 'string' && typeof value !== 'number') return null;
    const text = String(value).replace(/\s+/g, ' ').trim();
    return text.length > 0 ? text : null;
}

/**
 * Numeric value of a display string: currency symbols, thousands separators
 * and a trailing "+" are dropped, and a unit suffix multiplies the number
 * ("12.3万" → 123000). Null when no number is present.
 */
export function parseNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'string') return null;
    const cleaned = value.replace(/[\s,，¥￥$€£元+]/g, '');
    const match = cleaned.match(/(-?\d+(?:\.\d+)?)(亿|万|千|[wWkK])?/);
    if (!match?.[1]) return null;
    const unit = match[2]?.toLowerCase();
    const multiplier = unit ? (UNIT_MULTIPLIERS[unit] ?? 1) : 1;
    const parsed = Number(match[1]) * multiplier;
    return Number.isFinite(parsed) ? parsed : null;
}

export function parsePrice(value: unknown): number | null {
    const parsed = parseNumber(value);
    return parsed === null ? null : Math.round(parsed * 100) / 100;
}

export function parseCount(value: unknown): number | null {
    const parsed = parseNumber(value);
    return parsed === null ? null : Math.round(parsed);
}

// ─── Schemas ──────────────────────────────────────────────────────────────────

const REQUIRED = { required_error: 'is required', invalid_type_error: 'is required' };

const requiredText = z.preprocess(cleanText, z.string(REQUIRED));
const optionalText = z.preprocess(cleanText, z.string().nullable());
const requiredPrice = z.preprocess(parsePrice, z.number(REQUIRED).nonnegative());
const optionalPrice = z.preprocess(parsePrice, z.number().nonnegative().nullable());
const count = z.preprocess(parseCount, z.number().int().nonnegative().nullable()).transform((v) => v ?? 0);
const score = z.preprocess(parseNumber, z.number().min(0).nullable());

export const ProductRowSchema = z.object({
    platform: requiredText,
    product_id: requiredText,
    name: requiredText,
    price: requiredPrice,
    original_price: optionalPrice,
    sales: count,
    comments_count: count,
    shop_name: optionalText,
    category: optionalText,
    url: optionalText,
    crawl_time: z.string(),
});

export const CommentRowSchema = z.object({
    comment_id: requiredText,
    product_id: requiredText,
    user_id: optionalText,
    user_name: optionalText,
    content: optionalText,
    rating: z.preprocess(parseNumber, z.number().min(0).max(5).nullable()),
    comment_time: optionalText,
    useful_votes: count,
    reply_count: count,
    crawl_time: z.string(),
});

export const ShopRowSchema = z.object({
    shop_id: requiredText,
    shop_name: requiredText,
    shop_type: optionalText,
    score_service: score,
    score_delivery: score,
    score_description: score,
    location: optionalText,
    registered_time: optionalText,
    crawl_time: z.string(),
});

export type ProductRow = z.output<typeof ProductRowSchema>;
export type CommentRow = z.output<typeof CommentRowSchema>;
export type ShopRow = z.output<typeof ShopRowSchema>;

export type CrawlRecord =
    | { kind: 'product'; key: string; row: ProductRow }
    | { kind: 'comment'; key: string; row: CommentRow }
    | { kind: 'shop'; key: string; row: ShopRow };

/** Column order shared by the CSV header, the JSON documents and the SQL. */
export const RECORD_COLUMNS = {
    product: Object.keys(ProductRowSchema.shape),
    comment: Object.keys(CommentRowSchema.shape),
    shop: Object.keys(ShopRowSchema.shape),
} satisfies Record<RecordKind, string[]>;

// ─── Normalization ────────────────────────────────────────────────────────────

export type NormalizeResult = { ok: true; record: CrawlRecord } | { ok: false; kind: RecordKind; errors: string[] };

function issuesOf(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`);
}

export function normalizeRecord(raw: RawRecord, crawlTime: Date): NormalizeResult {
    const stamp = crawlTime.toISOString();
    switch (raw.kind) {
        case 'product': {
            const parsed = ProductRowSchema.safeParse({ platform: raw.source, ...raw.fields, crawl_time: stamp });
            if (!parsed.success) return { ok: false, kind: raw.kind, errors: issuesOf(parsed.error) };
            return { ok: true, record: { kind: 'product', key: parsed.data.product_id, row: parsed.data } };
        }
        case 'comment': {
            const parsed = CommentRowSchema.safeParse({ ...raw.fields, crawl_time: stamp });
            if (!parsed.success) return { ok: false, kind: raw.kind, errors: issuesOf(parsed.error) };
            return { ok: true, record: { kind: 'comment', key: parsed.data.comment_id, row: parsed.data } };
        }
        case 'shop': {
            const parsed = ShopRowSchema.safeParse({ ...raw.fields, crawl_time: stamp });
            if (!parsed.success) return { ok: false, kind: raw.kind, errors: issuesOf(parsed.error) };
            return { ok: true, record: { kind: 'shop', key: parsed.data.shop_id, row: parsed.data } };
        }
    }
}
