/**
 * src/extractors/selectorExtractor.ts
 *
 * Table-driven HTML extraction. Each source profile maps a task kind to an
 * extract rule: an optional repeating `item` selector and a field map whose
 * values use a small selector syntax, evaluated inside each item:
 *
 *   ".price"        text of the first match
 *   "a.title@href"  attribute of the first match
 *   "@data-sku"     attribute of the item element itself
 *
 * Search pages yield products and, when the rule asks for it, a comments task
 * per product and a shop task per distinct shop. Comment pages yield comments
 * and the next comment page while the current one is full.
 */

import * as cheerio from 'cheerio';
import { log } from '@crawlee/core';
import type { SourceProfile } from '../config/sources.js';
import type { ExtractionResult, NewTask, RawRecord, RecordKind, Task, TaskKind } from '../sources/types.js';

/** The slice of a cheerio selection the field reader needs. */
export interface Selection {
    find(selector: string): Selection;
    first(): Selection;
    text(): string;
    attr(name: string): string | undefined;
}

export interface ExtractorInput {
    task: Task;
    body: string;
    profile: SourceProfile;
    /** Final URL of the page, used to resolve relative links. */
    pageUrl: string;
}

export type Extractor = (input: ExtractorInput) => ExtractionResult;

const RECORD_KIND_FOR_TASK: Record<TaskKind, RecordKind> = {
    search: 'product',
    product: 'product',
    comments: 'comment',
    shop: 'shop',
};

// ─── Field reading ────────────────────────────────────────────────────────────

export function readField(scope: Selection, selector: string): string | null {
    const at = selector.lastIndexOf('@');
    const css = (at >= 0 ? selector.slice(0, at) : selector).trim();
    const attribute = at >= 0 ? selector.slice(at + 1).trim() : null;
    const target = css ? scope.find(css).first() : scope;
    const value = attribute ? target.attr(attribute) : target.text();
    const trimmed = value?.replace(/\s+/g, ' ').trim();
    return trimmed ? trimmed : null;
}

function absolutize(value: string | null, pageUrl: string): string | null {
    if (!value) return value;
    try {
        return new URL(value, pageUrl).toString();
    } catch {
        return value;
    }
}

function text(value: unknown): string | null {
    return typeof value === 'string' && value.length > 0 ? value : null;
}

// ─── Extraction ───────────────────────────────────────────────────────────────

export const selectorExtractor: Extractor = ({ task, body, profile, pageUrl }) => {
    const rule = profile.extract[task.kind];
    if (!rule) {
        log.debug(`[Extract] ${profile.id} has no extract rule for ${task.kind}`);
        return { records: [], tasks: [] };
    }

    const $ = cheerio.load(body);
    const scopes: Selection[] = rule.item ? $(rule.item).toArray().map((el) => $(el)) : [$.root()];
    const kind = RECORD_KIND_FOR_TASK[task.kind];
    const records: RawRecord[] = [];

    for (const scope of scopes) {
        const fields: Record<string, unknown> = {};
        for (const [name, selector] of Object.entries(rule.fields)) {
            const value = readField(scope, selector);
            fields[name] = name === 'url' ? absolutize(value, pageUrl) : value;
        }
        if (Object.values(fields).every((v) => v === null)) continue;

        // Ids the page leaves implicit come from the task.
        if (kind === 'comment' && !fields.product_id) fields.product_id = task.payload.productId ?? null;
        if (kind === 'shop' && !fields.shop_id) fields.shop_id = task.payload.shopId ?? null;
        if (kind === 'product' && !fields.product_id) fields.product_id = task.payload.productId ?? null;
        records.push({ kind, source: task.source, fields });
    }

    const tasks: NewTask[] = [];
    if (task.kind === 'search') {
        const shops = new Set<string>();
        for (const record of records) {
            const productId = text(record.fields.product_id);
            if (rule.deriveComments && productId) {
                tasks.push({
                    source: task.source,
                    key: `comments:${productId}:1`,
                    kind: 'comments',
                    payload: { productId, page: 1, parentKey: task.key },
                });
            }
            const shopId = text(record.fields.shop_id);
            if (rule.deriveShops && shopId && !shops.has(shopId)) {
                shops.add(shopId);
                tasks.push({
                    source: task.source,
                    key: `shop:${shopId}`,
                    kind: 'shop',
                    payload: { shopId, parentKey: task.key },
                });
            }
        }
    }

    if (task.kind === 'comments' && task.payload.productId) {
        const page = task.payload.page ?? 1;
        if (records.length >= rule.pageSize && page < rule.maxPages) {
            tasks.push({
                source: task.source,
                key: `comments:${task.payload.productId}:${page + 1}`,
                kind: 'comments',
                payload: { productId: task.payload.productId, page: page + 1, parentKey: task.key },
            });
        }
    }

    log.debug(`[Extract] ${task.source}/${task.key}: ${records.length} ${kind} record(s), ${tasks.length} derived task(s)`);
    return { records, tasks };
};
