import { describe, it, expect } from 'vitest';
import { cleanText, normalizeRecord, parseCount, parsePrice, RECORD_COLUMNS } from './normalize.js';

const crawlTime = new Date('2026-10-19T08:00:00.000Z');

describe('field cleaners', () => {
    it('strips currency symbols and separators from prices', () => {
        expect(parsePrice('¥1,999.00')).toBe(1999);
        expect(parsePrice(' ￥ 88.50 ')).toBe(88.5);
        expect(parsePrice('99-199')).toBe(99);
        expect(parsePrice('面议')).toBeNull();
        expect(parsePrice(undefined)).toBeNull();
    });

    it('resolves unit suffixes on counts', () => {
        expect(parseCount('12.3万')).toBe(123000);
        expect(parseCount('1.2万+')).toBe(12000);
        expect(parseCount('3千')).toBe(3000);
        expect(parseCount('2亿')).toBe(200_000_000);
        expect(parseCount('5k')).toBe(5000);
        expect(parseCount('2000+条评价')).toBe(2000);
        expect(parseCount(42)).toBe(42);
    });

    it('collapses whitespace and maps blanks to null', () => {
        expect(cleanText('  旗舰店 \n 官方 ')).toBe('旗舰店 官方');
        expect(cleanText('   ')).toBeNull();
        expect(cleanText({})).toBeNull();
    });
});

describe('normalizeRecord', () => {
    it('produces a canonical product row', () => {
        const result = normalizeRecord(
            {
                kind: 'product',
                source: 'X',
                fields: { product_id: ' P1 ', name: '手机 Pro', price: '¥1,999.00', sales: '12.3万', comments_count: '2000+' },
            },
            crawlTime,
        );

        expect(result).toEqual({
            ok: true,
            record: {
                kind: 'product',
                key: 'P1',
                row: {
                    platform: 'X',
                    product_id: 'P1',
                    name: '手机 Pro',
                    price: 1999,
                    original_price: null,
                    sales: 123000,
                    comments_count: 2000,
                    shop_name: null,
                    category: null,
                    url: null,
                    crawl_time: '2026-10-19T08:00:00.000Z',
                },
            },
        });
    });

    it('rejects a product without an id', () => {
        const result = normalizeRecord(
            { kind: 'product', source: 'X', fields: { product_id: '', name: 'n', price: '1' } },
            crawlTime,
        );
        expect(result).toEqual({ ok: false, kind: 'product', errors: ['product_id: is required'] });
    });

    it('rejects a product whose price holds no number', () => {
        const result = normalizeRecord(
            { kind: 'product', source: 'X', fields: { product_id: 'P1', name: 'n', price: '暂无报价' } },
            crawlTime,
        );
        expect(result).toEqual({ ok: false, kind: 'product', errors: ['price: is required'] });
    });

    it('normalizes comments and validates the rating range', () => {
        const ok = normalizeRecord(
            { kind: 'comment', source: 'X', fields: { comment_id: 'C1', product_id: 'P1', rating: '5', useful_votes: '1.1万' } },
            crawlTime,
        );
        expect(ok.ok && ok.record.kind === 'comment' && ok.record.row).toMatchObject({
            comment_id: 'C1',
            rating: 5,
            useful_votes: 11000,
            reply_count: 0,
        });

        const bad = normalizeRecord(
            { kind: 'comment', source: 'X', fields: { comment_id: 'C2', product_id: 'P1', rating: '9' } },
            crawlTime,
        );
        expect(bad.ok).toBe(false);
    });

    it('requires a shop name', () => {
        expect(normalizeRecord({ kind: 'shop', source: 'X', fields: { shop_id: 'S1' } }, crawlTime)).toEqual({
            ok: false,
            kind: 'shop',
            errors: ['shop_name: is required'],
        });
    });

    it('keeps the column order of the row-store tables', () => {
        expect(RECORD_COLUMNS.shop).toEqual([
            'shop_id',
            'shop_name',
            'shop_type',
            'score_service',
            'score_delivery',
            'score_description',
            'location',
            'registered_time',
            'crawl_time',
        ]);
    });
});
