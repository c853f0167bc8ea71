import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { parseSourceTable } from '../config/sources.js';
import type { Task } from '../sources/types.js';
import { readField, selectorExtractor } from './selectorExtractor.js';

const table = parseSourceTable({
    sources: [
        {
            id: 'X',
            urls: { search: 'https://shop.example/search?q={keyword}&page={page}' },
            extract: {
                search: {
                    item: '.goods',
                    fields: {
                        product_id: '@data-sku',
                        name: '.name',
                        price: '.price',
                        url: 'a.title@href',
                        shop_id: '.shop@data-id',
                        shop_name: '.shop',
                    },
                    deriveComments: true,
                    deriveShops: true,
                },
                comments: {
                    item: '.comment',
                    fields: { comment_id: '@data-id', content: '.content', rating: '.star@data-score' },
                    pageSize: 2,
                    maxPages: 3,
                },
            },
        },
    ],
});
const profile = table.get('X');

function task(overrides: Partial<Task>): Task {
    return {
        source: 'X',
        key: 'search:手机:1',
        kind: 'search',
        payload: { keyword: '手机', page: 1 },
        priority: 0,
        enqueuedAt: 0,
        attempts: 0,
        ...overrides,
    };
}

const SEARCH_HTML = `
<ul>
  <li class="goods" data-sku="P1">
    <a class="title" href="/item/P1"><span class="name"> 手机   A </span></a>
    <span class="price">¥1,999.00</span>
    <span class="shop" data-id="S1">旗舰店</span>
  </li>
  <li class="goods" data-sku="P2">
    <a class="title" href="/item/P2"><span class="name">手机 B</span></a>
    <span class="price">¥99.00</span>
    <span class="shop" data-id="S1">旗舰店</span>
  </li>
</ul>`;

const COMMENTS_HTML = `
<div class="comment" data-id="C1"><p class="content">好用</p><i class="star" data-score="5"></i></div>
<div class="comment" data-id="C2"><p class="content">一般</p><i class="star" data-score="3"></i></div>`;

describe('readField', () => {
    const $ = cheerio.load('<div class="x" data-a="1"><span> a \n b </span></div>');

    it('reads text, nested attributes and attributes of the scope itself', () => {
        const scope = $('.x');
        expect(readField(scope, 'span')).toBe('a b');
        expect(readField(scope, '@data-a')).toBe('1');
        expect(readField(scope, '@data-missing')).toBeNull();
        expect(readField(scope, '.absent')).toBeNull();
    });
});

describe('selectorExtractor', () => {
    it('extracts products and derives comment and shop tasks from a search page', () => {
        const result = selectorExtractor({
            task: task({}),
            body: SEARCH_HTML,
            profile,
            pageUrl: 'https://shop.example/search?q=%E6%89%8B%E6%9C%BA&page=1',
        });

        expect(result.records).toHaveLength(2);
        expect(result.records[0]).toEqual({
            kind: 'product',
            source: 'X',
            fields: {
                product_id: 'P1',
                name: '手机 A',
                price: '¥1,999.00',
                url: 'https://shop.example/item/P1',
                shop_id: 'S1',
                shop_name: '旗舰店',
            },
        });
        expect(result.tasks.map((t) => t.key)).toEqual(['comments:P1:1', 'shop:S1', 'comments:P2:1']);
        expect(result.tasks[1]?.payload).toEqual({ shopId: 'S1', parentKey: 'search:手机:1' });
    });

    it('fills the product id of comments and follows full comment pages', () => {
        const commentsTask = task({
            key: 'comments:P1:1',
            kind: 'comments',
            payload: { productId: 'P1', page: 1 },
        });

        const result = selectorExtractor({ task: commentsTask, body: COMMENTS_HTML, profile, pageUrl: 'https://shop.example/c' });

        expect(result.records.map((r) => r.fields)).toEqual([
            { comment_id: 'C1', content: '好用', rating: '5', product_id: 'P1' },
            { comment_id: 'C2', content: '一般', rating: '3', product_id: 'P1' },
        ]);
        expect(result.tasks).toEqual([
            {
                source: 'X',
                key: 'comments:P1:2',
                kind: 'comments',
                payload: { productId: 'P1', page: 2, parentKey: 'comments:P1:1' },
            },
        ]);
    });

    it('stops paginating at the last allowed page', () => {
        const lastPage = task({ key: 'comments:P1:3', kind: 'comments', payload: { productId: 'P1', page: 3 } });
        const result = selectorExtractor({ task: lastPage, body: COMMENTS_HTML, profile, pageUrl: 'https://shop.example/c' });
        expect(result.tasks).toEqual([]);
    });

    it('returns nothing for a task kind without a rule', () => {
        const shopTask = task({ key: 'shop:S1', kind: 'shop', payload: { shopId: 'S1' } });
        expect(selectorExtractor({ task: shopTask, body: '<p>x</p>', profile, pageUrl: 'https://shop.example/s' })).toEqual({
            records: [],
            tasks: [],
        });
    });
});
