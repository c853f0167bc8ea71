/**
 * Record builders shared by the pipeline and worker tests.
 */

import type { RawRecord } from '../sources/types.js';
import { normalizeRecord, type CrawlRecord } from './normalize.js';

export const TEST_CRAWL_TIME = new Date('2026-10-19T08:00:00.000Z');

function build(raw: RawRecord): CrawlRecord {
    const result = normalizeRecord(raw, TEST_CRAWL_TIME);
    if (!result.ok) throw new Error(result.errors.join('; '));
    return result.record;
}

export function productRecord(productId: string, name = '手机', price = '99'): CrawlRecord {
    return build({ kind: 'product', source: 'X', fields: { product_id: productId, name, price } });
}

export function commentRecord(commentId: string, productId: string, usefulVotes = 0): CrawlRecord {
    return build({
        kind: 'comment',
        source: 'X',
        fields: { comment_id: commentId, product_id: productId, content: '好', useful_votes: usefulVotes },
    });
}

export function shopRecord(shopId: string, shopName = '旗舰店'): CrawlRecord {
    return build({ kind: 'shop', source: 'X', fields: { shop_id: shopId, shop_name: shopName } });
}
