/**
 * src/fetch/httpFetcher.ts
 *
 * Single-shot HTTP fetch through got-scraping. No retries here: retry policy
 * belongs to the worker, which requeues with backoff. Non-2xx statuses are
 * returned, not thrown, so the block detector sees them.
 */

import { gotScraping } from 'got-scraping';
import type { FetchResponse } from '../sources/types.js';
import type { RequestPlan } from './requestBuilder.js';

export type Fetcher = (plan: RequestPlan) => Promise<FetchResponse>;

export const httpFetcher: Fetcher = async (plan) => {
    const started = Date.now();
    const response = await gotScraping({
        url: plan.url,
        proxyUrl: plan.proxyUrl,
        headers: plan.headers,
        timeout: { request: plan.timeoutMs },
        retry: { limit: 0 },
        throwHttpErrors: false,
        followRedirect: true,
    });
    return {
        status: response.statusCode,
        body: typeof response.body === 'string' ? response.body : null,
        elapsedMs: Date.now() - started,
        finalUrl: response.url,
    };
};
