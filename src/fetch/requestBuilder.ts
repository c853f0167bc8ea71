/**
 * src/fetch/requestBuilder.ts
 *
 * Turns a task plus its borrowed resources into a concrete request: the URL
 * from the source's template, optional signature parameters, and the headers
 * of the leased identity and token.
 *
 * Template placeholders: {keyword} {page} {offset} {productId} {shopId}.
 * {offset} is the 1-based index of the first result on the page.
 */

import type { SourceProfile } from '../config/sources.js';
import type { Task } from '../sources/types.js';
import { CrawlError, ok, type Outcome } from '../utils/errors.js';
import { pickSalt, signRequest, type ClientIdentity } from '../utils/identity.js';

/** Egress value meaning "no proxy". */
export const DIRECT_EGRESS = 'direct';

export interface RequestPlan {
    url: string;
    headers: Record<string, string>;
    proxyUrl?: string;
    timeoutMs: number;
}

export interface BorrowedResources {
    egress: string;
    identity: ClientIdentity;
    /** Cookie header from the token pool, if the source uses one. */
    cookie: string | null;
}

export function fillTemplate(template: string, task: Task, pageSize: number): string {
    const page = task.payload.page ?? 1;
    const values: Record<string, string> = {
        keyword: encodeURIComponent(task.payload.keyword ?? ''),
        page: String(page),
        offset: String((page - 1) * pageSize + 1),
        productId: encodeURIComponent(task.payload.productId ?? ''),
        shopId: encodeURIComponent(task.payload.shopId ?? ''),
    };
    return template.replace(/\{(\w+)\}/g, (whole, name: string) => values[name] ?? whole);
}

/** Appends `timestamp` and `sign` computed over the URL's own query parameters. */
export function signUrl(url: string, salt: string, now: number): string {
    const parsed = new URL(url);
    const params: Record<string, string> = {};
    parsed.searchParams.forEach((value, key) => {
        params[key] = value;
    });
    const { timestamp, sign } = signRequest(params, salt, Math.floor(now / 1000));
    parsed.searchParams.set('timestamp', String(timestamp));
    parsed.searchParams.set('sign', sign);
    return parsed.toString();
}

export function buildRequest(
    task: Task,
    profile: SourceProfile,
    resources: BorrowedResources,
    now: number,
): Outcome<RequestPlan> {
    const template = profile.urls[task.kind];
    if (!template) {
        return {
            ok: false,
            error: new CrawlError('validation', `source ${profile.id} has no URL template for ${task.kind} tasks`),
        };
    }

    let url = fillTemplate(template, task, profile.pageSize);
    const salt = profile.identity.signing ? pickSalt(profile.identity.signSalts, resources.identity) : null;
    if (salt) url = signUrl(url, salt, now);

    const { identity } = resources;
    const headers: Record<string, string> = {
        'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
        ...profile.headers,
        'User-Agent': identity.userAgent,
        'X-Forwarded-For': identity.forwardedFor,
        'X-Device-Id': identity.deviceId,
        'X-Session-Id': identity.sessionId,
    };
    if (resources.cookie) headers.Cookie = resources.cookie;

    return ok({
        url,
        headers,
        proxyUrl: resources.egress === DIRECT_EGRESS ? undefined : resources.egress,
        timeoutMs: profile.requestTimeoutMs,
    });
}
