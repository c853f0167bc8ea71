/**
 * src/utils/blockDetector.ts
 *
 * Classifies a fetch outcome as a normal page or an anti-bot response.
 *
 * Any single indicator is enough, there is no voting:
 *   • status in the source's block set (401/403/429/503 by default)
 *   • a block phrase in the scanned prefix of the body (case-insensitive);
 *     a source's own phrases extend the built-in list
 *   • a body smaller than the page kind normally is
 *   • a latency outside the source's plausible envelope
 *   • no body at all (fail-safe)
 *
 * classify() is total: malformed input yields a blocked verdict with a
 * reason, never an exception.
 */

import type { DetectionRules } from '../config/sources.js';
import type { TaskKind } from '../sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type Classification = 'clean' | 'blocked';

export interface DetectionInput {
    status: number | null | undefined;
    body: string | null | undefined;
    elapsedMs: number | null | undefined;
    kind?: TaskKind;
}

export interface Verdict {
    classification: Classification;
    /** Empty for clean outcomes. */
    reasons: string[];
}

/** Phrases served by CAPTCHA, rate-limit and WAF pages of the target platforms. */
export const DEFAULT_BLOCK_PHRASES: readonly string[] = [
    '验证码',
    '安全验证',
    '访问过于频繁',
    '人机验证',
    '异常访问',
    '滑块验证',
    '请稍后再试',
    'captcha',
    'access denied',
    'too many requests',
    'unusual traffic',
    'are you a robot',
];

// ─── Classifier ───────────────────────────────────────────────────────────────

export function classify(input: DetectionInput, rules: DetectionRules): Verdict {
    const reasons: string[] = [];

    const status = input.status;
    if (typeof status === 'number' && rules.blockStatuses.includes(status)) {
        reasons.push(`status ${status}`);
    }

    const body = input.body;
    if (typeof body !== 'string' || body.length === 0) {
        reasons.push('empty body');
    } else {
        const scanned = body.slice(0, rules.scanChars).toLowerCase();
        const phrases = [...DEFAULT_BLOCK_PHRASES, ...rules.blockPhrases];
        const hit = phrases.find((phrase) => scanned.includes(phrase.toLowerCase()));
        if (hit !== undefined) reasons.push(`phrase "${hit}"`);

        const minBytes = input.kind ? (rules.minBodyBytes[input.kind] ?? 0) : 0;
        const bytes = Buffer.byteLength(body, 'utf8');
        if (bytes < minBytes) reasons.push(`body ${bytes}B < ${minBytes}B`);
    }

    const elapsed = input.elapsedMs;
    if (typeof elapsed !== 'number' || !Number.isFinite(elapsed) || elapsed < 0) {
        reasons.push('latency unknown');
    } else if (elapsed < rules.minLatencyMs) {
        reasons.push(`latency ${Math.round(elapsed)}ms < ${rules.minLatencyMs}ms`);
    } else if (elapsed > rules.maxLatencyMs) {
        reasons.push(`latency ${Math.round(elapsed)}ms > ${rules.maxLatencyMs}ms`);
    }

    return { classification: reasons.length > 0 ? 'blocked' : 'clean', reasons };
}

export function isBlocked(verdict: Verdict): boolean {
    return verdict.classification === 'blocked';
}
