/**
 * src/config/sources.ts
 *
 * Per-source behaviour table, loaded from config/sources.json.
 *
 * Everything that differs between target platforms (a lower concurrency
 * ceiling for a stricter site, its block phrases, cookie shapes, URL
 * templates, selectors) is a lookup here keyed by source id. The controller,
 * pools and detector never branch on a source name.
 *
 * A `defaults` profile fills whatever a source leaves out, and an unknown
 * source resolves to the defaults. The table is read once at startup.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { TASK_KINDS, type TaskKind } from '../sources/types.js';

// ─── Schemas ──────────────────────────────────────────────────────────────────

export const PacingPolicySchema = z
    .object({
        concurrencyFloor: z.number().int().min(1).default(1),
        concurrencyCeiling: z.number().int().min(1).default(4),
        initialConcurrency: z.number().int().min(1).default(2),
        baseDelayMs: z.number().nonnegative().default(2_000),
        minDelayMs: z.number().nonnegative().default(500),
        maxDelayMs: z.number().positive().default(60_000),
        jitterMs: z.number().nonnegative().default(1_000),
        highErrorRate: z.number().min(0).max(1).default(0.3),
        lowErrorRate: z.number().min(0).max(1).default(0.05),
        /** How long the rate must stay low before speeding up. */
        sustainMs: z.number().nonnegative().default(60_000),
        delayIncreaseFactor: z.number().min(1).default(2),
        delayDecreaseFactor: z.number().gt(0).max(1).default(0.8),
        /** Recompute after this many reports... */
        adjustEvery: z.number().int().min(1).default(10),
        /** ...or after this long, whichever comes first. */
        adjustIntervalMs: z.number().positive().default(15_000),
        blockedWeight: z.number().min(1).default(3),
        minSamples: z.number().int().min(1).default(5),
        /** A worker that dies holding a slot frees it after this long. */
        slotTtlMs: z.number().positive().default(120_000),
    })
    .refine((p) => p.concurrencyFloor <= p.concurrencyCeiling, 'concurrencyFloor must not exceed concurrencyCeiling')
    .refine((p) => p.minDelayMs <= p.maxDelayMs, 'minDelayMs must not exceed maxDelayMs')
    .refine((p) => p.lowErrorRate <= p.highErrorRate, 'lowErrorRate must not exceed highErrorRate');

export const DetectionRulesSchema = z.object({
    blockStatuses: z.array(z.number().int()).default([401, 403, 429, 503]),
    /** Checked after the built-in phrase list. */
    blockPhrases: z.array(z.string().min(1)).default([]),
    /** Only this many leading characters are scanned for phrases. */
    scanChars: z.number().int().positive().default(20_000),
    minBodyBytes: z.record(z.enum(TASK_KINDS), z.number().int().nonnegative()).default({}),
    minLatencyMs: z.number().nonnegative().default(0),
    maxLatencyMs: z.number().positive().default(60_000),
});

const CookieFieldSchema = z.object({
    name: z.string().min(1),
    length: z.number().int().positive().default(16),
    alphabet: z.enum(['hex', 'alnum', 'digits']).default('alnum'),
    prefix: z.string().default(''),
});

export const IdentityPolicySchema = z.object({
    sessionPrefix: z.string().default('s'),
    signing: z.boolean().default(false),
    signSalts: z.array(z.string()).default([]),
    /** Identities rotate their derived fingerprint once per bucket of this length. */
    rotateMs: z.number().positive().default(30 * 60_000),
    cookies: z.array(CookieFieldSchema).default([]),
    tokenCount: z.number().int().nonnegative().default(0),
});

export const FieldMapSchema = z.record(z.string(), z.string());

export const ExtractRuleSchema = z.object({
    /** Repeating element; omitted means the whole document is one item. */
    item: z.string().optional(),
    fields: FieldMapSchema,
    /** Derive per-item comment tasks from search results. */
    deriveComments: z.boolean().default(false),
    deriveShops: z.boolean().default(false),
    /** Comment pages shorter than this end pagination. */
    pageSize: z.number().int().positive().default(10),
    maxPages: z.number().int().positive().default(5),
});

export const SourceProfileSchema = z.object({
    id: z.string().min(1),
    displayName: z.string().default(''),
    enabled: z.boolean().default(true),
    keywords: z.array(z.string().min(1)).default([]),
    maxPages: z.number().int().positive().default(5),
    /** Results per search page; feeds the {offset} URL placeholder. */
    pageSize: z.number().int().positive().default(30),
    requestTimeoutMs: z.number().positive().default(20_000),
    pacing: PacingPolicySchema.default({}),
    detection: DetectionRulesSchema.default({}),
    identity: IdentityPolicySchema.default({}),
    urls: z.record(z.enum(TASK_KINDS), z.string().url()).default({}),
    extract: z.record(z.enum(TASK_KINDS), ExtractRuleSchema).default({}),
    headers: z.record(z.string(), z.string()).default({}),
});

export const PoolPolicySchema = z.object({
    initialScore: z.number().min(0).max(1).default(1),
    /** Blend factor toward 1 on success and toward 0 on failure. */
    scoreAlpha: z.number().gt(0).max(1).default(0.2),
    scoreFloor: z.number().min(0).max(1).default(0.2),
    /** Selection weight never drops below this share of the resource weight. */
    minWeight: z.number().min(0).max(1).default(0.05),
    maxConcurrentPerResource: z.number().int().min(1).default(2),
    maxConsecutiveFailures: z.number().int().min(1).default(5),
    cooldownMs: z.number().nonnegative().default(5 * 60_000),
    longCooldownMs: z.number().nonnegative().default(60 * 60_000),
    evictAfterCooldowns: z.number().int().min(1).default(5),
    leaseTtlMs: z.number().positive().default(120_000),
    /** Resources older than this are retired by maintenance; 0 keeps them. */
    maxAgeMs: z.number().nonnegative().default(0),
    /** Evicted resources come back on probation after this long; 0 never. */
    reinstateAfterMs: z.number().nonnegative().default(0),
});

const EgressSeedSchema = z.union([
    z.string().min(1),
    z.object({
        value: z.string().min(1),
        weight: z.number().positive().default(1),
        sources: z.array(z.string()).default([]),
    }),
]);

const SourcesFileSchema = z.object({
    defaults: z.record(z.string(), z.unknown()).default({}),
    sources: z.array(z.record(z.string(), z.unknown())),
    pools: z
        .object({
            egress: PoolPolicySchema.default({}),
            identity: PoolPolicySchema.default({}),
            token: PoolPolicySchema.default({}),
        })
        .default({}),
    egress: z.array(EgressSeedSchema).default([]),
});

// ─── Types ────────────────────────────────────────────────────────────────────

export type PacingPolicy = z.infer<typeof PacingPolicySchema>;
export type DetectionRules = z.infer<typeof DetectionRulesSchema>;
export type IdentityPolicy = z.infer<typeof IdentityPolicySchema>;
export type CookieField = z.infer<typeof CookieFieldSchema>;
export type ExtractRule = z.infer<typeof ExtractRuleSchema>;
export type SourceProfile = z.infer<typeof SourceProfileSchema>;
export type PoolPolicy = z.infer<typeof PoolPolicySchema>;
export type EgressSeed = { value: string; weight: number; sources: string[] };

export interface PoolPolicies {
    egress: PoolPolicy;
    identity: PoolPolicy;
    token: PoolPolicy;
}

// ─── Table ────────────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function mergeProfile(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const current = merged[key];
        merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeProfile(current, value) : value;
    }
    return merged;
}

export class SourceProfileTable {
    private readonly profiles = new Map<string, SourceProfile>();
    private readonly fallback: SourceProfile;

    constructor(
        profiles: SourceProfile[],
        fallback: SourceProfile,
        readonly pools: PoolPolicies,
        readonly egress: EgressSeed[],
    ) {
        for (const profile of profiles) this.profiles.set(profile.id, profile);
        this.fallback = fallback;
    }

    get(source: string): SourceProfile {
        return this.profiles.get(source) ?? { ...this.fallback, id: source };
    }

    has(source: string): boolean {
        return this.profiles.has(source);
    }

    /** Enabled sources in file order. */
    enabledIds(): string[] {
        return [...this.profiles.values()].filter((p) => p.enabled).map((p) => p.id);
    }
}

/** `overrides` apply on top of every profile, after its own settings. */
export function parseSourceTable(raw: unknown, overrides: Record<string, unknown> = {}): SourceProfileTable {
    const file = SourcesFileSchema.parse(raw);
    const fallback = SourceProfileSchema.parse(mergeProfile({ ...file.defaults, id: 'default' }, overrides));
    const profiles = file.sources.map((entry) => {
        const merged = mergeProfile(mergeProfile(file.defaults, entry), overrides);
        const parsed = SourceProfileSchema.safeParse(merged);
        if (!parsed.success) {
            const id = typeof entry.id === 'string' ? entry.id : '(missing id)';
            const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
            throw new Error(`Invalid source profile "${id}":\n- ${issues.join('\n- ')}`);
        }
        return parsed.data;
    });
    const egress: EgressSeed[] = file.egress.map((seed) =>
        typeof seed === 'string' ? { value: seed, weight: 1, sources: [] } : seed,
    );
    return new SourceProfileTable(profiles, fallback, file.pools, egress);
}

export function loadSourceTable(filePath: string, overrides: Record<string, unknown> = {}): SourceProfileTable {
    const resolved = path.resolve(process.cwd(), filePath);
    const text = fs.readFileSync(resolved, 'utf-8');
    return parseSourceTable(JSON.parse(text), overrides);
}

export function expectedMinBodyBytes(rules: DetectionRules, kind: TaskKind): number {
    return rules.minBodyBytes[kind] ?? 0;
}
