/**
 * src/utils/resourcePool.ts
 *
 * Health-scored rotation pool for request identity material: egress points
 * (proxies), client identities (user agents) and session tokens (cookies).
 *
 * Every resource is a hash in the shared store, so all worker processes see
 * the same scores and cooldowns:
 *
 *   pool:{kind}:members          set of resource ids
 *   pool:{kind}:res:{id}         value, weight, scope, score, successes,
 *                                failures, consecutiveFailures, lastUsedAt,
 *                                cooldownUntil, cooldowns, evicted, seededAt,
 *                                evictedAt
 *   pool:{kind}:leases:{id}      schedule of live leases (per-resource cap)
 *
 * acquire() draws by weighted random over resources that are in scope for
 * the source, not cooling down, not evicted and under their lease cap. The
 * weight is the configured weight times the score, with a floor so a
 * recovering resource still gets the occasional request.
 *
 * release() blends the score toward 1 or 0. After `maxConsecutiveFailures`
 * failures in a row the resource cools down (long cooldown when its score is
 * under the floor too). A success clears the cooldown count. A resource that
 * has cooled down `evictAfterCooldowns` times without a success in between
 * and whose score is under the floor is evicted.
 *
 * maintain() runs from the worker heartbeat: it retires resources older than
 * `maxAgeMs` and puts evicted ones back on probation (score at the floor)
 * after `reinstateAfterMs`.
 */

import { createHash, randomUUID } from 'crypto';
import { log } from '@crawlee/core';
import { storeKey, type SharedStore } from '../broker/sharedStore.js';
import type { PoolPolicy } from '../config/sources.js';
import { describeError } from './errors.js';
import type { CooldownTarget } from './adaptiveController.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type PoolKind = 'egress' | 'identity' | 'token';

export interface ResourceSeed {
    value: string;
    weight?: number;
    /** Sources allowed to use the resource; empty means every source. */
    sources?: string[];
}

export interface PoolResource {
    id: string;
    kind: PoolKind;
    value: string;
    weight: number;
    sources: string[];
    score: number;
    successes: number;
    failures: number;
    consecutiveFailures: number;
    lastUsedAt: number;
    cooldownUntil: number;
    cooldowns: number;
    evicted: boolean;
    seededAt: number;
    evictedAt: number;
}

export interface MaintenanceReport {
    retired: number;
    reinstated: number;
}

export interface PoolLease {
    pool: ResourcePool;
    resource: PoolResource;
    leaseId: string;
    acquiredAt: number;
}

export type AcquireResult =
    | { ok: true; lease: PoolLease }
    | { ok: false; reason: 'exhausted' | 'unavailable'; message: string };

export interface PoolStats {
    kind: PoolKind;
    total: number;
    available: number;
    coolingDown: number;
    evicted: number;
    averageScore: number;
}

export interface ResourcePoolOptions {
    namespace?: string;
    now?: () => number;
    random?: () => number;
}

export function resourceId(value: string): string {
    return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

function num(fields: Record<string, string>, key: string, fallback: number): number {
    const raw = fields[key];
    if (raw === undefined || raw === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function parseSources(raw: string | undefined): string[] {
    if (!raw) return [];
    try {
        const parsed: unknown = JSON.parse(raw);
        return Array.isArray(parsed) ? parsed.filter((s): s is string => typeof s === 'string') : [];
    } catch {
        return [];
    }
}

/** Proxy credentials stay out of the logs. */
export function maskResourceValue(kind: PoolKind, value: string): string {
    if (kind === 'egress') return value.replace(/\/\/[^@/]+@/, '//***@');
    if (kind === 'token') return `${value.slice(0, 12)}…`;
    return value.length > 48 ? `${value.slice(0, 48)}…` : value;
}

// ─── Pool ─────────────────────────────────────────────────────────────────────

export class ResourcePool implements CooldownTarget {
    private readonly namespace: string;
    private readonly now: () => number;
    private readonly random: () => number;

    constructor(
        readonly kind: PoolKind,
        private readonly store: SharedStore,
        readonly policy: PoolPolicy,
        options: ResourcePoolOptions = {},
    ) {
        this.namespace = options.namespace ?? 'crawl';
        this.now = options.now ?? Date.now;
        this.random = options.random ?? Math.random;
    }

    private membersKey(): string {
        return storeKey(this.namespace, 'pool', this.kind, 'members');
    }

    private resourceKey(id: string): string {
        return storeKey(this.namespace, 'pool', this.kind, 'res', id);
    }

    private leasesKey(id: string): string {
        return storeKey(this.namespace, 'pool', this.kind, 'leases', id);
    }

    /**
     * Registers seeds. Value, weight and scope are refreshed; health counters of
     * a resource another process already seeded are left untouched.
     */
    async seed(seeds: ResourceSeed[]): Promise<number> {
        const now = this.now();
        let added = 0;
        for (const seed of seeds) {
            const id = resourceId(seed.value);
            const key = this.resourceKey(id);
            await this.store.hashSet(key, {
                value: seed.value,
                weight: seed.weight ?? 1,
                sources: JSON.stringify(seed.sources ?? []),
            });
            await this.store.hashSetIfAbsent(key, 'score', this.policy.initialScore);
            await this.store.hashSetIfAbsent(key, 'cooldownUntil', 0);
            await this.store.hashSetIfAbsent(key, 'evicted', 0);
            await this.store.hashSetIfAbsent(key, 'seededAt', now);
            if (await this.store.addToSet(this.membersKey(), id)) added++;
        }
        log.info(`[Pool:${this.kind}] Seeded ${seeds.length} resource(s), ${added} new`);
        return added;
    }

    async snapshot(): Promise<PoolResource[]> {
        const ids = await this.store.setMembers(this.membersKey());
        const resources: PoolResource[] = [];
        for (const id of ids) {
            const resource = await this.read(id);
            if (resource) resources.push(resource);
        }
        return resources.sort((a, b) => a.id.localeCompare(b.id));
    }

    async acquire(source: string): Promise<AcquireResult> {
        try {
            const now = this.now();
            const candidates = (await this.snapshot()).filter(
                (r) => !r.evicted && r.cooldownUntil <= now && (r.sources.length === 0 || r.sources.includes(source)),
            );

            while (candidates.length > 0) {
                const index = this.pickIndex(candidates);
                const [resource] = candidates.splice(index, 1);
                if (!resource) break;

                const leaseId = randomUUID();
                const admitted = await this.store.claimSlot(
                    this.leasesKey(resource.id),
                    leaseId,
                    this.policy.maxConcurrentPerResource,
                    now,
                    now + this.policy.leaseTtlMs,
                );
                if (!admitted) continue;

                await this.store.hashSet(this.resourceKey(resource.id), { lastUsedAt: now });
                return { ok: true, lease: { pool: this, resource: { ...resource, lastUsedAt: now }, leaseId, acquiredAt: now } };
            }

            return { ok: false, reason: 'exhausted', message: `no ${this.kind} resource available for ${source}` };
        } catch (err) {
            return { ok: false, reason: 'unavailable', message: `${this.kind} pool unreachable: ${describeError(err)}` };
        }
    }

    /** Returns a lease and scores the resource by the request outcome. */
    async release(lease: PoolLease, success: boolean): Promise<PoolResource | null> {
        const id = lease.resource.id;
        const key = this.resourceKey(id);
        try {
            await this.store.scheduleRemove(this.leasesKey(id), lease.leaseId);
            const score = await this.store.blendHashField(
                key,
                'score',
                success ? 1 : 0,
                this.policy.scoreAlpha,
                this.policy.initialScore,
            );

            if (success) {
                await this.store.hashIncrement(key, 'successes', 1);
                await this.store.hashSet(key, { consecutiveFailures: 0, cooldowns: 0 });
            } else {
                await this.store.hashIncrement(key, 'failures', 1);
                const streak = await this.store.hashIncrement(key, 'consecutiveFailures', 1);
                if (streak >= this.policy.maxConsecutiveFailures) {
                    const long = score < this.policy.scoreFloor;
                    await this.applyCooldown(
                        id,
                        long ? this.policy.longCooldownMs : this.policy.cooldownMs,
                        `${streak} consecutive failures, score ${score.toFixed(2)}`,
                    );
                }
            }
            return await this.read(id);
        } catch (err) {
            log.warning(`[Pool:${this.kind}] Release of ${id} failed: ${describeError(err)}`);
            return null;
        }
    }

    /** Returns a lease without scoring it, e.g. when a sibling pool came up empty. */
    async abandon(lease: PoolLease): Promise<void> {
        try {
            await this.store.scheduleRemove(this.leasesKey(lease.resource.id), lease.leaseId);
        } catch (err) {
            log.warning(`[Pool:${this.kind}] Abandon of ${lease.resource.id} failed: ${describeError(err)}`);
        }
    }

    /** Immediate cooldown, e.g. after a blocked verdict. */
    async cooldown(id: string, reason: string): Promise<void> {
        await this.applyCooldown(id, this.policy.cooldownMs, reason);
    }

    async has(value: string): Promise<boolean> {
        return this.store.isSetMember(this.membersKey(), resourceId(value));
    }

    /** Resources the source may draw from, cooling down or not. */
    async countLive(source: string): Promise<number> {
        const resources = await this.snapshot();
        return resources.filter((r) => !r.evicted && (r.sources.length === 0 || r.sources.includes(source))).length;
    }

    async maintain(): Promise<MaintenanceReport> {
        const now = this.now();
        const { maxAgeMs, reinstateAfterMs } = this.policy;
        const report: MaintenanceReport = { retired: 0, reinstated: 0 };
        if (maxAgeMs === 0 && reinstateAfterMs === 0) return report;

        for (const resource of await this.snapshot()) {
            const label = maskResourceValue(this.kind, resource.value);
            if (maxAgeMs > 0 && now - resource.seededAt >= maxAgeMs) {
                await this.store.removeFromSet(this.membersKey(), resource.id);
                // Kept until in-flight leases have been released.
                await this.store.expire(this.resourceKey(resource.id), Math.ceil(this.policy.leaseTtlMs / 1000));
                log.debug(`[Pool:${this.kind}] Retired ${label} after ${Math.round((now - resource.seededAt) / 1000)}s`);
                report.retired++;
                continue;
            }
            if (resource.evicted && reinstateAfterMs > 0 && now - resource.evictedAt >= reinstateAfterMs) {
                await this.store.hashSet(this.resourceKey(resource.id), {
                    evicted: 0,
                    evictedAt: 0,
                    cooldowns: 0,
                    consecutiveFailures: 0,
                    cooldownUntil: 0,
                    score: this.policy.scoreFloor,
                });
                log.info(`[Pool:${this.kind}] Reinstated ${label} on probation`);
                report.reinstated++;
            }
        }
        return report;
    }

    async stats(): Promise<PoolStats> {
        const now = this.now();
        const resources = await this.snapshot();
        const live = resources.filter((r) => !r.evicted);
        const cooling = live.filter((r) => r.cooldownUntil > now);
        const averageScore = live.length === 0 ? 0 : live.reduce((sum, r) => sum + r.score, 0) / live.length;
        return {
            kind: this.kind,
            total: resources.length,
            available: live.length - cooling.length,
            coolingDown: cooling.length,
            evicted: resources.length - live.length,
            averageScore: Math.round(averageScore * 1000) / 1000,
        };
    }

    // ─── Internals ────────────────────────────────────────────────────────────

    private async applyCooldown(id: string, durationMs: number, reason: string): Promise<void> {
        const key = this.resourceKey(id);
        const cooldowns = await this.store.hashIncrement(key, 'cooldowns', 1);
        const fields = await this.store.hashGetAll(key);
        const label = maskResourceValue(this.kind, fields.value ?? id);
        const score = num(fields, 'score', this.policy.initialScore);

        if (cooldowns >= this.policy.evictAfterCooldowns && score < this.policy.scoreFloor) {
            await this.store.hashSet(key, { evicted: 1, evictedAt: this.now(), consecutiveFailures: 0 });
            log.warning(`[Pool:${this.kind}] Evicted ${label} after ${cooldowns} cooldowns, score ${score.toFixed(2)} (${reason})`);
            return;
        }

        await this.store.hashSet(key, { cooldownUntil: this.now() + durationMs, consecutiveFailures: 0 });
        log.info(`[Pool:${this.kind}] Cooling down ${label} for ${Math.round(durationMs / 1000)}s (${reason})`);
    }

    private pickIndex(candidates: PoolResource[]): number {
        const weights = candidates.map((r) => r.weight * Math.max(r.score, this.policy.minWeight));
        const total = weights.reduce((sum, w) => sum + w, 0);
        if (total <= 0) return Math.floor(this.random() * candidates.length);
        let roll = this.random() * total;
        for (let i = 0; i < weights.length; i++) {
            roll -= weights[i] ?? 0;
            if (roll < 0) return i;
        }
        return weights.length - 1;
    }

    private async read(id: string): Promise<PoolResource | null> {
        const fields = await this.store.hashGetAll(this.resourceKey(id));
        const value = fields.value;
        if (value === undefined) return null;
        return {
            id,
            kind: this.kind,
            value,
            weight: num(fields, 'weight', 1),
            sources: parseSources(fields.sources),
            score: num(fields, 'score', this.policy.initialScore),
            successes: num(fields, 'successes', 0),
            failures: num(fields, 'failures', 0),
            consecutiveFailures: num(fields, 'consecutiveFailures', 0),
            lastUsedAt: num(fields, 'lastUsedAt', 0),
            cooldownUntil: num(fields, 'cooldownUntil', 0),
            cooldowns: num(fields, 'cooldowns', 0),
            evicted: num(fields, 'evicted', 0) === 1,
            seededAt: num(fields, 'seededAt', 0),
            evictedAt: num(fields, 'evictedAt', 0),
        };
    }
}
