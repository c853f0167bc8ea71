/**
 * src/utils/poolMaintenance.ts
 *
 * Periodic upkeep of the resource pools, run from the worker heartbeat.
 *
 * Each pool retires aged resources and reinstates evicted ones per its policy
 * (see ResourcePool.maintain). The token pool is then topped up so every
 * source has `tokenCount` live cookies again.
 *
 * Token values are derived from (source, generation, slot), where the
 * generation is the current `maxAgeMs` bucket. Two workers topping up in the
 * same bucket pick the same slots, so their seeds collapse onto the same
 * resource ids.
 */

import { log } from '@crawlee/core';
import type { CookieField, SourceProfileTable } from '../config/sources.js';
import { buildCookieHeader } from './identity.js';
import type { MaintenanceReport, PoolKind, ResourcePool, ResourceSeed } from './resourcePool.js';

/** Token generation length when the pool has no maximum age. */
export const DEFAULT_TOKEN_GENERATION_MS = 60 * 60_000;

export interface PoolSet {
    egress: ResourcePool;
    identity: ResourcePool;
    token: ResourcePool;
}

export interface PoolUpkeep {
    pools: Record<PoolKind, MaintenanceReport>;
    tokensAdded: number;
}

export function tokenValue(cookies: readonly CookieField[], source: string, generation: number, slot: number): string {
    return buildCookieHeader(cookies, `${source}:${generation}:${slot}`);
}

/**
 * Seeds fresh tokens until each source has `tokenCount` live ones. Returns
 * how many were added.
 */
export async function topUpTokens(
    pool: ResourcePool,
    profiles: SourceProfileTable,
    sources: string[],
    now: number,
): Promise<number> {
    const period = pool.policy.maxAgeMs > 0 ? pool.policy.maxAgeMs : DEFAULT_TOKEN_GENERATION_MS;
    const generation = Math.floor(now / period);
    let added = 0;

    for (const source of sources) {
        const { identity } = profiles.get(source);
        if (identity.cookies.length === 0 || identity.tokenCount === 0) continue;

        let missing = identity.tokenCount - (await pool.countLive(source));
        const seeds: ResourceSeed[] = [];
        // Twice the count leaves room for tokens that failed earlier in the generation.
        for (let slot = 0; missing > 0 && slot < identity.tokenCount * 2; slot++) {
            const value = tokenValue(identity.cookies, source, generation, slot);
            if (await pool.has(value)) continue;
            seeds.push({ value, sources: [source] });
            missing--;
        }
        if (seeds.length > 0) added += await pool.seed(seeds);
        if (missing > 0) {
            log.warning(`[PoolMaintenance] ${source} is ${missing} token(s) short until the next generation`);
        }
    }
    return added;
}

export class PoolMaintainer {
    private readonly now: () => number;

    constructor(
        private readonly pools: PoolSet,
        private readonly profiles: SourceProfileTable,
        private readonly sources: string[],
        options: { now?: () => number } = {},
    ) {
        this.now = options.now ?? Date.now;
    }

    async run(): Promise<PoolUpkeep> {
        const upkeep: PoolUpkeep = {
            pools: {
                egress: await this.pools.egress.maintain(),
                identity: await this.pools.identity.maintain(),
                token: await this.pools.token.maintain(),
            },
            tokensAdded: 0,
        };
        upkeep.tokensAdded = await topUpTokens(this.pools.token, this.profiles, this.sources, this.now());

        const changes = Object.entries(upkeep.pools)
            .filter(([, r]) => r.retired + r.reinstated > 0)
            .map(([kind, r]) => `${kind} -${r.retired}/+${r.reinstated}`);
        if (changes.length > 0 || upkeep.tokensAdded > 0) {
            log.info(`[PoolMaintenance] ${[...changes, `${upkeep.tokensAdded} token(s) added`].join(', ')}`);
        }
        return upkeep;
    }
}
