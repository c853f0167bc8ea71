/**
 * src/broker/redisStore.ts
 *
 * SharedStore on Redis via ioredis.
 *
 * Plain primitives map one-to-one onto Redis commands (LPOP, SADD, HINCRBY...).
 * The four composites run as Lua scripts so each is a single atomic step on
 * the server, whatever the number of worker processes talking to it.
 *
 * Lua numbers come back from Redis truncated to integers, so scripts that
 * produce fractional values return them as strings.
 */

import { Redis, type RedisOptions } from 'ioredis';
import { log } from '@crawlee/core';
import type { ListEnd, SharedStore } from './sharedStore.js';

// ─── Lua ──────────────────────────────────────────────────────────────────────

const POP_LEASE = `
local member = redis.call('LPOP', KEYS[1])
if member then
    redis.call('ZADD', KEYS[2], ARGV[1], member)
end
return member
`;

const MOVE_DUE = `
local due = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1], 'LIMIT', 0, tonumber(ARGV[2]))
for _, member in ipairs(due) do
    redis.call('ZREM', KEYS[1], member)
    if ARGV[3] == 'head' then
        redis.call('LPUSH', KEYS[2], member)
    else
        redis.call('RPUSH', KEYS[2], member)
    end
end
return #due
`;

const CLAIM_SLOT = `
redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
if redis.call('ZSCORE', KEYS[1], ARGV[2]) or redis.call('ZCARD', KEYS[1]) < tonumber(ARGV[3]) then
    redis.call('ZADD', KEYS[1], ARGV[4], ARGV[2])
    return 1
end
return 0
`;

const BLEND_FIELD = `
local current = tonumber(redis.call('HGET', KEYS[1], ARGV[1]) or ARGV[4])
local nextValue = current + tonumber(ARGV[3]) * (tonumber(ARGV[2]) - current)
redis.call('HSET', KEYS[1], ARGV[1], tostring(nextValue))
return tostring(nextValue)
`;

// ─── Connection ───────────────────────────────────────────────────────────────

export interface RedisConnectionConfig {
    url?: string;
    host: string;
    port: number;
    password?: string;
    db: number;
}

let consecutiveFailures = 0;
let lastCircuitBreakerLog = 0;

export function describeRedisTarget(config: RedisConnectionConfig): string {
    return config.url ? config.url.replace(/\/\/([^@]*:)?[^@]+@/, '//***@') : `${config.host}:${config.port}/${config.db}`;
}

export function buildRedisOptions(config: RedisConnectionConfig): RedisOptions {
    const target = describeRedisTarget(config);
    const base: RedisOptions = {
        // Fail commands quickly so callers see a transient error instead of hanging.
        maxRetriesPerRequest: 2,
        keepAlive: 10_000,
        connectTimeout: 10_000,
        commandTimeout: 15_000,
        enableOfflineQueue: true,
        lazyConnect: true,
        retryStrategy(times: number) {
            consecutiveFailures = times;
            if (times > 20) {
                const now = Date.now();
                if (now - lastCircuitBreakerLog > 60_000) {
                    lastCircuitBreakerLog = now;
                    log.error(`[Redis] Prolonged outage (${times} attempts) on ${target}`);
                }
                return 30_000;
            }
            const delay = Math.min(times * 500, 30_000);
            log.info(`[Redis] Reconnecting (attempt ${times}, delay ${delay}ms)`);
            return delay;
        },
        reconnectOnError(err: Error) {
            const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH'];
            if (targetErrors.some((e) => err.message.includes(e))) {
                if (consecutiveFailures <= 20) {
                    log.warning(`[Redis] Reconnecting due to error: ${err.message}`);
                }
                return true;
            }
            return false;
        },
    };
    if (config.url) return { ...base, db: config.db };
    return { ...base, host: config.host, port: config.port, password: config.password, db: config.db };
}

export async function connectRedisStore(config: RedisConnectionConfig): Promise<RedisStore> {
    const options = buildRedisOptions(config);
    const client = config.url ? new Redis(config.url, options) : new Redis(options);
    client.on('error', (err: Error) => {
        log.error(`[Redis] Connection error: ${err.message}`);
    });
    client.on('connect', () => {
        consecutiveFailures = 0;
        log.info(`[Redis] Connected to ${describeRedisTarget(config)}`);
    });
    await client.connect();
    const store = new RedisStore(client);
    if (!(await store.ping())) {
        await store.close();
        throw new Error(`Redis at ${describeRedisTarget(config)} did not answer PING`);
    }
    return store;
}

// ─── Result narrowing ─────────────────────────────────────────────────────────

function asCount(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string') return Number(value);
    return 0;
}

function asMember(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (Buffer.isBuffer(value)) return value.toString('utf8');
    return null;
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class RedisStore implements SharedStore {
    readonly driver = 'redis' as const;

    constructor(private readonly redis: Redis) {}

    async push(list: string, end: ListEnd, ...values: string[]): Promise<number> {
        if (values.length === 0) return this.redis.llen(list);
        return end === 'head' ? this.redis.lpush(list, ...values) : this.redis.rpush(list, ...values);
    }

    async pop(list: string): Promise<string | null> {
        return this.redis.lpop(list);
    }

    async listLength(list: string): Promise<number> {
        return this.redis.llen(list);
    }

    async listRange(list: string, start: number, stop: number): Promise<string[]> {
        return this.redis.lrange(list, start, stop);
    }

    async listTrim(list: string, start: number, stop: number): Promise<void> {
        await this.redis.ltrim(list, start, stop);
    }

    async addToSet(set: string, member: string): Promise<boolean> {
        return (await this.redis.sadd(set, member)) === 1;
    }

    async removeFromSet(set: string, member: string): Promise<boolean> {
        return (await this.redis.srem(set, member)) === 1;
    }

    async isSetMember(set: string, member: string): Promise<boolean> {
        return (await this.redis.sismember(set, member)) === 1;
    }

    async setMembers(set: string): Promise<string[]> {
        return this.redis.smembers(set);
    }

    async setSize(set: string): Promise<number> {
        return this.redis.scard(set);
    }

    async increment(key: string, by = 1): Promise<number> {
        return this.redis.incrby(key, by);
    }

    async getValue(key: string): Promise<string | null> {
        return this.redis.get(key);
    }

    async setValue(key: string, value: string, ttlSeconds?: number): Promise<void> {
        if (ttlSeconds !== undefined) {
            await this.redis.set(key, value, 'EX', Math.max(1, Math.ceil(ttlSeconds)));
        } else {
            await this.redis.set(key, value);
        }
    }

    async expire(key: string, ttlSeconds: number): Promise<void> {
        await this.redis.expire(key, Math.max(1, Math.ceil(ttlSeconds)));
    }

    async deleteKey(key: string): Promise<void> {
        await this.redis.del(key);
    }

    async hashSet(key: string, fields: Record<string, string | number>): Promise<void> {
        if (Object.keys(fields).length === 0) return;
        await this.redis.hset(key, fields);
    }

    async hashSetIfAbsent(key: string, field: string, value: string | number): Promise<boolean> {
        return (await this.redis.hsetnx(key, field, value)) === 1;
    }

    async hashGet(key: string, field: string): Promise<string | null> {
        return this.redis.hget(key, field);
    }

    async hashGetAll(key: string): Promise<Record<string, string>> {
        return this.redis.hgetall(key);
    }

    async hashDelete(key: string, field: string): Promise<boolean> {
        return (await this.redis.hdel(key, field)) === 1;
    }

    async hashIncrement(key: string, field: string, by = 1): Promise<number> {
        return this.redis.hincrby(key, field, by);
    }

    async scheduleAdd(key: string, member: string, at: number): Promise<void> {
        await this.redis.zadd(key, at, member);
    }

    async scheduleRemove(key: string, member: string): Promise<boolean> {
        return (await this.redis.zrem(key, member)) === 1;
    }

    async scheduleSize(key: string): Promise<number> {
        return this.redis.zcard(key);
    }

    async popLease(list: string, leases: string, deadline: number): Promise<string | null> {
        const result: unknown = await this.redis.eval(POP_LEASE, 2, list, leases, deadline);
        return asMember(result);
    }

    async moveDue(schedule: string, list: string, now: number, limit: number, end: ListEnd): Promise<number> {
        const result: unknown = await this.redis.eval(MOVE_DUE, 2, schedule, list, now, limit, end);
        return asCount(result);
    }

    async claimSlot(slots: string, holder: string, limit: number, now: number, deadline: number): Promise<boolean> {
        const result: unknown = await this.redis.eval(CLAIM_SLOT, 1, slots, now, holder, limit, deadline);
        return asCount(result) === 1;
    }

    async blendHashField(key: string, field: string, target: number, alpha: number, initial: number): Promise<number> {
        const result: unknown = await this.redis.eval(BLEND_FIELD, 1, key, field, target, alpha, initial);
        return asCount(result);
    }

    async ping(): Promise<boolean> {
        try {
            return (await this.redis.ping()) === 'PONG';
        } catch (err) {
            log.warning(`[Redis] Ping failed: ${err instanceof Error ? err.message : String(err)}`);
            return false;
        }
    }

    async close(): Promise<void> {
        await this.redis.quit();
    }
}
