/**
 * src/broker/sharedStore.ts
 *
 * The broker contract every shared component is written against.
 *
 * Queue, pools, error window, dedup sets and daily stats all live behind this
 * interface. Every method is a single atomic operation on the server side;
 * the composite methods at the bottom exist precisely so that callers never
 * need a client-side read-modify-write.
 *
 * Two implementations ship: RedisStore (ioredis + Lua) for real deployments
 * and MemoryStore for tests and --dry-run.
 */

export type ListEnd = 'head' | 'tail';

export interface SharedStore {
    readonly driver: 'redis' | 'memory';

    // ─── Lists ────────────────────────────────────────────────────────────────
    push(list: string, end: ListEnd, ...values: string[]): Promise<number>;
    /** Pops from the head; null when the list is empty. */
    pop(list: string): Promise<string | null>;
    listLength(list: string): Promise<number>;
    listRange(list: string, start: number, stop: number): Promise<string[]>;
    listTrim(list: string, start: number, stop: number): Promise<void>;

    // ─── Sets ─────────────────────────────────────────────────────────────────
    /** Insert-if-absent. Resolves true when the member was not there before. */
    addToSet(set: string, member: string): Promise<boolean>;
    removeFromSet(set: string, member: string): Promise<boolean>;
    isSetMember(set: string, member: string): Promise<boolean>;
    setMembers(set: string): Promise<string[]>;
    setSize(set: string): Promise<number>;

    // ─── Counters & values ────────────────────────────────────────────────────
    increment(key: string, by?: number): Promise<number>;
    getValue(key: string): Promise<string | null>;
    setValue(key: string, value: string, ttlSeconds?: number): Promise<void>;
    expire(key: string, ttlSeconds: number): Promise<void>;
    deleteKey(key: string): Promise<void>;

    // ─── Hashes ───────────────────────────────────────────────────────────────
    hashSet(key: string, fields: Record<string, string | number>): Promise<void>;
    hashSetIfAbsent(key: string, field: string, value: string | number): Promise<boolean>;
    hashGet(key: string, field: string): Promise<string | null>;
    hashGetAll(key: string): Promise<Record<string, string>>;
    hashDelete(key: string, field: string): Promise<boolean>;
    hashIncrement(key: string, field: string, by?: number): Promise<number>;

    // ─── Schedules (members ordered by an epoch-ms score) ─────────────────────
    scheduleAdd(key: string, member: string, at: number): Promise<void>;
    scheduleRemove(key: string, member: string): Promise<boolean>;
    scheduleSize(key: string): Promise<number>;

    // ─── Atomic composites ────────────────────────────────────────────────────

    /** Pops the list head and records it in `leases` with the given deadline. */
    popLease(list: string, leases: string, deadline: number): Promise<string | null>;

    /** Moves up to `limit` members of `schedule` due at `now` onto `list`. */
    moveDue(schedule: string, list: string, now: number, limit: number, end: ListEnd): Promise<number>;

    /**
     * Drops holders whose deadline passed, then admits `holder` while fewer
     * than `limit` are held. A holder already present is refreshed and admitted.
     */
    claimSlot(slots: string, holder: string, limit: number, now: number, deadline: number): Promise<boolean>;

    /** field ← field + alpha · (target − field), starting from `initial`. */
    blendHashField(key: string, field: string, target: number, alpha: number, initial: number): Promise<number>;

    // ─── Lifecycle ────────────────────────────────────────────────────────────
    ping(): Promise<boolean>;
    close(): Promise<void>;
}

/** Joins key segments with ':' under a namespace. */
export function storeKey(namespace: string, ...parts: Array<string | number>): string {
    return [namespace, ...parts].join(':');
}
