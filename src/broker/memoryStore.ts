/**
 * src/broker/memoryStore.ts
 *
 * Single-process SharedStore. Backs the unit tests and --dry-run.
 *
 * Every method runs to completion without awaiting anything, so within one
 * event loop each call is as atomic as its Redis counterpart.
 */

import type { ListEnd, SharedStore } from './sharedStore.js';

export class MemoryStore implements SharedStore {
    readonly driver = 'memory' as const;

    private readonly lists = new Map<string, string[]>();
    private readonly sets = new Map<string, Set<string>>();
    private readonly values = new Map<string, string>();
    private readonly hashes = new Map<string, Map<string, string>>();
    private readonly schedules = new Map<string, Map<string, number>>();
    private readonly expiries = new Map<string, number>();
    private readonly now: () => number;

    constructor(options: { now?: () => number } = {}) {
        this.now = options.now ?? Date.now;
    }

    // ─── Expiry ───────────────────────────────────────────────────────────────

    private sweep(key: string): void {
        const at = this.expiries.get(key);
        if (at !== undefined && at <= this.now()) {
            this.drop(key);
        }
    }

    private drop(key: string): void {
        this.lists.delete(key);
        this.sets.delete(key);
        this.values.delete(key);
        this.hashes.delete(key);
        this.schedules.delete(key);
        this.expiries.delete(key);
    }

    private list(key: string): string[] {
        this.sweep(key);
        let list = this.lists.get(key);
        if (!list) {
            list = [];
            this.lists.set(key, list);
        }
        return list;
    }

    private set(key: string): Set<string> {
        this.sweep(key);
        let set = this.sets.get(key);
        if (!set) {
            set = new Set();
            this.sets.set(key, set);
        }
        return set;
    }

    private hash(key: string): Map<string, string> {
        this.sweep(key);
        let hash = this.hashes.get(key);
        if (!hash) {
            hash = new Map();
            this.hashes.set(key, hash);
        }
        return hash;
    }

    private schedule(key: string): Map<string, number> {
        this.sweep(key);
        let schedule = this.schedules.get(key);
        if (!schedule) {
            schedule = new Map();
            this.schedules.set(key, schedule);
        }
        return schedule;
    }

    // ─── Lists ────────────────────────────────────────────────────────────────

    async push(key: string, end: ListEnd, ...values: string[]): Promise<number> {
        const list = this.list(key);
        for (const value of values) {
            if (end === 'head') list.unshift(value);
            else list.push(value);
        }
        return list.length;
    }

    async pop(key: string): Promise<string | null> {
        return this.list(key).shift() ?? null;
    }

    async listLength(key: string): Promise<number> {
        return this.list(key).length;
    }

    async listRange(key: string, start: number, stop: number): Promise<string[]> {
        const list = this.list(key);
        const end = stop < 0 ? list.length + stop + 1 : stop + 1;
        return list.slice(start < 0 ? Math.max(0, list.length + start) : start, end);
    }

    async listTrim(key: string, start: number, stop: number): Promise<void> {
        const kept = await this.listRange(key, start, stop);
        this.lists.set(key, kept);
    }

    // ─── Sets ─────────────────────────────────────────────────────────────────

    async addToSet(key: string, member: string): Promise<boolean> {
        const set = this.set(key);
        if (set.has(member)) return false;
        set.add(member);
        return true;
    }

    async removeFromSet(key: string, member: string): Promise<boolean> {
        return this.set(key).delete(member);
    }

    async isSetMember(key: string, member: string): Promise<boolean> {
        return this.set(key).has(member);
    }

    async setMembers(key: string): Promise<string[]> {
        return [...this.set(key)];
    }

    async setSize(key: string): Promise<number> {
        return this.set(key).size;
    }

    // ─── Counters & values ────────────────────────────────────────────────────

    async increment(key: string, by = 1): Promise<number> {
        this.sweep(key);
        const next = Number(this.values.get(key) ?? '0') + by;
        this.values.set(key, String(next));
        return next;
    }

    async getValue(key: string): Promise<string | null> {
        this.sweep(key);
        return this.values.get(key) ?? null;
    }

    async setValue(key: string, value: string, ttlSeconds?: number): Promise<void> {
        this.drop(key);
        this.values.set(key, value);
        if (ttlSeconds !== undefined) await this.expire(key, ttlSeconds);
    }

    async expire(key: string, ttlSeconds: number): Promise<void> {
        this.expiries.set(key, this.now() + ttlSeconds * 1000);
    }

    async deleteKey(key: string): Promise<void> {
        this.drop(key);
    }

    // ─── Hashes ───────────────────────────────────────────────────────────────

    async hashSet(key: string, fields: Record<string, string | number>): Promise<void> {
        const hash = this.hash(key);
        for (const [field, value] of Object.entries(fields)) {
            hash.set(field, String(value));
        }
    }

    async hashSetIfAbsent(key: string, field: string, value: string | number): Promise<boolean> {
        const hash = this.hash(key);
        if (hash.has(field)) return false;
        hash.set(field, String(value));
        return true;
    }

    async hashGet(key: string, field: string): Promise<string | null> {
        return this.hash(key).get(field) ?? null;
    }

    async hashGetAll(key: string): Promise<Record<string, string>> {
        return Object.fromEntries(this.hash(key));
    }

    async hashDelete(key: string, field: string): Promise<boolean> {
        return this.hash(key).delete(field);
    }

    async hashIncrement(key: string, field: string, by = 1): Promise<number> {
        const hash = this.hash(key);
        const next = Number(hash.get(field) ?? '0') + by;
        hash.set(field, String(next));
        return next;
    }

    // ─── Schedules ────────────────────────────────────────────────────────────

    async scheduleAdd(key: string, member: string, at: number): Promise<void> {
        this.schedule(key).set(member, at);
    }

    async scheduleRemove(key: string, member: string): Promise<boolean> {
        return this.schedule(key).delete(member);
    }

    async scheduleSize(key: string): Promise<number> {
        return this.schedule(key).size;
    }

    // ─── Atomic composites ────────────────────────────────────────────────────

    async popLease(list: string, leases: string, deadline: number): Promise<string | null> {
        const member = this.list(list).shift();
        if (member === undefined) return null;
        this.schedule(leases).set(member, deadline);
        return member;
    }

    async moveDue(schedule: string, list: string, now: number, limit: number, end: ListEnd): Promise<number> {
        const entries = this.schedule(schedule);
        const due = [...entries]
            .filter(([, at]) => at <= now)
            .sort((a, b) => a[1] - b[1])
            .slice(0, limit);
        const target = this.list(list);
        for (const [member] of due) {
            entries.delete(member);
            if (end === 'head') target.unshift(member);
            else target.push(member);
        }
        return due.length;
    }

    async claimSlot(slots: string, holder: string, limit: number, now: number, deadline: number): Promise<boolean> {
        const held = this.schedule(slots);
        for (const [member, at] of held) {
            if (at <= now) held.delete(member);
        }
        if (held.has(holder) || held.size < limit) {
            held.set(holder, deadline);
            return true;
        }
        return false;
    }

    async blendHashField(key: string, field: string, target: number, alpha: number, initial: number): Promise<number> {
        const hash = this.hash(key);
        const raw = hash.get(field);
        const current = raw === undefined ? initial : Number(raw);
        const next = current + alpha * (target - current);
        hash.set(field, String(next));
        return next;
    }

    // ─── Lifecycle ────────────────────────────────────────────────────────────

    async ping(): Promise<boolean> {
        return true;
    }

    async close(): Promise<void> {
        // nothing to release
    }
}
