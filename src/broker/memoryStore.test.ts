import { describe, it, expect } from 'vitest';
import { MemoryStore } from './memoryStore.js';

function setup() {
    const clock = { value: 1_000_000 };
    const store = new MemoryStore({ now: () => clock.value });
    return { clock, store };
}

describe('MemoryStore', () => {
    it('pushes to either end and pops from the head', async () => {
        const { store } = setup();
        await store.push('l', 'tail', 'a', 'b');
        await store.push('l', 'head', 'x', 'y');

        expect(await store.listRange('l', 0, -1)).toEqual(['y', 'x', 'a', 'b']);
        expect(await store.pop('l')).toBe('y');
        expect(await store.listLength('l')).toBe(3);
    });

    it('reports whether a set insert was new', async () => {
        const { store } = setup();
        expect(await store.addToSet('s', 'k')).toBe(true);
        expect(await store.addToSet('s', 'k')).toBe(false);
        expect(await store.removeFromSet('s', 'k')).toBe(true);
        expect(await store.isSetMember('s', 'k')).toBe(false);
    });

    it('drops keys once their expiry passes', async () => {
        const { clock, store } = setup();
        await store.setValue('v', 'x', 10);
        await store.hashSet('h', { a: 1 });
        await store.expire('h', 5);

        clock.value += 5_000;
        expect(await store.getValue('v')).toBe('x');
        expect(await store.hashGetAll('h')).toEqual({});

        clock.value += 5_000;
        expect(await store.getValue('v')).toBeNull();
    });

    it('leases the list head until its deadline and moves due members back', async () => {
        const { clock, store } = setup();
        await store.push('pending', 'tail', 't1', 't2');

        expect(await store.popLease('pending', 'leases', clock.value + 100)).toBe('t1');
        expect(await store.moveDue('leases', 'pending', clock.value + 99, 10, 'head')).toBe(0);
        expect(await store.moveDue('leases', 'pending', clock.value + 100, 10, 'head')).toBe(1);

        expect(await store.listRange('pending', 0, -1)).toEqual(['t1', 't2']);
        expect(await store.scheduleSize('leases')).toBe(0);
    });

    it('admits slot holders up to the limit and frees expired ones', async () => {
        const { clock, store } = setup();
        const now = clock.value;

        expect(await store.claimSlot('slots', 'a', 2, now, now + 50)).toBe(true);
        expect(await store.claimSlot('slots', 'b', 2, now, now + 100)).toBe(true);
        expect(await store.claimSlot('slots', 'c', 2, now, now + 100)).toBe(false);
        // A current holder is refreshed, not refused.
        expect(await store.claimSlot('slots', 'a', 2, now, now + 100)).toBe(true);
        expect(await store.claimSlot('slots', 'c', 2, now + 100, now + 200)).toBe(true);
        expect(await store.scheduleSize('slots')).toBe(1);
    });

    it('blends a hash field toward a target from its initial value', async () => {
        const { store } = setup();
        expect(await store.blendHashField('r', 'score', 0, 0.5, 1)).toBe(0.5);
        expect(await store.blendHashField('r', 'score', 1, 0.5, 1)).toBe(0.75);
        expect(await store.hashGet('r', 'score')).toBe('0.75');
    });
});
