import { describe, it, expect } from 'vitest';
import { expectedMinBodyBytes, mergeProfile, parseSourceTable } from './sources.js';

describe('mergeProfile', () => {
    it('merges objects key by key and replaces arrays', () => {
        const merged = mergeProfile(
            { pacing: { baseDelayMs: 2000, jitterMs: 500 }, keywords: ['a', 'b'] },
            { pacing: { baseDelayMs: 5000 }, keywords: ['c'] },
        );
        expect(merged).toEqual({ pacing: { baseDelayMs: 5000, jitterMs: 500 }, keywords: ['c'] });
    });
});

describe('parseSourceTable', () => {
    const table = parseSourceTable({
        defaults: { maxPages: 2, pacing: { concurrencyCeiling: 6 }, detection: { minBodyBytes: { search: 500 } } },
        sources: [
            { id: 'strict', pacing: { concurrencyCeiling: 2, initialConcurrency: 1 } },
            { id: 'plain', keywords: ['手机'] },
        ],
        egress: ['http://10.0.0.1:8000', { value: 'http://10.0.0.2:8000', sources: ['strict'] }],
    });

    it('fills each profile from the defaults', () => {
        expect(table.get('strict').pacing.concurrencyCeiling).toBe(2);
        expect(table.get('plain').pacing.concurrencyCeiling).toBe(6);
        expect(table.get('plain').maxPages).toBe(2);
        expect(table.get('plain').pacing.baseDelayMs).toBe(2000);
    });

    it('resolves an unknown source to the defaults under its own id', () => {
        const profile = table.get('elsewhere');
        expect(profile.id).toBe('elsewhere');
        expect(profile.pacing.concurrencyCeiling).toBe(6);
        expect(table.has('elsewhere')).toBe(false);
    });

    it('normalizes egress seeds', () => {
        expect(table.egress).toEqual([
            { value: 'http://10.0.0.1:8000', weight: 1, sources: [] },
            { value: 'http://10.0.0.2:8000', weight: 1, sources: ['strict'] },
        ]);
    });

    it('reads the minimum body size per task kind', () => {
        const rules = table.get('plain').detection;
        expect(expectedMinBodyBytes(rules, 'search')).toBe(500);
        expect(expectedMinBodyBytes(rules, 'shop')).toBe(0);
    });

    it('names the source whose profile is invalid', () => {
        expect(() =>
            parseSourceTable({ sources: [{ id: 'bad', pacing: { concurrencyFloor: 5, concurrencyCeiling: 2 } }] }),
        ).toThrow(/Invalid source profile "bad":\n- pacing: concurrencyFloor must not exceed concurrencyCeiling/);
    });
});
