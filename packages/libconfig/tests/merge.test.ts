// tests/merge.test.ts — Tests for the merge engine
import { describe, it, expect } from 'vitest';
import { createMerge, getPath, hasKey, isMapping, merge, normalizeToMapping, toConfigValue } from '../src/index.js';
import type { ConfigValue } from '../src/index.js';

// ─── Mapping × Mapping ──────────────────────────────────────────────

describe('merge — mappings', () => {
    it('takes the union of keys and merges shared keys recursively', () => {
        const result = merge(
            { image: 'bind', env: { A: '1', B: '2' } },
            { address: '10.0.0.2', env: { B: '3' } },
        );
        expect(result).toEqual({
            image: 'bind',
            env: { A: '1', B: '3' },
            address: '10.0.0.2',
        });
    });

    it('keeps base key order, then appends override-only keys', () => {
        const result = merge({ b: 1, a: 2 }, { c: 3, a: 4 });
        expect(isMapping(result) ? Object.keys(result) : []).toEqual(['b', 'a', 'c']);
    });

    it('merging an empty mapping on top is an identity', () => {
        const base = { a: 1, b: ['x'], c: { d: null } };
        expect(merge(base, {})).toEqual(base);
    });

    it('merging onto an empty mapping is an identity', () => {
        const override = { a: 1, b: ['x'], c: { d: null } };
        expect(merge({}, override)).toEqual(override);
    });
});

// ─── Sequence × Sequence ────────────────────────────────────────────

describe('merge — sequences', () => {
    it('appends override elements missing from base', () => {
        expect(merge(['vim', 'dnsutils'], ['dnsutils', 'tcpdump']))
            .toEqual(['vim', 'dnsutils', 'tcpdump']);
    });

    it('does not collapse repeats inside the override itself', () => {
        expect(merge(['a'], ['b', 'b', 'a'])).toEqual(['a', 'b', 'b']);
    });

    it('keeps repeats already present in base', () => {
        expect(merge(['a', 'a'], ['a'])).toEqual(['a', 'a']);
    });

    it('compares elements by string projection', () => {
        expect(merge([1, true], ['1', 'true', 2])).toEqual([1, true, 2]);
    });

    it('compares mapping elements structurally', () => {
        expect(merge([{ a: 1, b: 2 }], [{ b: 2, a: 1 }, { a: 3 }]))
            .toEqual([{ a: 1, b: 2 }, { a: 3 }]);
    });

    it('dedupeOverrideRepeats also collapses override repeats', () => {
        const dedupe = createMerge({ dedupeOverrideRepeats: true });
        expect(dedupe(['a'], ['b', 'b', 'a', 'c'])).toEqual(['a', 'b', 'c']);
    });
});

// ─── Mapping × Sequence ─────────────────────────────────────────────

describe('merge — mapping/sequence normalization', () => {
    it('normalizes a KEY=VALUE list and shallow merges', () => {
        expect(merge({ HTTP_USER: 'root' }, ['HTTP_PASS=root', 'VAR_ONLY']))
            .toEqual({ HTTP_USER: 'root', HTTP_PASS: 'root', VAR_ONLY: null });
    });

    it('works in the other direction, override winning', () => {
        expect(merge(['A=1', 'B=2'], { B: '3' })).toEqual({ A: '1', B: '3' });
    });

    it('splits on the first = only', () => {
        expect(merge({}, ['X=a=b'])).toEqual({ X: 'a=b' });
    });

    it('falls back to full replacement when normalization fails', () => {
        expect(merge({ a: 1 }, [1, 2])).toEqual([1, 2]);
        expect(merge([{ x: 1 }], { a: 1 })).toEqual({ a: 1 });
    });
});

// ─── Other pairings ─────────────────────────────────────────────────

describe('merge — scalars and mismatches', () => {
    it('override scalar wins', () => {
        expect(merge('a', 'b')).toBe('b');
        expect(merge(1, null)).toBeNull();
    });

    it('scalar replaces container and vice versa', () => {
        expect(merge({ a: 1 }, 'x')).toBe('x');
        expect(merge('x', ['a'])).toEqual(['a']);
    });
});

// ─── Purity ─────────────────────────────────────────────────────────

describe('merge — keys named like object members', () => {
    it('keeps base keys that shadow Object.prototype members', () => {
        const result = merge({ constructor: 'x', toString: 'y' }, {});
        expect(isMapping(result) ? Object.keys(result) : []).toEqual(['constructor', 'toString']);
        expect(getPath(result, ['constructor'])).toBe('x');
        expect(getPath(result, ['toString'])).toBe('y');
    });

    it('adds override keys that shadow Object.prototype members', () => {
        const result = merge({}, { valueOf: 1 });
        expect(isMapping(result) && hasKey(result, 'valueOf')).toBe(true);
        expect(getPath(result, ['valueOf'])).toBe(1);
    });

    it('merges such keys recursively when both sides have them', () => {
        const result = merge({ constructor: { a: 1 } }, { constructor: { b: 2 } });
        expect(getPath(result, ['constructor', 'a'])).toBe(1);
        expect(getPath(result, ['constructor', 'b'])).toBe(2);
    });

    it('treats a parsed __proto__ key as data', () => {
        const base = toConfigValue(JSON.parse('{"__proto__":{"a":1},"b":2}'));
        const result = merge(base, { b: 3 });
        expect(isMapping(result)).toBe(true);
        expect(isMapping(result) ? Object.keys(result) : []).toEqual(['__proto__', 'b']);
        expect(getPath(result, ['__proto__', 'a'])).toBe(1);
        expect(getPath(result, ['b'])).toBe(3);
    });

    it('normalizes K=V lists with such names', () => {
        const result = merge({ toString: 'a' }, ['constructor=b']);
        expect(getPath(result, ['toString'])).toBe('a');
        expect(getPath(result, ['constructor'])).toBe('b');
    });
});

describe('merge — purity', () => {
    it('never mutates its inputs', () => {
        const base: ConfigValue = { list: ['a'], nested: { k: 'v' } };
        const override: ConfigValue = { list: ['b'], nested: { k: 'w' } };
        merge(base, override);
        expect(base).toEqual({ list: ['a'], nested: { k: 'v' } });
        expect(override).toEqual({ list: ['b'], nested: { k: 'w' } });
    });

    it('does not alias containers from either input', () => {
        const shared = { deep: ['x'] };
        const result = merge({ a: shared }, { b: shared });
        expect(getPath(result, ['a'])).not.toBe(shared);
        expect(getPath(result, ['b'])).not.toBe(shared);
        expect(getPath(result, ['a', 'deep'])).not.toBe(shared.deep);
        expect(getPath(result, ['b', 'deep'])).not.toBe(shared.deep);
    });
});

// ─── normalizeToMapping ─────────────────────────────────────────────

describe('normalizeToMapping', () => {
    it('returns mappings unchanged', () => {
        const m = { a: 1 };
        expect(normalizeToMapping(m)).toBe(m);
    });

    it('rejects sequences with non-string elements', () => {
        expect(normalizeToMapping(['a', 1])).toBeUndefined();
    });

    it('rejects scalars', () => {
        expect(normalizeToMapping('a=b')).toBeUndefined();
    });
});
