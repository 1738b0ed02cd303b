// libconfig/src/merge.ts
// Layered deep merge of configuration trees.
//
// The strategy depends on the pair of types meeting under a key:
//   - Mapping × Mapping   → union of keys, shared keys merged recursively
//   - Sequence × Sequence → base, then override elements whose projection
//                           is absent from base
//   - Mapping × Sequence  → both normalized to mappings ("K=V" lists),
//                           shallow merged; full replace if that fails
//   - anything else       → override wins

import { cloneValue, hasKey, isMapping, isScalar, projectValue, setKey } from './value.js';
import type { ConfigMapping, ConfigValue, MergeFn } from './types.js';

// ─── Normalization ──────────────────────────────────────────────────

/**
 * Normalize a value to a mapping.
 *
 * - Mappings are returned as-is.
 * - Sequences of strings become mappings by splitting each element on the
 *   first `=`; a token without `=` maps to `null`.
 * - Everything else (including sequences with non-string elements) cannot
 *   be normalized and yields `undefined`.
 *
 * @example
 * normalizeToMapping(['HTTP_PASS=root', 'VAR_ONLY'])
 * // => { HTTP_PASS: 'root', VAR_ONLY: null }
 */
export function normalizeToMapping(val: ConfigValue): ConfigMapping | undefined {
    if (isMapping(val)) return val;
    if (!Array.isArray(val)) return undefined;

    const result: ConfigMapping = {};
    for (const item of val) {
        if (typeof item !== 'string') return undefined;
        const eq = item.indexOf('=');
        if (eq === -1) {
            setKey(result, item, null);
        } else {
            setKey(result, item.slice(0, eq), item.slice(eq + 1));
        }
    }
    return result;
}

// ─── Configuration ──────────────────────────────────────────────────

/**
 * Options for creating a merge function.
 */
export interface MergeOptions {
    /**
     * Also collapse repeats inside the override sequence itself.
     *
     * With `false`, only override elements already present in the base are
     * dropped: `merge(['a'], ['b', 'b'])` gives `['a', 'b', 'b']`.
     * With `true` the projection set grows while scanning the override,
     * giving `['a', 'b']`.
     *
     * @default false
     */
    dedupeOverrideRepeats?: boolean;
}

// ─── Factory ────────────────────────────────────────────────────────

/**
 * Create a merge function with the given options.
 *
 * The returned function is pure: it never mutates `base` or `override`,
 * and the result shares no containers with either of them.
 */
export function createMerge(options?: MergeOptions): MergeFn {
    const dedupeOverrideRepeats = options?.dedupeOverrideRepeats ?? false;

    const mergeSequences = (base: ConfigValue[], override: ConfigValue[]): ConfigValue[] => {
        const seen = new Set(base.map(projectValue));
        const result = base.map(item => cloneValue(item));
        for (const item of override) {
            const key = projectValue(item);
            if (seen.has(key)) continue;
            if (dedupeOverrideRepeats) seen.add(key);
            result.push(cloneValue(item));
        }
        return result;
    };

    const merge: MergeFn = (base, override) => {
        if (isScalar(base) || isScalar(override)) return cloneValue(override);

        // ── Mapping × Mapping: recursive union ──
        if (isMapping(base) && isMapping(override)) {
            const result: ConfigMapping = {};
            for (const [key, value] of Object.entries(base)) {
                setKey(result, key, hasKey(override, key) ? merge(value, override[key]) : cloneValue(value));
            }
            for (const [key, value] of Object.entries(override)) {
                if (hasKey(base, key)) continue;
                setKey(result, key, cloneValue(value));
            }
            return result;
        }

        // ── Sequence × Sequence: append unseen projections ──
        if (Array.isArray(base) && Array.isArray(override)) {
            return mergeSequences(base, override);
        }

        // ── Mapping × Sequence: normalize both, shallow merge ──
        const baseMap = normalizeToMapping(base);
        const overrideMap = normalizeToMapping(override);
        if (baseMap === undefined || overrideMap === undefined) {
            return cloneValue(override);
        }
        const result = cloneValue(baseMap);
        for (const [key, value] of Object.entries(overrideMap)) {
            setKey(result, key, cloneValue(value));
        }
        return result;
    };

    return merge;
}

/**
 * Default merge: override sequences are de-duplicated against the base
 * only.
 */
export const merge: MergeFn = createMerge();
