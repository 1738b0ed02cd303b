// libconfig/src/layers.ts
// Layer application: a left fold of the merge engine over a stack of
// configuration layers.
//
// Layers are either plain values or functions of the accumulated state
// (`prev`), so a layer can inspect what lies beneath it before deciding
// what to contribute. Include merging and template inheritance are both
// expressed as layer stacks:
//   includes:  [included₁, included₂, …, current file]
//   templates: [ref result, mixin₁, mixin₂, …, own fields]

import { merge as defaultMerge } from './merge.js';
import { cloneValue } from './value.js';
import type { ApplyLayersOptions, ConfigValue, Layer } from './types.js';

/**
 * Apply layers to a base value, producing the merged result.
 *
 * Each layer is merged over the accumulated state with `options.merge`
 * (the default merge engine unless given). The base is never mutated.
 *
 * @param base   - Initial state
 * @param layers - Values or `(prev) => value` functions, lowest first
 * @param options - Custom merge strategy
 * @returns Final merged value
 */
export function applyLayers(
    base: ConfigValue,
    layers: readonly Layer[],
    options: ApplyLayersOptions = {},
): ConfigValue {
    const merge = options.merge ?? defaultMerge;

    let current: ConfigValue = cloneValue(base);
    for (const layer of layers) {
        const ext = typeof layer === 'function' ? layer(current) : layer;
        current = merge(current, ext);
    }
    return current;
}

/**
 * Merge a list of values, first to last. An empty list yields an empty
 * mapping.
 */
export function mergeAll(values: readonly ConfigValue[], options: ApplyLayersOptions = {}): ConfigValue {
    if (values.length === 0) return {};
    const [first, ...rest] = values;
    return applyLayers(first, rest, options);
}
