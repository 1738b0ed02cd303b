// libconfig/src/index.ts
// Public API — re-exports all configuration-tree primitives.

// Types
export type {
    Scalar,
    ConfigMapping,
    ConfigSequence,
    ConfigValue,
    MergeFn,
    Layer,
    ApplyLayersOptions,
} from './types.js';

export type { MergeOptions } from './merge.js';

// Value helpers
export {
    isScalar,
    isSequence,
    isMapping,
    toConfigValue,
    cloneValue,
    projectValue,
    valuesEqual,
    omitKeys,
    getPath,
    hasKey,
    setKey,
} from './value.js';

// Merge engine
export {
    normalizeToMapping,
    createMerge,
    merge,
} from './merge.js';

// Layer application
export {
    applyLayers,
    mergeAll,
} from './layers.js';
