// libconfig/src/types.ts
// Core type definitions for layered configuration trees.

// ─── Values ─────────────────────────────────────────────────────────

/** Leaf value of a configuration tree. */
export type Scalar = string | number | boolean | null;

/** Ordered mapping with unique string keys. */
export interface ConfigMapping {
    [key: string]: ConfigValue;
}

/** Ordered list of values. */
export type ConfigSequence = ConfigValue[];

/**
 * Any configuration value. Scalars, sequences and mappings are told apart
 * with `isScalar`, `isSequence` and `isMapping`.
 */
export type ConfigValue = Scalar | ConfigSequence | ConfigMapping;

// ─── Merge ──────────────────────────────────────────────────────────

/** Merge function: combines a base value with an override value. */
export type MergeFn = (base: ConfigValue, override: ConfigValue) => ConfigValue;

/** Layer: a value, or a function of the accumulated state producing one. */
export type Layer = ConfigValue | ((prev: ConfigValue) => ConfigValue);

/** Options for applyLayers. */
export interface ApplyLayersOptions {
    merge?: MergeFn;
}
