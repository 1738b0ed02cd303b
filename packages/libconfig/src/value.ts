// libconfig/src/value.ts
// Type guards and helpers for the ConfigValue variant.

import type { ConfigMapping, ConfigSequence, ConfigValue, Scalar } from './types.js';

/** Check if a value is a scalar leaf (string, number, boolean or null). */
export function isScalar(val: unknown): val is Scalar {
    return (
        val === null ||
        typeof val === 'string' ||
        typeof val === 'number' ||
        typeof val === 'boolean'
    );
}

/** Check if a value is a sequence. */
export function isSequence(val: unknown): val is ConfigSequence {
    return Array.isArray(val);
}

/** Check if a value is a plain mapping. */
export function isMapping(val: unknown): val is ConfigMapping {
    if (val === null || typeof val !== 'object' || Array.isArray(val)) return false;
    const proto: unknown = Object.getPrototypeOf(val);
    return proto === Object.prototype || proto === null;
}

// ─── Own keys ───────────────────────────────────────────────────────
// Keys such as `constructor` or `__proto__` are ordinary data here, so
// lookups ignore the prototype chain and writes never go through a setter.

/** Check if a mapping has `key` as its own entry. */
export function hasKey(mapping: ConfigMapping, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(mapping, key);
}

/** Store `value` under `key` as an own, enumerable entry. */
export function setKey(mapping: ConfigMapping, key: string, value: ConfigValue): void {
    Object.defineProperty(mapping, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Convert arbitrary parsed data (YAML, JSON) into a ConfigValue.
 * `undefined` members are dropped; anything that is not a scalar,
 * array or plain object is rejected.
 *
 * @param path - location used in error messages
 */
export function toConfigValue(data: unknown, path = '$'): ConfigValue {
    if (isScalar(data)) return data;
    if (Array.isArray(data)) {
        return data.map((item, i) => toConfigValue(item, `${path}[${i}]`));
    }
    if (isMapping(data)) {
        const result: ConfigMapping = {};
        for (const [key, value] of Object.entries(data)) {
            if (value === undefined) continue;
            setKey(result, key, toConfigValue(value, `${path}.${key}`));
        }
        return result;
    }
    if (data instanceof Date) return data.toISOString();
    throw new Error(`Unsupported configuration value at ${path}: ${typeof data}`);
}

/** Deep copy; the result shares no containers with the input. */
export function cloneValue<T extends ConfigValue>(val: T): T;
export function cloneValue(val: ConfigValue): ConfigValue {
    if (Array.isArray(val)) return val.map(item => cloneValue(item));
    if (isMapping(val)) {
        const result: ConfigMapping = {};
        for (const [key, value] of Object.entries(val)) {
            setKey(result, key, cloneValue(value));
        }
        return result;
    }
    return val;
}

/**
 * Canonical string projection used for sequence de-duplication.
 * Scalars stringify like `String(v)`; containers as JSON with sorted keys.
 */
export function projectValue(val: ConfigValue): string {
    if (isScalar(val)) return String(val);
    return JSON.stringify(canonicalize(val));
}

function canonicalize(val: ConfigValue): ConfigValue {
    if (Array.isArray(val)) return val.map(canonicalize);
    if (isMapping(val)) {
        const result: ConfigMapping = {};
        for (const key of Object.keys(val).sort()) {
            setKey(result, key, canonicalize(val[key]));
        }
        return result;
    }
    return val;
}

/** Structural equality of two values. */
export function valuesEqual(a: ConfigValue, b: ConfigValue): boolean {
    if (isScalar(a) || isScalar(b)) return a === b;
    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
        return a.every((item, i) => valuesEqual(item, b[i]));
    }
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every(key => hasKey(b, key) && valuesEqual(a[key], b[key]));
}

/** Copy of a mapping without the given keys. */
export function omitKeys(mapping: ConfigMapping, keys: Iterable<string>): ConfigMapping {
    const skip = new Set(keys);
    const result: ConfigMapping = {};
    for (const [key, value] of Object.entries(mapping)) {
        if (skip.has(key)) continue;
        setKey(result, key, value);
    }
    return result;
}

/**
 * Read a dot-separated path from a value. Returns `undefined` when a
 * segment is missing or a non-mapping is traversed.
 */
export function getPath(val: ConfigValue, segments: readonly string[]): ConfigValue | undefined {
    let current: ConfigValue = val;
    for (const segment of segments) {
        if (!isMapping(current) || !hasKey(current, segment)) return undefined;
        current = current[segment];
    }
    return current;
}
