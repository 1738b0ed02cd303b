// dnsplan/src/lib/context.ts — variable scopes seen by substitution
//
// A context is a fixed list of scopes tried in precedence order:
//   self      fields of the entity being substituted (name, address, image.*)
//   project   `project.name`, `project.inet`
//   services  `services.<name>.<path>` against another service's self scope
//   env       `env.<NAME>`
// Contexts are frozen once built and shared read-only across services.

import { cloneValue, getPath } from 'libconfig';
import type { ConfigMapping, ConfigValue } from 'libconfig';
import { ALIASES } from './constants.js';
import type { Definition, ResolvedImage } from './types.js';

export type Environment = Readonly<Record<string, string | undefined>>;

export type Scope =
    | { kind: 'self'; values: ConfigMapping }
    | { kind: 'project'; values: ConfigMapping }
    | { kind: 'services'; snapshots: ReadonlyMap<string, ConfigMapping> }
    | { kind: 'env'; env: Environment };

export interface VariableContext {
    /** Entity the context belongs to, for messages. */
    readonly owner: string;
    readonly scopes: readonly Scope[];
}

export type Lookup =
    | { found: true; value: ConfigValue }
    | { found: false };

const NOT_FOUND: Lookup = { found: false };

// ─── Construction ───────────────────────────────────────────────────

export function imageScope(image: ResolvedImage): ConfigMapping {
    const scope: ConfigMapping = { name: image.name, software: image.software };
    if (image.version !== undefined) scope.version = image.version;
    if (image.from !== undefined) scope.from = image.from;
    return scope;
}

/** Self scope of a service: its definition plus computed fields. */
export function serviceScope(
    name: string,
    definition: Definition,
    address: string,
    image: ResolvedImage,
): ConfigMapping {
    return deepFreeze(cloneValue({ ...definition, name, address, image: imageScope(image) }));
}

export function projectScope(name: string, inet: string): ConfigMapping {
    return deepFreeze({ name, inet });
}

export function createContext(owner: string, scopes: Scope[]): VariableContext {
    return Object.freeze({ owner, scopes: Object.freeze([...scopes]) });
}

function deepFreeze<T extends ConfigValue>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const item of Object.values(value)) deepFreeze(item);
        Object.freeze(value);
    }
    return value;
}

// ─── Lookup ─────────────────────────────────────────────────────────

/**
 * Apply the alias table. Service names (`services.<name>`) and
 * environment variable names are taken literally.
 */
export function canonicalPath(path: string): string[] {
    const segments = path.split('.').map(segment => segment.trim());
    const alias = (segment: string): string => ALIASES[segment] ?? segment;
    const head = alias(segments[0]);

    if (head === 'env') return [head, ...segments.slice(1)];
    if (head === 'services') {
        const [service, ...rest] = segments.slice(1);
        if (service === undefined) return [head];
        return [head, service, ...rest.map(alias)];
    }
    return [head, ...segments.slice(1).map(alias)];
}

export function lookupVariable(ctx: VariableContext, segments: readonly string[]): Lookup {
    const [head, ...rest] = segments;
    for (const scope of ctx.scopes) {
        const result = lookupInScope(scope, head, rest, segments);
        if (result.found) return result;
    }
    return NOT_FOUND;
}

function lookupInScope(scope: Scope, head: string, rest: readonly string[], full: readonly string[]): Lookup {
    switch (scope.kind) {
        case 'self':
            return found(readEntity(scope.values, full));
        case 'project':
            return head === 'project' ? found(getPath(scope.values, rest)) : NOT_FOUND;
        case 'services': {
            if (head !== 'services' || rest.length < 2) return NOT_FOUND;
            const snapshot = scope.snapshots.get(rest[0]);
            return snapshot === undefined ? NOT_FOUND : found(readEntity(snapshot, rest.slice(1)));
        }
        case 'env': {
            if (head !== 'env' || rest.length === 0) return NOT_FOUND;
            const value = scope.env[rest.join('.')];
            return value === undefined ? NOT_FOUND : { found: true, value };
        }
    }
}

// A bare `image` reads as the image name; `image.*` reaches its fields.
function readEntity(values: ConfigMapping, path: readonly string[]): ConfigValue | undefined {
    if (path.length === 1 && path[0] === 'image') return getPath(values, ['image', 'name']);
    return getPath(values, path);
}

function found(value: ConfigValue | undefined): Lookup {
    return value === undefined ? NOT_FOUND : { found: true, value };
}
