// dnsplan/src/lib/resolve.ts — image and service inheritance
//
// A definition is built from layers, lowest first:
//   1. its `ref` (sibling, `software:role` template or `std:role`)
//   2. each of its `mixins`, in declaration order
//   3. its own fields, without `ref` and `mixins`
// Sibling references go through a ReferenceGraph per collection, so
// cycles abort with the full path and every node is resolved once.

import { applyLayers, isMapping, omitKeys } from 'libconfig';
import type { ConfigValue, Layer } from 'libconfig';
import { REFERENCE_KEYS, STD_PREFIX } from './constants.js';
import { ConfigError, ReferenceNotFoundError } from './errors.js';
import { ReferenceGraph } from './graph.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { TemplateCatalog } from './templates.js';
import type { Definition, ResolvedImage } from './types.js';

/** Keys a child never inherits from what it references. */
const NON_INHERITED_KEYS = ['build'];

// ─── Reference parsing ──────────────────────────────────────────────

type Reference =
    | { kind: 'sibling'; name: string }
    | { kind: 'preset'; software: string; detail: string };

function parseReference(ref: string): Reference {
    const colon = ref.indexOf(':');
    if (colon === -1) return { kind: 'sibling', name: ref };
    return { kind: 'preset', software: ref.slice(0, colon), detail: ref.slice(colon + 1) };
}

function readString(definition: Definition, key: string, owner: string): string | undefined {
    const value = definition[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new ConfigError(`${owner}: '${key}' must be a string`);
    }
    return value;
}

function readReferences(definition: Definition, owner: string): string[] {
    const refs: string[] = [];
    const ref = readString(definition, 'ref', owner);
    if (ref !== undefined) refs.push(ref);

    const mixins = definition.mixins;
    if (mixins === undefined || mixins === null) return refs;
    const list = Array.isArray(mixins) ? mixins : [mixins];
    for (const mixin of list) {
        if (typeof mixin !== 'string') {
            throw new ConfigError(`${owner}: 'mixins' entries must be strings`);
        }
        refs.push(mixin);
    }
    return refs;
}

function siblingsOf(definition: Definition, owner: string): string[] {
    const names: string[] = [];
    for (const ref of readReferences(definition, owner)) {
        const parsed = parseReference(ref);
        if (parsed.kind === 'sibling') names.push(parsed.name);
    }
    return names;
}

function toDefinition(value: ConfigValue, owner: string): Definition {
    if (!isMapping(value)) {
        throw new ConfigError(`${owner} did not resolve to a mapping`);
    }
    return value;
}

function inherited(definition: Definition): Definition {
    return omitKeys(definition, NON_INHERITED_KEYS);
}

// ─── Images ─────────────────────────────────────────────────────────

export class ImageResolver {
    private readonly graph: ReferenceGraph<Definition>;

    constructor(
        private readonly images: Record<string, Definition>,
        private readonly logger: Logger = silentLogger,
    ) {
        this.graph = new ReferenceGraph<Definition>({
            collection: 'images',
            nodes: Object.keys(images),
            edges: id => siblingsOf(this.images[id], `Image '${id}'`),
            build: (id, get) => this.build(id, get),
        });
    }

    has(name: string): boolean {
        return this.graph.has(name) || parseReference(name).kind === 'preset';
    }

    /**
     * Resolve an image by name. An undefined `software:version` name is a
     * preset image carrying just those two fields.
     */
    resolve(name: string): ResolvedImage {
        if (!this.graph.has(name)) {
            const parsed = parseReference(name);
            if (parsed.kind === 'preset') {
                return toResolvedImage(name, { software: parsed.software, version: parsed.detail });
            }
        }
        return toResolvedImage(name, this.graph.resolve(name));
    }

    resolveAll(): Record<string, ResolvedImage> {
        const result: Record<string, ResolvedImage> = {};
        for (const name of this.graph.ids()) result[name] = this.resolve(name);
        return result;
    }

    private build(id: string, get: (dep: string) => Definition): Definition {
        const own = this.images[id];
        const owner = `Image '${id}'`;
        const layers: Layer[] = [];
        let base: Definition = {};

        readReferences(own, owner).forEach((ref, index) => {
            const parsed = parseReference(ref);
            const value = parsed.kind === 'sibling'
                ? inherited(get(parsed.name))
                : { software: parsed.software, version: parsed.detail };
            if (index === 0 && own.ref !== undefined) base = value;
            else layers.push(value);
        });
        layers.push(omitKeys(own, REFERENCE_KEYS));

        this.logger.debug(`Resolved image '${id}'`);
        return toDefinition(applyLayers(base, layers), owner);
    }
}

/** Typed view of a resolved image definition. */
export function toResolvedImage(name: string, definition: Definition): ResolvedImage {
    const owner = `Image '${name}'`;
    const software = readString(definition, 'software', owner);
    if (software === undefined) {
        throw new ConfigError(`${owner} has no 'software'`);
    }
    const version = scalarText(definition.version);
    const from = readString(definition, 'from', owner);
    return {
        name,
        software,
        ...(version === undefined ? {} : { version }),
        ...(from === undefined ? {} : { from }),
        definition: { ...definition, name },
    };
}

function scalarText(value: ConfigValue | undefined): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string' || typeof value === 'number') return String(value);
    return undefined;
}

// ─── Services ───────────────────────────────────────────────────────

export class ServiceResolver {
    private readonly graph: ReferenceGraph<Definition>;

    constructor(
        private readonly builds: Record<string, Definition>,
        private readonly images: ImageResolver,
        private readonly templates: TemplateCatalog,
        private readonly logger: Logger = silentLogger,
    ) {
        this.graph = new ReferenceGraph<Definition>({
            collection: 'services',
            nodes: Object.keys(builds),
            edges: id => siblingsOf(this.builds[id], `Service '${id}'`),
            build: (id, get) => this.build(id, get),
        });
    }

    has(name: string): boolean {
        return this.graph.has(name);
    }

    names(): string[] {
        return this.graph.ids();
    }

    resolve(name: string): Definition {
        return this.graph.resolve(name);
    }

    resolveAll(): Record<string, Definition> {
        const result: Record<string, Definition> = {};
        for (const name of this.graph.ids()) result[name] = this.resolve(name);
        return result;
    }

    private build(id: string, get: (dep: string) => Definition): Definition {
        const own = this.builds[id];
        const layers: Layer[] = [];
        let base: Definition = {};

        readReferences(own, `Service '${id}'`).forEach((ref, index) => {
            const parsed = parseReference(ref);
            const value = parsed.kind === 'sibling'
                ? inherited(get(parsed.name))
                : this.template(id, own, ref, parsed.software, parsed.detail);
            if (index === 0 && own.ref !== undefined) base = value;
            else layers.push(value);
        });
        layers.push(omitKeys(own, REFERENCE_KEYS));

        this.logger.debug(`Resolved service '${id}'`);
        return toDefinition(applyLayers(base, layers), `Service '${id}'`);
    }

    /** Expand `software:role` or `std:role` into a template copy. */
    private template(id: string, own: Definition, ref: string, software: string, role: string): Definition {
        let resolvedSoftware = software;
        if (`${software}:` === STD_PREFIX) {
            const image = readString(own, 'image', `Service '${id}'`);
            if (image === undefined) {
                throw new ConfigError(`Service '${id}': reference '${ref}' requires an 'image'`);
            }
            if (!this.images.has(image)) {
                throw new ReferenceNotFoundError(`Service '${id}': unknown image '${image}'`);
            }
            resolvedSoftware = this.images.resolve(image).software;
            this.logger.debug(`Service '${id}': '${ref}' expands to '${resolvedSoftware}:${role}'`);
        }

        const template = this.templates.get(resolvedSoftware, role);
        if (template === undefined) {
            throw new ReferenceNotFoundError(
                `Service '${id}': unknown template '${resolvedSoftware}:${role}'`,
            );
        }
        return template;
    }
}
