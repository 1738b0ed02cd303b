// dnsplan/src/lib/templates.ts — built-in `software:role` service templates

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { cloneValue, isMapping, toConfigValue } from 'libconfig';
import { ConfigError } from './errors.js';
import type { Definition } from './types.js';

const catalogSchema = z.record(
    z.string(),
    z.record(z.string(), z.record(z.string(), z.unknown())),
);

export class TemplateCatalog {
    private readonly templates: ReadonlyMap<string, ReadonlyMap<string, Definition>>;

    constructor(templates: Record<string, Record<string, Definition>>) {
        this.templates = new Map(
            Object.entries(templates).map(([software, roles]) => [software, new Map(Object.entries(roles))]),
        );
    }

    /** Parse a JSON catalog of `{ software: { role: definition } }`. */
    static fromJson(text: string, source = 'templates'): TemplateCatalog {
        let data: unknown;
        try {
            data = JSON.parse(text);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ConfigError(`Invalid template catalog ${source}: ${reason}`);
        }
        const parsed = catalogSchema.safeParse(data);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new ConfigError(`Invalid template catalog ${source} at ${issue.path.join('.')}: ${issue.message}`);
        }

        const templates: Record<string, Record<string, Definition>> = {};
        for (const [software, roles] of Object.entries(parsed.data)) {
            templates[software] = {};
            for (const [role, definition] of Object.entries(roles)) {
                const value = toConfigValue(definition, `${software}:${role}`);
                if (!isMapping(value)) continue;
                templates[software][role] = value;
            }
        }
        return new TemplateCatalog(templates);
    }

    has(software: string, role: string): boolean {
        return this.templates.get(software)?.has(role) ?? false;
    }

    /** Fresh copy of a template, or undefined when unknown. */
    get(software: string, role: string): Definition | undefined {
        const template = this.templates.get(software)?.get(role);
        return template === undefined ? undefined : cloneValue(template);
    }

    /** Template ids in `software:role` form. */
    ids(): string[] {
        const ids: string[] = [];
        for (const [software, roles] of this.templates) {
            for (const role of roles.keys()) ids.push(`${software}:${role}`);
        }
        return ids;
    }
}

let builtin: TemplateCatalog | undefined;

/** Catalog bundled with the package (`resources/templates.json`). */
export function loadBuiltinTemplates(): TemplateCatalog {
    if (builtin === undefined) {
        const file = new URL('../../resources/templates.json', import.meta.url);
        builtin = TemplateCatalog.fromJson(readFileSync(file, 'utf-8'), 'templates.json');
    }
    return builtin;
}
