// dnsplan/src/lib/schema.ts — project tree validation

import { z } from 'zod';
import type { ZodIssue } from 'zod';
import { isMapping } from 'libconfig';
import type { ConfigMapping, ConfigValue } from 'libconfig';
import { STD_PREFIX } from './constants.js';
import { ConfigError } from './errors.js';
import type { Definition, Project } from './types.js';

const CIDR = /^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/;

const entityName = z.string().min(1).refine(name => !name.includes(':'), {
    message: "names must not contain ':'",
});

const definitionSchema = z.record(z.string(), z.unknown());

const imageEntrySchema = z.object({ name: entityName }).passthrough();

const serviceSchema = definitionSchema.superRefine((service, ctx) => {
    const { image, ref, mixins, build } = service;
    if (build === false) return;
    if (image === undefined && ref === undefined && mixins === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "declare 'image' or 'ref'" });
    }
    if (typeof ref === 'string' && ref.startsWith(STD_PREFIX) && image === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ref'], message: `'${ref}' requires 'image'` });
    }
});

const projectSchema = z.object({
    name: z.string().min(1),
    inet: z.string().regex(CIDR, 'expected an IPv4 CIDR such as 10.88.0.0/16'),
    images: z.union([
        z.array(imageEntrySchema),
        z.record(entityName, definitionSchema),
    ]).optional(),
    builds: z.record(entityName, serviceSchema).optional(),
    auto: definitionSchema.optional(),
    mirror: definitionSchema.optional(),
}).passthrough();

function formatIssues(issues: readonly ZodIssue[]): string {
    return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function mappingAt(tree: ConfigMapping, key: string): ConfigMapping {
    const value = tree[key];
    return isMapping(value) ? value : {};
}

function definitionsOf(value: ConfigMapping): Record<string, Definition> {
    const result: Record<string, Definition> = {};
    for (const [name, definition] of Object.entries(value)) {
        if (isMapping(definition)) result[name] = definition;
    }
    return result;
}

function imagesOf(value: ConfigValue | undefined): Record<string, Definition> {
    if (isMapping(value)) return definitionsOf(value);
    const result: Record<string, Definition> = {};
    if (!Array.isArray(value)) return result;
    for (const entry of value) {
        if (!isMapping(entry) || typeof entry.name !== 'string') continue;
        if (Object.prototype.hasOwnProperty.call(result, entry.name)) {
            throw new ConfigError(`Image '${entry.name}' is defined more than once`);
        }
        result[entry.name] = entry;
    }
    return result;
}

/** Validate a merged project tree and extract its typed view. */
export function validateProject(tree: ConfigValue, source = 'project'): Project {
    const result = projectSchema.safeParse(tree);
    if (!result.success) {
        throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error.issues)}`);
    }
    if (!isMapping(tree)) {
        throw new ConfigError(`Invalid ${source}: expected a mapping`);
    }

    const project: Project = {
        name: result.data.name,
        inet: result.data.inet,
        images: imagesOf(tree.images),
        builds: definitionsOf(mappingAt(tree, 'builds')),
        auto: mappingAt(tree, 'auto'),
    };
    if (isMapping(tree.mirror)) project.mirror = tree.mirror;
    return project;
}
