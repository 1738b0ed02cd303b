// dnsplan/src/lib/project.ts — YAML project loading with includes
//
// Each file may name other files under `include`. Included trees are
// merged in declaration order and the including file is merged on top,
// so a file always overrides what it includes.

import { load } from 'js-yaml';
import { isMapping, mergeAll, omitKeys, toConfigValue } from 'libconfig';
import type { ConfigMapping, ConfigValue } from 'libconfig';
import { ConfigError } from './errors.js';
import { dirnameOf, formatPath, resolvePath } from './fs.js';
import type { FileSystem, PathDescriptor } from './fs.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { validateProject } from './schema.js';
import type { Project } from './types.js';

const INCLUDE_KEY = 'include';

export interface LoadProjectOptions {
    fs: FileSystem;
    /** Directory relative entry paths resolve against. */
    baseDir?: string;
    logger?: Logger;
}

export interface LoadedProject {
    /** Merged tree, includes applied. */
    tree: ConfigMapping;
    project: Project;
    /** Directory of the entry file; relative volume sources resolve here. */
    workdir: string;
    /** Every file read, entry first. */
    files: string[];
}

export function parseYaml(text: string, source: string): ConfigMapping {
    let data: unknown;
    try {
        data = load(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Failed to parse YAML in ${source}: ${reason}`);
    }
    if (data === undefined || data === null) return {};

    let value: ConfigValue;
    try {
        value = toConfigValue(data);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`${source}: ${reason}`);
    }
    if (!isMapping(value)) {
        throw new ConfigError(`${source}: top level must be a mapping`);
    }
    return value;
}

function readIncludes(tree: ConfigMapping, source: string): string[] {
    const value = tree[INCLUDE_KEY];
    if (value === undefined || value === null) return [];
    const list = Array.isArray(value) ? value : [value];
    return list.map(item => {
        if (typeof item !== 'string') {
            throw new ConfigError(`${source}: '${INCLUDE_KEY}' entries must be paths`);
        }
        return item;
    });
}

async function loadTree(
    desc: PathDescriptor,
    fs: FileSystem,
    stack: readonly string[],
    files: string[],
    logger: Logger,
): Promise<ConfigMapping> {
    const id = formatPath(desc);
    if (stack.includes(id)) {
        const cycle = [...stack.slice(stack.indexOf(id)), id];
        throw new ConfigError(`Include cycle: ${cycle.join(' → ')}`);
    }
    if (!(await fs.exists(desc))) {
        const from = stack.length > 0 ? ` (included from ${stack[stack.length - 1]})` : '';
        throw new ConfigError(`Configuration file not found: ${id}${from}`);
    }

    files.push(id);
    const tree = parseYaml(await fs.read(desc), id);
    const layers: ConfigValue[] = [];
    for (const include of readIncludes(tree, id)) {
        logger.debug(`${id}: including ${include}`);
        layers.push(await loadTree(resolvePath(include, dirnameOf(desc)), fs, [...stack, id], files, logger));
    }
    layers.push(omitKeys(tree, [INCLUDE_KEY]));

    const merged = mergeAll(layers);
    if (!isMapping(merged)) {
        throw new ConfigError(`${id}: merged configuration is not a mapping`);
    }
    return merged;
}

/** Read, merge and validate a project starting from its entry file. */
export async function loadProject(entry: string, options: LoadProjectOptions): Promise<LoadedProject> {
    const logger = options.logger ?? silentLogger;
    const desc = resolvePath(entry, options.baseDir);
    const files: string[] = [];
    const tree = await loadTree(desc, options.fs, [], files, logger);
    const project = validateProject(tree, formatPath(desc));
    logger.info(`Loaded project '${project.name}' from ${files.length} file(s)`);
    return { tree, project, workdir: dirnameOf(desc), files };
}
