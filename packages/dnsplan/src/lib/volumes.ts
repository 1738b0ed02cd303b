// dnsplan/src/lib/volumes.ts — `src:dst[:mode]` volumes to file placements

import path from 'node:path';
import { GENERATED_DIR, ORIGIN_MARKER, RESOURCE_PREFIX } from './constants.js';
import { ConfigError } from './errors.js';
import { formatPath, resolvePath } from './fs.js';
import type { Definition, GeneratedFile, Placement } from './types.js';

export interface VolumeParts {
    source: string;
    target: string;
    mode?: string;
}

/** Split a volume string; a `resource:` source keeps its prefix. */
export function splitVolume(volume: string): VolumeParts {
    const prefix = volume.startsWith(RESOURCE_PREFIX) ? RESOURCE_PREFIX : '';
    const parts = volume.slice(prefix.length).split(':');
    if (parts.length < 2 || parts.length > 3) {
        throw new ConfigError(`Invalid volume '${volume}': expected 'source:target[:mode]'`);
    }
    const [source, target, mode] = parts;
    return { source: `${prefix}${source}`, target, ...(mode === undefined ? {} : { mode }) };
}

function toMode(mode: string | undefined, volume: string): Placement['mode'] {
    if (mode === undefined) return undefined;
    if (mode === 'ro' || mode === 'rw') return mode;
    throw new ConfigError(`Invalid volume '${volume}': mode must be 'ro' or 'rw'`);
}

export function parseVolume(volume: string, workdir: string): Placement {
    const { source, target, mode } = splitVolume(volume);
    const placement = (src: string, origin: boolean): Placement => {
        const resolvedMode = toMode(mode, volume);
        return {
            source: src,
            target,
            ...(resolvedMode === undefined ? {} : { mode: resolvedMode }),
            origin,
            generated: false,
        };
    };

    if (source.startsWith(ORIGIN_MARKER)) {
        return placement(source.slice(ORIGIN_MARKER.length), true);
    }
    if (source.startsWith(RESOURCE_PREFIX) || path.posix.isAbsolute(source)) {
        return placement(source, false);
    }
    return placement(formatPath(resolvePath(source, workdir)), false);
}

/** Declared volumes of a service, in order. */
export function servicePlacements(service: string, definition: Definition, workdir: string): Placement[] {
    const volumes = definition.volumes;
    if (volumes === undefined || volumes === null) return [];
    if (!Array.isArray(volumes)) {
        throw new ConfigError(`Service '${service}': 'volumes' must be a list`);
    }
    return volumes.map((volume, i) => {
        if (typeof volume !== 'string') {
            throw new ConfigError(`Service '${service}': 'volumes[${i}]' must be a string`);
        }
        return parseVolume(volume, workdir);
    });
}

/** Placements for files the compiler writes under `<service>/contents/`. */
export function generatedPlacements(service: string, files: readonly GeneratedFile[]): Placement[] {
    return files.map((file): Placement => ({
        source: `${service}/${GENERATED_DIR}/${file.filename}`,
        target: file.containerPath,
        mode: 'ro',
        origin: false,
        generated: true,
    }));
}
