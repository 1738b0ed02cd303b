// dnsplan/src/lib/validate.ts — required-value checks after substitution

import { isMapping } from 'libconfig';
import type { ConfigValue } from 'libconfig';
import { REQUIRED_MARKER, UNRESOLVED_SENTINEL } from './constants.js';
import { RequiredValueError } from './errors.js';
import type { Definition } from './types.js';
import { splitVolume } from './volumes.js';

/** Field paths whose string value still holds the required marker. */
export function findRequired(value: ConfigValue, path = ''): string[] {
    if (typeof value === 'string') {
        return value.includes(REQUIRED_MARKER) ? [path] : [];
    }
    if (Array.isArray(value)) {
        return value.flatMap((item, i) => findRequired(item, `${path}[${i}]`));
    }
    if (isMapping(value)) {
        return Object.entries(value).flatMap(([key, item]) =>
            findRequired(item, path === '' ? key : `${path}.${key}`));
    }
    return [];
}

/**
 * Fail when a service still carries the required marker anywhere, or the
 * unresolved sentinel in a field that must hold a real value.
 */
export function validateRequired(service: string, definition: Definition): void {
    const missing = findRequired(definition);
    if (missing.length > 0) {
        throw new RequiredValueError(
            `Service '${service}': field '${missing[0]}' requires a value but none was provided`,
        );
    }

    for (const key of ['image', 'address']) {
        if (definition[key] === UNRESOLVED_SENTINEL) {
            throw new RequiredValueError(`Service '${service}': field '${key}' resolved to nothing`);
        }
    }

    const volumes = definition.volumes;
    if (!Array.isArray(volumes)) return;
    volumes.forEach((volume, i) => {
        if (typeof volume !== 'string') return;
        const { source } = splitVolume(volume);
        if (source === UNRESOLVED_SENTINEL) {
            throw new RequiredValueError(`Service '${service}': source of 'volumes[${i}]' resolved to nothing`);
        }
    });
}
