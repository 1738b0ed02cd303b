// dnsplan/src/lib/substitute.ts — `${path[:default]}` placeholder expansion
//
// Only innermost placeholders match on each pass, so nested forms such as
// `${services.${peer}.ip}` resolve from the inside out. Passes repeat until
// the text stops changing or the pass cap is reached.

import { isMapping, isScalar, setKey } from 'libconfig';
import type { ConfigMapping, ConfigValue } from 'libconfig';
import {
    MAX_SUBSTITUTION_PASSES,
    REQUIRED_MARKER,
    RESERVED_PLACEHOLDERS,
    UNRESOLVED_SENTINEL,
} from './constants.js';
import { canonicalPath, lookupVariable } from './context.js';
import type { VariableContext } from './context.js';
import { SubstitutionError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

const PLACEHOLDER = /\$\{([^{}]+)\}/g;

export interface SubstituteOptions {
    logger?: Logger;
    maxPasses?: number;
}

export function substitute(text: string, ctx: VariableContext, options: SubstituteOptions = {}): string {
    const logger = options.logger ?? silentLogger;
    const maxPasses = options.maxPasses ?? MAX_SUBSTITUTION_PASSES;

    let current = text;
    for (let pass = 0; pass < maxPasses; pass++) {
        const next = current.replace(PLACEHOLDER, (match: string, body: string) =>
            resolvePlaceholder(match, body, ctx, logger));
        if (next === current) return current;
        current = next;
    }

    if (hasPendingPlaceholder(current)) {
        logger.warn(`${ctx.owner}: placeholders still unresolved after ${maxPasses} passes in '${current}'`);
    }
    return current;
}

function resolvePlaceholder(match: string, body: string, ctx: VariableContext, logger: Logger): string {
    if (RESERVED_PLACEHOLDERS.has(match)) return match;

    const colon = body.indexOf(':');
    const path = colon === -1 ? body : body.slice(0, colon);
    const fallback = colon === -1 ? undefined : body.slice(colon + 1);

    const lookup = lookupVariable(ctx, canonicalPath(path));
    if (!lookup.found) {
        if (fallback !== undefined) {
            logger.debug(`${ctx.owner}: '${path}' not found, using default '${fallback}'`);
            return fallback;
        }
        logger.warn(`${ctx.owner}: cannot resolve '${match}', substituting '${UNRESOLVED_SENTINEL}'`);
        return UNRESOLVED_SENTINEL;
    }

    const { value } = lookup;
    if (!isScalar(value)) {
        const kind = isMapping(value) ? 'a mapping' : 'a sequence';
        throw new SubstitutionError(`${ctx.owner}: placeholder '${match}' resolves to ${kind}, not a scalar`);
    }
    if (value === REQUIRED_MARKER) return REQUIRED_MARKER;
    return value === null ? '' : String(value);
}

function hasPendingPlaceholder(text: string): boolean {
    for (const match of text.matchAll(PLACEHOLDER)) {
        if (!RESERVED_PLACEHOLDERS.has(match[0])) return true;
    }
    return false;
}

/** Substitute every string in a tree; other scalars and keys are kept. */
export function substituteTree<T extends ConfigValue>(value: T, ctx: VariableContext, options?: SubstituteOptions): T;
export function substituteTree(value: ConfigValue, ctx: VariableContext, options: SubstituteOptions = {}): ConfigValue {
    if (typeof value === 'string') return substitute(value, ctx, options);
    if (Array.isArray(value)) return value.map(item => substituteTree(item, ctx, options));
    if (isMapping(value)) {
        const result: ConfigMapping = {};
        for (const [key, item] of Object.entries(value)) {
            setKey(result, key, substituteTree(item, ctx, options));
        }
        return result;
    }
    return value;
}
