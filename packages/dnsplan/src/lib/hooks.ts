// dnsplan/src/lib/hooks.ts — named hooks run at fixed pipeline stages
//
// A hook sees a copy of one subtree (the whole project or one service's
// definition) plus narrow capabilities. Mutating hooks return the
// replacement subtree; validation hooks return a verdict. Hooks of one
// stage for different services run concurrently and are joined before
// the next stage starts.

import { cloneValue, isMapping } from 'libconfig';
import type { ConfigMapping, ConfigValue } from 'libconfig';
import { HookError } from './errors.js';
import type { FileSystem } from './fs.js';
import type { Logger } from './logger.js';

export type HookStage = 'setup' | 'modify' | 'validate';

export interface HookCapabilities {
    fs: FileSystem;
    /** Project directory. */
    workdir: string;
    logger: Logger;
}

export type HookVerdict = { ok: true } | { ok: false; reason: string };

export interface MutationHook {
    name: string;
    stage: 'setup' | 'modify';
    run(subtree: ConfigMapping, caps: HookCapabilities): ConfigMapping | Promise<ConfigMapping>;
}

export interface ValidationHook {
    name: string;
    stage: 'validate';
    run(subtree: ConfigMapping, caps: HookCapabilities): HookVerdict | Promise<HookVerdict>;
}

export type Hook = MutationHook | ValidationHook;

export class HookRegistry {
    private readonly hooks = new Map<string, Hook>();

    constructor(hooks: Iterable<Hook> = []) {
        for (const hook of hooks) this.register(hook);
    }

    register(hook: Hook): this {
        if (this.hooks.has(hook.name)) {
            throw new HookError(`Hook '${hook.name}' is already registered`);
        }
        this.hooks.set(hook.name, hook);
        return this;
    }

    has(name: string): boolean {
        return this.hooks.has(name);
    }

    get(name: string, stage: HookStage): Hook {
        const hook = this.hooks.get(name);
        if (hook === undefined) {
            throw new HookError(`Unknown hook '${name}'`);
        }
        if (hook.stage !== stage) {
            throw new HookError(`Hook '${name}' runs at '${hook.stage}', not '${stage}'`);
        }
        return hook;
    }
}

/** Hook names listed for a stage under an `auto` mapping. */
export function hookNames(auto: ConfigValue | undefined, stage: HookStage, owner: string): string[] {
    if (auto === undefined || auto === null) return [];
    if (!isMapping(auto)) {
        throw new HookError(`${owner}: 'auto' must be a mapping of stage to hook names`);
    }
    const names = auto[stage];
    if (names === undefined || names === null) return [];
    const list = Array.isArray(names) ? names : [names];
    return list.map(name => {
        if (typeof name !== 'string') {
            throw new HookError(`${owner}: hook names under 'auto.${stage}' must be strings`);
        }
        return name;
    });
}

/** A subtree and the hooks to run on it. */
export interface HookTarget {
    /** Entity named in errors: `project` or `service '<name>'`. */
    entity: string;
    subtree: ConfigMapping;
    hooks: readonly string[];
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Run mutation hooks in order, each on the previous hook's result. */
export async function runMutations(
    registry: HookRegistry,
    stage: 'setup' | 'modify',
    target: HookTarget,
    caps: HookCapabilities,
): Promise<ConfigMapping> {
    let current = target.subtree;
    for (const name of target.hooks) {
        const hook = registry.get(name, stage);
        if (hook.stage === 'validate') continue;

        let result: unknown;
        try {
            result = await hook.run(cloneValue(current), caps);
        } catch (err) {
            throw new HookError(`Hook '${name}' failed during ${stage} of ${target.entity}: ${describe(err)}`);
        }
        if (!isMapping(result)) {
            throw new HookError(`Hook '${name}' returned a non-mapping during ${stage} of ${target.entity}`);
        }
        caps.logger.debug(`Hook '${name}' applied to ${target.entity}`);
        current = result;
    }
    return current;
}

/** Run validation hooks in order; the first rejection aborts. */
export async function runValidations(
    registry: HookRegistry,
    target: HookTarget,
    caps: HookCapabilities,
): Promise<void> {
    for (const name of target.hooks) {
        const hook = registry.get(name, 'validate');
        if (hook.stage !== 'validate') continue;

        let verdict: HookVerdict;
        try {
            verdict = await hook.run(cloneValue(target.subtree), caps);
        } catch (err) {
            throw new HookError(`Hook '${name}' failed during validate of ${target.entity}: ${describe(err)}`);
        }
        if (!verdict.ok) {
            throw new HookError(`Hook '${name}' rejected ${target.entity}: ${verdict.reason}`);
        }
    }
}

/** Run one stage over many targets concurrently and wait for all of them. */
export async function runMutationStage(
    registry: HookRegistry,
    stage: 'setup' | 'modify',
    targets: readonly HookTarget[],
    caps: HookCapabilities,
): Promise<ConfigMapping[]> {
    return Promise.all(targets.map(target => runMutations(registry, stage, target, caps)));
}

export async function runValidationStage(
    registry: HookRegistry,
    targets: readonly HookTarget[],
    caps: HookCapabilities,
): Promise<void> {
    await Promise.all(targets.map(target => runValidations(registry, target, caps)));
}
