// dnsplan/src/lib/pipeline.ts — compile a project tree into a build plan
//
// Stages run in a fixed order and each one finishes before the next
// starts:
//   setup hooks → images → services → network → substitution
//   → modify hooks → required values → behaviors → placement
//   → validate hooks → plan
// Work done per service inside a stage is joined with Promise.all.

import { isMapping, merge } from 'libconfig';
import type { ConfigMapping } from 'libconfig';
import {
    compileBehavior,
    generatedConfigFile,
    renderBehaviorConfig,
    zoneFiles,
} from '../behaviors/compile.js';
import type { LabelSource } from '../behaviors/labels.js';
import { mapTopology } from '../behaviors/topology.js';
import { DEFAULT_CAP_ADD } from './constants.js';
import { createContext, projectScope, serviceScope } from './context.js';
import type { Environment } from './context.js';
import { ConfigError, HookError } from './errors.js';
import { MemoryFileSystem } from './fs.js';
import type { FileSystem } from './fs.js';
import { HookRegistry, hookNames, runMutations, runMutationStage, runValidationStage, runValidations } from './hooks.js';
import type { HookCapabilities, HookTarget } from './hooks.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { isDeployable, planNetwork } from './network.js';
import { ImageResolver, ServiceResolver, toResolvedImage } from './resolve.js';
import { validateProject } from './schema.js';
import { substituteTree } from './substitute.js';
import { loadBuiltinTemplates } from './templates.js';
import type { TemplateCatalog } from './templates.js';
import type { BuildPlan, Definition, Project, ResolvedImage, ServicePlan, TargetResolver } from './types.js';
import { validateRequired } from './validate.js';
import { generatedPlacements, servicePlacements } from './volumes.js';

export interface CompileOptions {
    logger?: Logger;
    /** Handed to hooks. Defaults to an empty in-memory filesystem. */
    fs?: FileSystem;
    /** Project directory: relative volume sources resolve here. */
    workdir?: string;
    /** Variables visible as `env.*`. Defaults to `process.env`. */
    env?: Environment;
    hooks?: HookRegistry;
    templates?: TemplateCatalog;
    /** Source of glue label components. Random by default. */
    labels?: LabelSource;
    /** SOA serial for rendered zone files. Defaults to the current Unix time. */
    serial?: number;
}

/** A deployable service as it moves through the stages. */
interface ServiceState {
    name: string;
    definition: Definition;
    image: ResolvedImage;
    address: string;
}

export async function compile(tree: ConfigMapping, options: CompileOptions = {}): Promise<BuildPlan> {
    const logger = options.logger ?? silentLogger;
    const env = options.env ?? process.env;
    const registry = options.hooks ?? new HookRegistry();
    const caps: HookCapabilities = {
        fs: options.fs ?? new MemoryFileSystem(),
        workdir: options.workdir ?? process.cwd(),
        logger,
    };

    // ── Setup hooks ──
    const project = await setupStage(tree, registry, caps);
    logger.info(`Compiling project '${project.name}' (${project.inet})`);

    // ── Images ──
    const imageResolver = new ImageResolver(project.images, logger);
    const projectValues = projectScope(project.name, project.inet);
    const images = new Map<string, ResolvedImage>();
    for (const [name, image] of Object.entries(imageResolver.resolveAll())) {
        const ctx = createContext(`Image '${name}'`, [
            { kind: 'self', values: image.definition },
            { kind: 'project', values: projectValues },
            { kind: 'env', env },
        ]);
        images.set(name, toResolvedImage(name, substituteTree(image.definition, ctx, { logger })));
    }
    const imageFor = (service: string, definition: Definition): ResolvedImage => {
        const name = definition.image;
        if (typeof name !== 'string') {
            throw new ConfigError(`Service '${service}': 'image' must be a string`);
        }
        return images.get(name) ?? imageResolver.resolve(name);
    };

    // ── Services ──
    const serviceResolver = new ServiceResolver(
        project.builds,
        imageResolver,
        options.templates ?? loadBuiltinTemplates(),
        logger,
    );
    const resolved = serviceResolver.resolveAll();
    const deployable = Object.entries(resolved).filter(([, definition]) => isDeployable(definition));
    for (const [name] of Object.entries(resolved).filter(([, definition]) => !isDeployable(definition))) {
        logger.debug(`Service '${name}' is abstract and gets no plan entry`);
    }

    // ── Network ──
    const addresses = planNetwork(project.inet, deployable.map(([name, definition]) => ({ name, definition })));
    let states: ServiceState[] = deployable.map(([name, definition]) => ({
        name,
        definition,
        image: imageFor(name, definition),
        address: addresses.get(name) ?? '',
    }));

    // ── Substitution ──
    const snapshots = new Map<string, ConfigMapping>(states.map(s => [s.name, serviceScope(s.name, s.definition, s.address, s.image)]));
    states = await Promise.all(states.map(async state => {
        const ctx = createContext(`Service '${state.name}'`, [
            { kind: 'self', values: serviceScope(state.name, state.definition, state.address, state.image) },
            { kind: 'project', values: projectValues },
            { kind: 'services', snapshots },
            { kind: 'env', env },
        ]);
        return { ...state, definition: substituteTree(state.definition, ctx, { logger }) };
    }));

    // ── Modify hooks ──
    states = await modifyStage(project, states, registry, caps);

    // ── Required values ──
    for (const state of states) validateRequired(state.name, state.definition);

    // ── Behaviors and placement ──
    const resolver: TargetResolver = {
        isService: name => serviceResolver.has(name),
        addressOf: name => addresses.get(name),
    };
    const serial = options.serial ?? Math.floor(Date.now() / 1000);
    const plans = await Promise.all(states.map(async state => planService(state, resolver, {
        labels: options.labels,
        serial,
        workdir: caps.workdir,
    })));

    // ── Validate hooks ──
    await validateStage(project, plans, registry, caps);

    const behaviors: Record<string, string> = {};
    for (const state of states) behaviors[state.name] = behaviorText(state.name, state.definition);

    const plan: BuildPlan = {
        name: project.name,
        inet: project.inet,
        services: Object.fromEntries(plans.map(p => [p.name, p])),
        topology: mapTopology(behaviors, logger),
    };
    if (project.mirror !== undefined) plan.mirror = project.mirror;
    logger.info(`Planned ${plans.length} service(s) for '${project.name}'`);
    return plan;
}

// ─── Stages ─────────────────────────────────────────────────────────

function serviceTarget(name: string, definition: Definition, stage: 'setup' | 'modify' | 'validate'): HookTarget {
    return {
        entity: `service '${name}'`,
        subtree: definition,
        hooks: hookNames(definition.auto, stage, `Service '${name}'`),
    };
}

async function setupStage(tree: ConfigMapping, registry: HookRegistry, caps: HookCapabilities): Promise<Project> {
    const initial = validateProject(tree);
    const setupTree = await runMutations(registry, 'setup', {
        entity: 'project',
        subtree: tree,
        hooks: hookNames(initial.auto, 'setup', 'Project'),
    }, caps);
    const project = setupTree === tree ? initial : validateProject(setupTree);

    const names = Object.keys(project.builds);
    const results = await runMutationStage(
        registry,
        'setup',
        names.map(name => serviceTarget(name, project.builds[name], 'setup')),
        caps,
    );
    const builds: Record<string, Definition> = {};
    names.forEach((name, i) => { builds[name] = results[i]; });
    return { ...project, builds };
}

async function modifyStage(
    project: Project,
    states: ServiceState[],
    registry: HookRegistry,
    caps: HookCapabilities,
): Promise<ServiceState[]> {
    let current = states;
    const projectHooks = hookNames(project.auto, 'modify', 'Project');
    if (projectHooks.length > 0) {
        const builds = Object.fromEntries(current.map(s => [s.name, s.definition]));
        const result = await runMutations(registry, 'modify', {
            entity: 'project',
            subtree: { name: project.name, inet: project.inet, builds },
            hooks: projectHooks,
        }, caps);
        const next = result.builds;
        if (!isMapping(next) || !sameKeys(Object.keys(next), current.map(s => s.name))) {
            throw new HookError('Project modify hooks may change services but not add or remove them');
        }
        current = current.map(state => {
            const definition = next[state.name];
            if (!isMapping(definition)) {
                throw new HookError(`Project modify hooks replaced service '${state.name}' with a non-mapping`);
            }
            return { ...state, definition };
        });
    }

    const results = await runMutationStage(
        registry,
        'modify',
        current.map(s => serviceTarget(s.name, s.definition, 'modify')),
        caps,
    );
    return current.map((state, i) => ({ ...state, definition: results[i] }));
}

async function validateStage(
    project: Project,
    plans: readonly ServicePlan[],
    registry: HookRegistry,
    caps: HookCapabilities,
): Promise<void> {
    await runValidationStage(registry, plans.map(p => serviceTarget(p.name, p.definition, 'validate')), caps);
    const projectHooks = hookNames(project.auto, 'validate', 'Project');
    if (projectHooks.length === 0) return;
    await runValidations(registry, {
        entity: 'project',
        subtree: {
            name: project.name,
            inet: project.inet,
            builds: Object.fromEntries(plans.map(p => [p.name, p.definition])),
        },
        hooks: projectHooks,
    }, caps);
}

function sameKeys(a: readonly string[], b: readonly string[]): boolean {
    const set = new Set(a);
    return a.length === b.length && b.every(key => set.has(key));
}

// ─── Per service ────────────────────────────────────────────────────

function behaviorText(service: string, definition: Definition): string {
    const behavior = definition.behavior;
    if (behavior === undefined || behavior === null) return '';
    if (typeof behavior === 'string') return behavior;
    if (Array.isArray(behavior) && behavior.every(line => typeof line === 'string')) {
        return behavior.join('\n');
    }
    throw new ConfigError(`Service '${service}': 'behavior' must be text or a list of lines`);
}

interface PlanServiceOptions {
    labels?: LabelSource;
    serial: number;
    workdir: string;
}

function planService(state: ServiceState, resolver: TargetResolver, options: PlanServiceOptions): ServicePlan {
    const { name, image, address } = state;
    const definition = merge(state.definition, { cap_add: DEFAULT_CAP_ADD });
    if (!isMapping(definition)) {
        throw new ConfigError(`Service '${name}' is not a mapping`);
    }

    const software = image.software;
    const output = compileBehavior(name, software, behaviorText(name, definition), resolver, {
        labels: options.labels,
    });
    const files = [
        ...output.files,
        ...zoneFiles(software, output, { nsAddress: address, serial: options.serial }),
    ];
    const generated = generatedConfigFile(name, software, output.fragments);
    if (generated !== undefined) files.push(generated);

    return {
        name,
        definition,
        image,
        address,
        fragments: output.fragments,
        behaviorConfig: output.fragments.length > 0 ? renderBehaviorConfig(software, output.fragments) : '',
        zones: output.zones,
        files,
        placements: [
            ...servicePlacements(name, definition, options.workdir),
            ...generatedPlacements(name, files),
        ],
    };
}
