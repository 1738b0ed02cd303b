// dnsplan/src/index.ts
// Public API — DNS topology compiler.

// Types
export type {
    Definition,
    Collection,
    Project,
    ResolvedImage,
    SoftwareType,
    BehaviorKind,
    RecordType,
    BehaviorStatement,
    ZoneRecord,
    ZoneRecordSet,
    BehaviorSection,
    ConfigFragment,
    GeneratedFile,
    TargetResolver,
    Placement,
    ServicePlan,
    BuildPlan,
} from './lib/types.js';

// Errors
export {
    DnsPlanError,
    ConfigError,
    ReferenceNotFoundError,
    CircularReferenceError,
    BehaviorError,
    SubstitutionError,
    RequiredValueError,
    NetworkError,
    HookError,
    FileSystemError,
} from './lib/errors.js';

// Logging
export type { Logger, LogLevel } from './lib/logger.js';
export { createConsoleLogger, silentLogger } from './lib/logger.js';

// Filesystem
export type { FileSystem, PathDescriptor, Protocol } from './lib/fs.js';
export { DiskFileSystem, MemoryFileSystem, canCopy, resolvePath, formatPath } from './lib/fs.js';

// Project loading
export type { LoadProjectOptions, LoadedProject } from './lib/project.js';
export { loadProject, parseYaml } from './lib/project.js';
export { validateProject } from './lib/schema.js';

// Resolution
export type { GraphSpec } from './lib/graph.js';
export { ReferenceGraph } from './lib/graph.js';
export { ImageResolver, ServiceResolver } from './lib/resolve.js';
export { TemplateCatalog, loadBuiltinTemplates } from './lib/templates.js';

// Substitution
export type { Environment, Scope, VariableContext, Lookup } from './lib/context.js';
export { createContext, canonicalPath, lookupVariable, projectScope, serviceScope } from './lib/context.js';
export type { SubstituteOptions } from './lib/substitute.js';
export { substitute, substituteTree } from './lib/substitute.js';

// Network
export { planNetwork, parseSubnet, isDeployable } from './lib/network.js';

// Hooks
export type {
    Hook,
    HookStage,
    HookVerdict,
    HookCapabilities,
    MutationHook,
    ValidationHook,
} from './lib/hooks.js';
export { HookRegistry } from './lib/hooks.js';

// Behaviors
export type { BehaviorOutput, CompileBehaviorOptions } from './behaviors/compile.js';
export { compileBehavior, renderBehaviorConfig } from './behaviors/compile.js';
export { parseBehavior, normalizeName } from './behaviors/parse.js';
export type { LabelSource } from './behaviors/labels.js';
export { randomLabels, sequentialLabels } from './behaviors/labels.js';
export type { ZoneFileOptions } from './behaviors/zone.js';
export { formatRecord, renderZoneFile } from './behaviors/zone.js';
export { mapTopology } from './behaviors/topology.js';

// Pipeline
export type { CompileOptions } from './lib/pipeline.js';
export { compile } from './lib/pipeline.js';
export { materializePlan } from './lib/materialize.js';
