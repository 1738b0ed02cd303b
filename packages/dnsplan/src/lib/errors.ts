// dnsplan/src/lib/errors.ts — compile error taxonomy
//
// Every error aborts the compile run. Messages name the responsible
// entity (service, image, behavior line, cycle path or field path).

export class DnsPlanError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Structural or schema problems in the loaded configuration. */
export class ConfigError extends DnsPlanError {}

/** A `ref`, mixin, image or template that does not exist. */
export class ReferenceNotFoundError extends DnsPlanError {}

/** A reference chain that loops back on itself. */
export class CircularReferenceError extends DnsPlanError {
    readonly cycle: readonly string[];

    constructor(collection: string, cycle: readonly string[]) {
        super(`Circular reference in ${collection}: ${cycle.join(' → ')}`);
        this.cycle = cycle;
    }
}

/** A behavior statement that cannot be compiled. */
export class BehaviorError extends DnsPlanError {
    readonly service: string;
    readonly line: number;

    constructor(service: string, line: number, message: string) {
        super(`Behavior of '${service}', line ${line}: ${message}`);
        this.service = service;
        this.line = line;
    }
}

/** A placeholder that would substitute a non-scalar value. */
export class SubstitutionError extends DnsPlanError {}

/** A reserved marker or unresolved sentinel left in a field that needs a value. */
export class RequiredValueError extends DnsPlanError {}

/** Address planning failures: bad subnet, clashing or exhausted addresses. */
export class NetworkError extends DnsPlanError {}

/** A hook that threw, returned a bad subtree or rejected the configuration. */
export class HookError extends DnsPlanError {}

/** Unsupported filesystem operation or missing file. */
export class FileSystemError extends DnsPlanError {}
