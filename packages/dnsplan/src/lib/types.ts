// dnsplan/src/lib/types.ts — data model of a compile run

import type { ConfigMapping } from 'libconfig';

// ─── Definitions ────────────────────────────────────────────────────

/** Image or service definition: a mapping with reserved keys. */
export type Definition = ConfigMapping;

export type Collection = 'images' | 'services';

/** Validated view of a project tree. */
export interface Project {
    name: string;
    inet: string;
    images: Record<string, Definition>;
    builds: Record<string, Definition>;
    auto: ConfigMapping;
    mirror?: ConfigMapping;
}

export interface ResolvedImage {
    name: string;
    software: string;
    version?: string;
    from?: string;
    definition: Definition;
}

// ─── Behaviors ──────────────────────────────────────────────────────

export type SoftwareType = 'bind' | 'unbound' | 'pdns-recursor';

export type BehaviorKind = 'forward' | 'hint' | 'stub' | 'master';

export type RecordType = 'A' | 'AAAA' | 'NS' | 'CNAME' | 'TXT' | 'PTR';

/** One parsed line of a behavior script. */
export interface BehaviorStatement {
    /** 1-based line number in the behavior text. */
    line: number;
    zone: string;
    kind: BehaviorKind;
    targets: string[];
    rname?: string;
    rtype?: RecordType;
    ttl?: number;
}

export interface ZoneRecord {
    name: string;
    type: RecordType;
    ttl: number;
    data: string;
    /** TXT character strings; `data` is then their space-joined form. */
    strings?: readonly string[];
}

/** Records per zone key (`root` for the root zone), in statement order. */
export type ZoneRecordSet = Record<string, ZoneRecord[]>;

export type BehaviorSection = 'server' | 'toplevel';

export interface ConfigFragment {
    section: BehaviorSection;
    text: string;
}

/** A file the compiler generates for a service. */
export interface GeneratedFile {
    /** Path relative to the service's contents directory. */
    filename: string;
    content: string;
    /** Mount point inside the container. */
    containerPath: string;
}

/** Resolves behavior targets that name services. */
export interface TargetResolver {
    isService(name: string): boolean;
    addressOf(name: string): string | undefined;
}

// ─── Plan ───────────────────────────────────────────────────────────

export interface Placement {
    source: string;
    target: string;
    mode?: 'ro' | 'rw';
    /** Source taken verbatim, exempt from path normalization. */
    origin: boolean;
    /** Produced by the compiler rather than declared. */
    generated: boolean;
}

export interface ServicePlan {
    name: string;
    definition: Definition;
    image: ResolvedImage;
    address: string;
    fragments: ConfigFragment[];
    /** Rendered behavior configuration, empty when there is none. */
    behaviorConfig: string;
    zones: ZoneRecordSet;
    files: GeneratedFile[];
    placements: Placement[];
}

export interface BuildPlan {
    name: string;
    inet: string;
    mirror?: ConfigMapping;
    services: Record<string, ServicePlan>;
    topology: Record<string, string[]>;
}
