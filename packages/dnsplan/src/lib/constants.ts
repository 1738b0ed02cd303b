// dnsplan/src/lib/constants.ts — shared names and reserved tokens

// ─── Reserved placeholders ──────────────────────────────────────────

/** Field must be overridden elsewhere; still present at validation → error. */
export const REQUIRED_MARKER = '${required}';

/** Source is taken verbatim: exempt from existence and path normalization. */
export const ORIGIN_MARKER = '${origin}';

export const RESERVED_PLACEHOLDERS: ReadonlySet<string> = new Set([REQUIRED_MARKER, ORIGIN_MARKER]);

/** Substituted for a placeholder that resolves to nothing and has no default. */
export const UNRESOLVED_SENTINEL = 'none';

/** Maximum number of rescans for nested or chained placeholders. */
export const MAX_SUBSTITUTION_PASSES = 10;

/** Path segment aliases, applied before lookup. */
export const ALIASES: Readonly<Record<string, string>> = {
    service: 'services',
    svc: 'services',
    builds: 'services',
    build: 'services',
    ip: 'address',
    addr: 'address',
    proj: 'project',
};

// ─── References ─────────────────────────────────────────────────────

export const STD_PREFIX = 'std:';
export const RESOURCE_PREFIX = 'resource:';

/** Keys of a definition that drive resolution and never reach the plan as-is. */
export const REFERENCE_KEYS = ['ref', 'mixins'] as const;

// ─── Behaviors ──────────────────────────────────────────────────────

export const DEFAULT_TTL = 3600;
export const ROOT_ZONE = '.';
export const ROOT_ZONE_KEY = 'root';
export const HINTS_TTL = 3600000;

export const GENERATED_ZONES_FILENAME = 'generated_zones.conf';
export const GENERATED_DIR = 'contents';

// ─── Network ────────────────────────────────────────────────────────

/** Leading host addresses of the subnet kept back from dynamic allocation. */
export const RESERVED_HOSTS = 2;

export const DEFAULT_CAP_ADD = ['NET_ADMIN'];
