// dnsplan/src/behaviors/software.ts — per-software configuration syntax

import { ConfigError } from '../lib/errors.js';
import type { ConfigFragment, SoftwareType } from '../lib/types.js';

export interface Dialect {
    readonly software: SoftwareType;
    /** Directory inside the container holding zone and hints files. */
    readonly zonesDir: string;
    forward(zone: string, upstreams: readonly string[]): ConfigFragment;
    stub(zone: string, primaries: readonly string[]): ConfigFragment;
    hint(zone: string, file: string): ConfigFragment;
    master(zone: string, file: string): ConfigFragment;
    render(fragments: readonly ConfigFragment[]): string;
}

const toplevel = (text: string): ConfigFragment => ({ section: 'toplevel', text });
const server = (text: string): ConfigFragment => ({ section: 'server', text });

function joinFragments(fragments: readonly ConfigFragment[]): string {
    return fragments.map(fragment => fragment.text).join('\n');
}

const bind: Dialect = {
    software: 'bind',
    zonesDir: '/usr/local/etc/zones',
    forward: (zone, upstreams) => toplevel(
        `zone "${zone}" { type forward; forwarders { ${upstreams.map(ip => `${ip};`).join(' ')} }; };`,
    ),
    stub: (zone, primaries) => toplevel(
        `zone "${zone}" { type stub; masters { ${primaries.map(ip => `${ip};`).join(' ')} }; };`,
    ),
    hint: (zone, file) => toplevel(`zone "${zone}" { type hint; file "${file}"; };`),
    master: (zone, file) => toplevel(`zone "${zone}" { type master; file "${file}"; };`),
    render: joinFragments,
};

// Unbound nests root hints under `server:`; zone clauses stand alone.
const unbound: Dialect = {
    software: 'unbound',
    zonesDir: '/usr/local/etc/unbound/zones',
    forward: (zone, upstreams) => toplevel(
        [`forward-zone:`, `    name: "${zone}"`, ...upstreams.map(ip => `    forward-addr: ${ip}`)].join('\n'),
    ),
    stub: (zone, primaries) => toplevel(
        [`stub-zone:`, `    name: "${zone}"`, ...primaries.map(ip => `    stub-addr: ${ip}`)].join('\n'),
    ),
    hint: (_zone, file) => server(`    root-hints: "${file}"`),
    master: (zone, file) => toplevel(
        [`auth-zone:`, `    name: "${zone}"`, `    zonefile: "${file}"`].join('\n'),
    ),
    render: fragments => {
        const serverLines = fragments.filter(f => f.section === 'server').map(f => f.text);
        const others = fragments.filter(f => f.section !== 'server').map(f => f.text);
        const blocks = serverLines.length > 0 ? [['server:', ...serverLines].join('\n'), ...others] : others;
        return blocks.join('\n');
    },
};

const pdnsRecursor: Dialect = {
    software: 'pdns-recursor',
    zonesDir: '/usr/local/etc/zones',
    forward: (zone, upstreams) => toplevel(`forward-zones+=${zone}=${upstreams.join(';')}`),
    stub: (zone, primaries) => toplevel(`forward-zones+=${zone}=${primaries.join(';')}`),
    hint: (_zone, file) => toplevel(`hint-file=${file}`),
    master: (zone, file) => toplevel(`auth-zones+=${zone}=${file}`),
    render: joinFragments,
};

const DIALECTS: Readonly<Record<SoftwareType, Dialect>> = {
    bind,
    unbound,
    'pdns-recursor': pdnsRecursor,
};

export function isSoftwareType(value: string): value is SoftwareType {
    return Object.prototype.hasOwnProperty.call(DIALECTS, value);
}

export function getDialect(software: string): Dialect {
    if (!isSoftwareType(software)) {
        throw new ConfigError(
            `Software '${software}' has no behavior support (expected one of: ${Object.keys(DIALECTS).join(', ')})`,
        );
    }
    return DIALECTS[software];
}
