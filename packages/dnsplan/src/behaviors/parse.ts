// dnsplan/src/behaviors/parse.ts — behavior script grammar
//
//   <zone> forward|hint|stub <target>[,<target>...]
//   <zone> master <rname> <rtype> [<ttl>] <target>[,<target>...]
//
// Blank lines and lines starting with `#` are skipped.

import { DEFAULT_TTL, ROOT_ZONE, ROOT_ZONE_KEY } from '../lib/constants.js';
import { BehaviorError } from '../lib/errors.js';
import type { BehaviorKind, BehaviorStatement, RecordType } from '../lib/types.js';

const KINDS: ReadonlySet<string> = new Set<BehaviorKind>(['forward', 'hint', 'stub', 'master']);

const RECORD_TYPES: readonly RecordType[] = ['A', 'AAAA', 'NS', 'CNAME', 'TXT', 'PTR'];

function isKind(value: string): value is BehaviorKind {
    return KINDS.has(value);
}

function toRecordType(value: string): RecordType | undefined {
    const upper = value.toUpperCase();
    return RECORD_TYPES.find(type => type === upper);
}

function splitTargets(text: string): string[] {
    return text.split(',').map(target => target.trim()).filter(target => target.length > 0);
}

export function parseBehavior(service: string, text: string): BehaviorStatement[] {
    const statements: BehaviorStatement[] = [];
    text.split(/\r?\n/).forEach((raw, index) => {
        const line = raw.trim();
        if (line === '' || line.startsWith('#')) return;
        statements.push(parseLine(service, index + 1, line));
    });
    return statements;
}

export function parseLine(service: string, lineNo: number, line: string): BehaviorStatement {
    const fail = (message: string): never => {
        throw new BehaviorError(service, lineNo, `${message}: '${line}'`);
    };
    const tokens = line.split(/\s+/);
    if (tokens.length < 3) fail('malformed statement');

    const [zone, kind] = tokens;
    if (!isKind(kind)) return fail(`unknown behavior '${kind}'`);

    if (kind !== 'master') {
        if (tokens.length !== 3) fail(`'${kind}' takes a zone and a target list`);
        const targets = splitTargets(tokens[2]);
        if (targets.length === 0) fail('no targets');
        return { line: lineNo, zone, kind, targets };
    }

    if (tokens.length !== 5 && tokens.length !== 6) {
        fail("'master' takes a zone, a name, a record type, an optional TTL and a target list");
    }
    const rname = tokens[2];
    const rtype = toRecordType(tokens[3]);
    if (rtype === undefined) return fail(`unsupported record type '${tokens[3]}'`);

    let ttl = DEFAULT_TTL;
    if (tokens.length === 6) {
        if (!/^\d+$/.test(tokens[4])) fail(`invalid TTL '${tokens[4]}'`);
        ttl = Number(tokens[4]);
    }
    const targets = splitTargets(tokens[tokens.length - 1]);
    if (targets.length === 0) fail('no targets');

    return { line: lineNo, zone, kind, targets, rname, rtype, ttl };
}

// ─── Names ──────────────────────────────────────────────────────────

/**
 * Qualify a name against a zone: `@` is the apex, a trailing dot marks a
 * fully qualified name, anything else is relative to the zone.
 */
export function normalizeName(name: string, zone: string): string {
    if (name === '@') return zone;
    if (name.endsWith('.')) return name;
    if (zone === ROOT_ZONE) return `${name}.`;
    return `${name}.${zone.replace(/\.$/, '')}`;
}

/** Key of a zone in a ZoneRecordSet. */
export function zoneKey(zone: string): string {
    if (zone === ROOT_ZONE) return ROOT_ZONE_KEY;
    return zone.replace(/\.$/, '');
}
