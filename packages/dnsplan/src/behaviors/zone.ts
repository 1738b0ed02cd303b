// dnsplan/src/behaviors/zone.ts — zone file rendering

import { ROOT_ZONE } from '../lib/constants.js';
import type { ZoneRecord } from '../lib/types.js';

export interface ZoneFileOptions {
    /** Address of the apex name server (the owning service). */
    nsAddress: string;
    /** SOA serial. */
    serial: number;
    ttl?: number;
}

/** One-line form used in plans and logs: `www.example.com A 3600 1.2.3.4`. */
export function formatRecord(record: ZoneRecord): string {
    return `${record.name} ${record.type} ${record.ttl} ${record.data}`;
}

export function zoneFileName(zone: string): string {
    return zone === ROOT_ZONE ? 'db.root' : `db.${zone.replace(/\.$/, '')}`;
}

function fqdn(name: string): string {
    return name.endsWith('.') ? name : `${name}.`;
}

function originOf(zone: string): string {
    return zone === ROOT_ZONE ? ROOT_ZONE : fqdn(zone);
}

/** Name as written inside a zone file whose $ORIGIN is `origin`. */
export function relativeName(name: string, origin: string): string {
    const full = fqdn(name);
    if (full === origin) return '@';
    if (origin === ROOT_ZONE) return full.slice(0, -1);
    if (full.endsWith(`.${origin}`)) return full.slice(0, -(origin.length + 1));
    return full;
}

function quote(text: string): string {
    return `"${text.replace(/"/g, '\\"')}"`;
}

function rdata(record: ZoneRecord): string {
    switch (record.type) {
        case 'NS':
        case 'CNAME':
        case 'PTR':
            return fqdn(record.data);
        case 'TXT':
            return (record.strings ?? [record.data]).map(quote).join(' ');
        default:
            return record.data;
    }
}

function line(name: string, ttl: number, type: string, data: string): string {
    return `${name.padEnd(24)}${String(ttl).padEnd(8)}${'IN'.padEnd(8)}${type.padEnd(8)}${data}`;
}

export function renderZoneFile(zone: string, records: readonly ZoneRecord[], options: ZoneFileOptions): string {
    const origin = originOf(zone);
    const ttl = options.ttl ?? 3600;
    const suffix = origin === ROOT_ZONE ? '.' : `.${origin}`;
    const ns = `ns${suffix}`;
    const admin = `admin${suffix}`;

    const lines = [
        `$ORIGIN ${origin}`,
        `$TTL ${ttl}`,
        line('@', ttl, 'SOA', `${ns} ${admin} ${options.serial} 7200 3600 1209600 3600`),
        line('@', ttl, 'NS', ns),
        line(relativeName(ns, origin), ttl, 'A', options.nsAddress),
        ...records.map(record => line(relativeName(record.name, origin), record.ttl, record.type, rdata(record))),
    ];
    return `${lines.join('\n')}\n`;
}
