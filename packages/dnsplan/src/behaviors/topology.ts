// dnsplan/src/behaviors/topology.ts — who talks to whom, read from behavior scripts

import { isIP } from 'node:net';
import type { Logger } from '../lib/logger.js';
import { silentLogger } from '../lib/logger.js';

/**
 * Map each service to the sorted targets its behavior lines name.
 * Parsing is lenient: malformed lines are skipped, since compilation
 * reports them. Record targets of `master` lines only count when they
 * name a service.
 */
export function mapTopology(
    behaviors: Readonly<Record<string, string>>,
    logger: Logger = silentLogger,
): Record<string, string[]> {
    const services = new Set(Object.keys(behaviors));
    const topology: Record<string, string[]> = {};

    for (const [service, text] of Object.entries(behaviors)) {
        const targets = new Set<string>();
        for (const raw of text.split(/\r?\n/)) {
            const tokens = raw.trim().split(/\s+/);
            if (tokens.length < 3 || tokens[0].startsWith('#')) continue;
            const isMaster = tokens[1] === 'master';
            for (const target of tokens[tokens.length - 1].split(',')) {
                const name = target.trim();
                if (name === '') continue;
                if (services.has(name)) {
                    targets.add(name);
                } else if (!isMaster) {
                    if (!isIP(name)) logger.warn(`Service '${service}': behavior target '${name}' is not a known service`);
                    targets.add(name);
                }
            }
        }
        topology[service] = [...targets].sort();
    }
    return topology;
}
