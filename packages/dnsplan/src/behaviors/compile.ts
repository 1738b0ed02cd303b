// dnsplan/src/behaviors/compile.ts — behavior statements to configuration and records

import { isIP, isIPv4, isIPv6 } from 'node:net';
import { GENERATED_ZONES_FILENAME, HINTS_TTL } from '../lib/constants.js';
import { BehaviorError } from '../lib/errors.js';
import type {
    BehaviorStatement,
    ConfigFragment,
    GeneratedFile,
    TargetResolver,
    ZoneRecord,
    ZoneRecordSet,
} from '../lib/types.js';
import { glueLabel, randomLabels } from './labels.js';
import type { LabelSource } from './labels.js';
import { normalizeName, parseBehavior, zoneKey } from './parse.js';
import { getDialect, isSoftwareType } from './software.js';
import type { Dialect } from './software.js';
import { renderZoneFile, zoneFileName } from './zone.js';
import type { ZoneFileOptions } from './zone.js';

export interface BehaviorOutput {
    fragments: ConfigFragment[];
    zones: ZoneRecordSet;
    /** Zone apex per zone key, for rendering. */
    zoneNames: Record<string, string>;
    files: GeneratedFile[];
}

export interface CompileBehaviorOptions {
    labels?: LabelSource;
}

/** Name written into a hints file for a literal address target. */
const ROOT_SERVER_NAME = 'a.root-servers.net';

export function compileBehavior(
    service: string,
    software: string,
    text: string,
    resolver: TargetResolver,
    options: CompileBehaviorOptions = {},
): BehaviorOutput {
    const statements = parseBehavior(service, text);
    const output: BehaviorOutput = { fragments: [], zones: {}, zoneNames: {}, files: [] };
    if (statements.length === 0) return output;

    const compiler = new StatementCompiler(service, getDialect(software), resolver, options.labels ?? randomLabels());
    for (const statement of statements) {
        compiler.compile(statement, output);
    }
    return output;
}

class StatementCompiler {
    constructor(
        private readonly service: string,
        private readonly dialect: Dialect,
        private readonly resolver: TargetResolver,
        private readonly labels: LabelSource,
    ) {}

    compile(statement: BehaviorStatement, output: BehaviorOutput): void {
        switch (statement.kind) {
            case 'forward':
                output.fragments.push(this.dialect.forward(statement.zone, this.addresses(statement)));
                break;
            case 'stub':
                output.fragments.push(this.dialect.stub(statement.zone, this.addresses(statement)));
                break;
            case 'hint':
                this.hint(statement, output);
                break;
            case 'master':
                this.master(statement, output);
                break;
        }
    }

    private hint(statement: BehaviorStatement, output: BehaviorOutput): void {
        if (statement.targets.length !== 1) {
            throw this.error(statement, `'hint' takes exactly one target, got ${statement.targets.length}`);
        }
        const [target] = statement.targets;
        const address = this.address(statement, target);
        const host = `${isIP(target) ? ROOT_SERVER_NAME : target}.`;
        const filename = `gen_${this.service}_root.hints`;
        const containerPath = `${this.dialect.zonesDir}/${filename}`;

        output.files.push({
            filename,
            containerPath,
            content: `.\t${HINTS_TTL}\tIN\tNS\t${host}\n${host}\t${HINTS_TTL}\tIN\tA\t${address}\n`,
        });
        output.fragments.push(this.dialect.hint(statement.zone, containerPath));
    }

    private master(statement: BehaviorStatement, output: BehaviorOutput): void {
        const { zone, rname, rtype, ttl } = statement;
        if (rname === undefined || rtype === undefined || ttl === undefined) {
            throw this.error(statement, 'incomplete master statement');
        }
        const key = zoneKey(zone);
        let records = output.zones[key];
        if (records === undefined) {
            records = [];
            output.zones[key] = records;
            output.zoneNames[key] = zone;
            const file = `${this.dialect.zonesDir}/${zoneFileName(zone)}`;
            output.fragments.push(this.dialect.master(zone, file));
        }

        const name = normalizeName(rname, zone);
        if (rtype === 'TXT') {
            // One record holding every string, in statement order
            const strings = [...statement.targets];
            records.push({ name, type: rtype, ttl, data: strings.join(' '), strings });
            return;
        }
        for (const target of statement.targets) {
            records.push(...this.records(statement, name, rtype, ttl, target));
        }
    }

    private records(
        statement: BehaviorStatement,
        name: string,
        type: ZoneRecord['type'],
        ttl: number,
        target: string,
    ): ZoneRecord[] {
        switch (type) {
            case 'A':
            case 'AAAA': {
                const data = this.address(statement, target);
                const family = type === 'A' ? isIPv4(data) : isIPv6(data);
                if (!family) {
                    throw this.error(statement, `'${target}' is not an ${type === 'A' ? 'IPv4' : 'IPv6'} address`);
                }
                return [{ name, type, ttl, data }];
            }
            case 'NS': {
                if (!this.resolver.isService(target)) {
                    return [{ name, type, ttl, data: normalizeName(target, statement.zone) }];
                }
                // Internal name server: point at a generated host and glue it
                const address = this.address(statement, target);
                const host = normalizeName(glueLabel(target, this.labels), statement.zone);
                return [
                    { name, type: 'NS', ttl, data: host },
                    { name: host, type: 'A', ttl, data: address },
                ];
            }
            default:
                return [{ name, type, ttl, data: normalizeName(target, statement.zone) }];
        }
    }

    private addresses(statement: BehaviorStatement): string[] {
        return statement.targets.map(target => this.address(statement, target));
    }

    /** Address of a target: a literal IP or a service's allocated address. */
    private address(statement: BehaviorStatement, target: string): string {
        if (isIP(target)) return target;
        if (this.resolver.isService(target)) {
            const address = this.resolver.addressOf(target);
            if (address === undefined) {
                throw this.error(statement, `service '${target}' has no address`);
            }
            return address;
        }
        throw this.error(statement, `unresolvable target '${target}': neither an IP address nor a known service`);
    }

    private error(statement: BehaviorStatement, message: string): BehaviorError {
        return new BehaviorError(this.service, statement.line, message);
    }
}

/** Render compiled fragments in the software's syntax. */
export function renderBehaviorConfig(software: string, fragments: readonly ConfigFragment[]): string {
    return getDialect(software).render(fragments);
}

/**
 * The generated behavior configuration file. Bundled templates include it
 * unconditionally, so it is written even when empty; software without
 * behavior support gets none.
 */
export function generatedConfigFile(service: string, software: string, fragments: readonly ConfigFragment[]): GeneratedFile | undefined {
    if (fragments.length === 0 && !isSoftwareType(software)) return undefined;
    const dialect = getDialect(software);
    return {
        filename: GENERATED_ZONES_FILENAME,
        containerPath: `${dialect.zonesDir}/${GENERATED_ZONES_FILENAME}`,
        content: `# Generated for service '${service}'\n${dialect.render(fragments)}\n`,
    };
}

/** Rendered zone file for every zone the statements contributed to. */
export function zoneFiles(software: string, output: BehaviorOutput, options: ZoneFileOptions): GeneratedFile[] {
    const keys = Object.keys(output.zones);
    if (keys.length === 0) return [];
    const dialect = getDialect(software);
    return keys.map(key => {
        const zone = output.zoneNames[key];
        const filename = zoneFileName(zone);
        return {
            filename,
            containerPath: `${dialect.zonesDir}/${filename}`,
            content: renderZoneFile(zone, output.zones[key], options),
        };
    });
}
