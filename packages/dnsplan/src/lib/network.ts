// dnsplan/src/lib/network.ts — IPv4 subnet parsing and address allocation

import { isIPv4 } from 'node:net';
import { RESERVED_HOSTS } from './constants.js';
import { NetworkError } from './errors.js';
import type { Definition } from './types.js';

export interface Subnet {
    cidr: string;
    network: number;
    prefix: number;
    broadcast: number;
}

export function ipToInt(ip: string): number {
    return ip.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

export function intToIp(value: number): string {
    return [24, 16, 8, 0].map(shift => Math.floor(value / 2 ** shift) % 256).join('.');
}

export function parseSubnet(cidr: string): Subnet {
    const [address, prefixText, extra] = cidr.split('/');
    const prefix = Number(prefixText);
    if (extra !== undefined || !isIPv4(address) || !/^\d+$/.test(prefixText ?? '') || prefix > 30) {
        throw new NetworkError(`Invalid subnet '${cidr}': expected an IPv4 CIDR with prefix length up to 30`);
    }
    const size = 2 ** (32 - prefix);
    const network = Math.floor(ipToInt(address) / size) * size;
    return { cidr, network, prefix, broadcast: network + size - 1 };
}

export function subnetContains(subnet: Subnet, ip: string): boolean {
    if (!isIPv4(ip)) return false;
    const value = ipToInt(ip);
    return value > subnet.network && value < subnet.broadcast;
}

/** A service taking part in address planning. */
export interface NetworkMember {
    name: string;
    definition: Definition;
}

/**
 * Assign an address to every member. Static `address` values are
 * reserved first; the rest get the lowest free host address after the
 * first RESERVED_HOSTS hosts.
 */
export function planNetwork(inet: string, members: readonly NetworkMember[]): Map<string, string> {
    const subnet = parseSubnet(inet);
    const assigned = new Map<string, string>();
    const owners = new Map<string, string>();

    for (const { name, definition } of members) {
        const address = definition.address;
        if (address === undefined || address === null) continue;
        if (typeof address !== 'string' || !isIPv4(address)) {
            throw new NetworkError(`Service '${name}': address '${String(address)}' is not an IPv4 address`);
        }
        if (!subnetContains(subnet, address)) {
            throw new NetworkError(`Service '${name}': address ${address} is outside subnet ${subnet.cidr}`);
        }
        const owner = owners.get(address);
        if (owner !== undefined) {
            throw new NetworkError(`Services '${owner}' and '${name}' both claim address ${address}`);
        }
        owners.set(address, name);
        assigned.set(name, address);
    }

    let next = subnet.network + 1 + RESERVED_HOSTS;
    for (const { name } of members) {
        if (assigned.has(name)) continue;
        while (next < subnet.broadcast && owners.has(intToIp(next))) next++;
        if (next >= subnet.broadcast) {
            throw new NetworkError(`Subnet ${subnet.cidr} has no free address left for service '${name}'`);
        }
        const address = intToIp(next++);
        owners.set(address, name);
        assigned.set(name, address);
    }

    // Keep member order
    return new Map(members.map(({ name }) => [name, assigned.get(name) ?? '']));
}

/** Services that get an address: those with an image and not marked `build: false`. */
export function isDeployable(definition: Definition): boolean {
    return definition.build !== false && typeof definition.image === 'string';
}
