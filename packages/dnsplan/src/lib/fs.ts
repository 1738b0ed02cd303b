// dnsplan/src/lib/fs.ts — path and filesystem collaborator
//
// Paths are resolved to descriptors carrying their protocol:
//   file      local disk, absolute or relative to a base directory
//   memory    in-process store (`memory://path`)
//   resource  read-only bundled files (`resource:name`)
// Remote repositories and network locations are not supported here and
// fail at resolution time.

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { RESOURCE_PREFIX } from './constants.js';
import { FileSystemError } from './errors.js';

export type Protocol = 'file' | 'memory' | 'resource';

export interface PathDescriptor {
    protocol: Protocol;
    /** Normalized POSIX path within the protocol's namespace. */
    path: string;
}

const MEMORY_PREFIX = 'memory://';
const UNSUPPORTED = /^(git\+|https?:|ssh:|ftp:|git:)/;

/** Resolve a URI against a base directory into a canonical descriptor. */
export function resolvePath(uri: string, baseDir = '/'): PathDescriptor {
    if (UNSUPPORTED.test(uri)) {
        throw new FileSystemError(`Unsupported path protocol: ${uri}`);
    }
    if (uri.startsWith(RESOURCE_PREFIX)) {
        return { protocol: 'resource', path: path.posix.normalize(uri.slice(RESOURCE_PREFIX.length)) };
    }
    if (uri.startsWith(MEMORY_PREFIX)) {
        return { protocol: 'memory', path: path.posix.resolve('/', uri.slice(MEMORY_PREFIX.length)) };
    }
    const base = resolveBase(baseDir);
    if (base.protocol === 'memory') {
        return { protocol: 'memory', path: path.posix.resolve(base.path, uri) };
    }
    return { protocol: 'file', path: path.posix.resolve(base.path, uri) };
}

function resolveBase(baseDir: string): PathDescriptor {
    if (baseDir.startsWith(MEMORY_PREFIX)) {
        return { protocol: 'memory', path: path.posix.resolve('/', baseDir.slice(MEMORY_PREFIX.length)) };
    }
    return { protocol: 'file', path: baseDir };
}

/** Directory containing a descriptor, as a base usable by resolvePath. */
export function dirnameOf(desc: PathDescriptor): string {
    const dir = path.posix.dirname(desc.path);
    return desc.protocol === 'memory' ? `${MEMORY_PREFIX}${dir}` : dir;
}

export function formatPath(desc: PathDescriptor): string {
    if (desc.protocol === 'memory') return `${MEMORY_PREFIX}${desc.path}`;
    if (desc.protocol === 'resource') return `${RESOURCE_PREFIX}${desc.path}`;
    return desc.path;
}

// ─── Copy support matrix ────────────────────────────────────────────

const COPY_MATRIX: Readonly<Record<Protocol, readonly Protocol[]>> = {
    file: ['file', 'memory'],
    memory: ['file', 'memory'],
    resource: ['file', 'memory'],
};

export function canCopy(from: Protocol, to: Protocol): boolean {
    return COPY_MATRIX[from].includes(to);
}

// ─── Interface ──────────────────────────────────────────────────────

export interface FileSystem {
    read(desc: PathDescriptor): Promise<string>;
    /** Fails on read-only targets. */
    write(desc: PathDescriptor, content: string): Promise<void>;
    exists(desc: PathDescriptor): Promise<boolean>;
    /** Creates the directory and its parents; existing directories are fine. */
    mkdir(desc: PathDescriptor): Promise<void>;
    /** Copies one file; unsupported protocol pairs fail. */
    copy(from: PathDescriptor, to: PathDescriptor): Promise<void>;
}

abstract class BaseFileSystem implements FileSystem {
    abstract read(desc: PathDescriptor): Promise<string>;
    abstract exists(desc: PathDescriptor): Promise<boolean>;
    protected abstract writeWritable(desc: PathDescriptor, content: string): Promise<void>;
    protected abstract mkdirWritable(desc: PathDescriptor): Promise<void>;

    async write(desc: PathDescriptor, content: string): Promise<void> {
        assertWritable(desc);
        await this.writeWritable(desc, content);
    }

    async mkdir(desc: PathDescriptor): Promise<void> {
        assertWritable(desc);
        await this.mkdirWritable(desc);
    }

    async copy(from: PathDescriptor, to: PathDescriptor): Promise<void> {
        if (!canCopy(from.protocol, to.protocol)) {
            throw new FileSystemError(
                `Copy from ${from.protocol} to ${to.protocol} is not supported: ${formatPath(from)} → ${formatPath(to)}`,
            );
        }
        await this.write(to, await this.read(from));
    }
}

function assertWritable(desc: PathDescriptor): void {
    if (desc.protocol === 'resource') {
        throw new FileSystemError(`Cannot write to read-only location: ${formatPath(desc)}`);
    }
}

// ─── In-memory ──────────────────────────────────────────────────────

/**
 * Filesystem kept entirely in process. `file` and `memory` paths live in
 * separate namespaces; resources come from the map given at construction.
 */
export class MemoryFileSystem extends BaseFileSystem {
    private readonly files = new Map<string, string>();
    private readonly dirs = new Set<string>();
    private readonly resources: ReadonlyMap<string, string>;

    constructor(
        files: Record<string, string> = {},
        resources: Record<string, string> = {},
    ) {
        super();
        for (const [uri, content] of Object.entries(files)) {
            const desc = resolvePath(uri);
            this.files.set(keyOf(desc), content);
        }
        this.resources = new Map(Object.entries(resources).map(([name, content]) => [path.posix.normalize(name), content]));
    }

    async read(desc: PathDescriptor): Promise<string> {
        const content = desc.protocol === 'resource'
            ? this.resources.get(desc.path)
            : this.files.get(keyOf(desc));
        if (content === undefined) {
            throw new FileSystemError(`File not found: ${formatPath(desc)}`);
        }
        return content;
    }

    async exists(desc: PathDescriptor): Promise<boolean> {
        if (desc.protocol === 'resource') return this.resources.has(desc.path);
        return this.files.has(keyOf(desc)) || this.dirs.has(keyOf(desc));
    }

    protected async writeWritable(desc: PathDescriptor, content: string): Promise<void> {
        this.files.set(keyOf(desc), content);
    }

    protected async mkdirWritable(desc: PathDescriptor): Promise<void> {
        let current = desc.path;
        for (;;) {
            this.dirs.add(keyOf({ protocol: desc.protocol, path: current }));
            const parent = path.posix.dirname(current);
            if (parent === current) break;
            current = parent;
        }
    }

    /** Every stored file, keyed by formatted path. */
    list(): string[] {
        return [...this.files.keys()].sort();
    }
}

function keyOf(desc: PathDescriptor): string {
    return formatPath(desc);
}

// ─── Local disk ─────────────────────────────────────────────────────

const BUNDLED_RESOURCES = fileURLToPath(new URL('../../resources/', import.meta.url));

/**
 * Local disk for `file` paths, bundled resource files for `resource`
 * paths and an in-process store for `memory` paths.
 */
export class DiskFileSystem extends BaseFileSystem {
    private readonly memory = new MemoryFileSystem();

    constructor(private readonly resourceRoot: string = BUNDLED_RESOURCES) {
        super();
    }

    async read(desc: PathDescriptor): Promise<string> {
        if (desc.protocol === 'memory') return this.memory.read(desc);
        try {
            return await readFile(this.diskPath(desc), 'utf-8');
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new FileSystemError(`Cannot read ${formatPath(desc)}: ${reason}`);
        }
    }

    async exists(desc: PathDescriptor): Promise<boolean> {
        if (desc.protocol === 'memory') return this.memory.exists(desc);
        return stat(this.diskPath(desc)).then(() => true, () => false);
    }

    protected async writeWritable(desc: PathDescriptor, content: string): Promise<void> {
        if (desc.protocol === 'memory') return this.memory.write(desc, content);
        await writeFile(this.diskPath(desc), content, 'utf-8');
    }

    protected async mkdirWritable(desc: PathDescriptor): Promise<void> {
        if (desc.protocol === 'memory') return this.memory.mkdir(desc);
        await mkdir(this.diskPath(desc), { recursive: true });
    }

    private diskPath(desc: PathDescriptor): string {
        if (desc.protocol === 'resource') return path.join(this.resourceRoot, desc.path);
        return desc.path;
    }
}
