// tests/fs.test.ts — Tests for path resolution and the in-memory filesystem
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
    DiskFileSystem,
    MemoryFileSystem,
    canCopy,
    dirnameOf,
    formatPath,
    resolvePath,
} from '../src/lib/fs.js';
import { FileSystemError } from '../src/lib/errors.js';

describe('resolvePath', () => {
    it('resolves local paths against the base directory', () => {
        expect(resolvePath('zones/db.lab', '/srv/lab')).toEqual({ protocol: 'file', path: '/srv/lab/zones/db.lab' });
        expect(resolvePath('/etc/hosts', '/srv/lab')).toEqual({ protocol: 'file', path: '/etc/hosts' });
    });

    it('recognizes memory and resource prefixes', () => {
        expect(resolvePath('memory://a/../b.yml')).toEqual({ protocol: 'memory', path: '/b.yml' });
        expect(resolvePath('resource:bind/recursor.conf')).toEqual({ protocol: 'resource', path: 'bind/recursor.conf' });
    });

    it('keeps relative paths under a memory base in memory', () => {
        const desc = resolvePath('extra.yml', 'memory:///lab');
        expect(desc).toEqual({ protocol: 'memory', path: '/lab/extra.yml' });
        expect(dirnameOf(desc)).toBe('memory:///lab');
        expect(formatPath(desc)).toBe('memory:///lab/extra.yml');
    });

    it('rejects remote locations', () => {
        expect(() => resolvePath('https://example.com/lab.yml')).toThrow(FileSystemError);
        expect(() => resolvePath('git+ssh://example.com/lab.git'))
            .toThrow('Unsupported path protocol: git+ssh://example.com/lab.git');
    });
});

describe('canCopy', () => {
    it('never copies into bundled resources', () => {
        expect(canCopy('resource', 'memory')).toBe(true);
        expect(canCopy('file', 'memory')).toBe(true);
        expect(canCopy('memory', 'resource')).toBe(false);
        expect(canCopy('file', 'resource')).toBe(false);
    });
});

describe('MemoryFileSystem', () => {
    function fixture() {
        return new MemoryFileSystem(
            { 'memory:///lab/a.txt': 'A', '/etc/x': 'X' },
            { 'bind/recursor.conf': 'options {};' },
        );
    }

    it('reads files and resources', async () => {
        const fs = fixture();
        await expect(fs.read(resolvePath('memory:///lab/a.txt'))).resolves.toBe('A');
        await expect(fs.read(resolvePath('resource:bind/recursor.conf'))).resolves.toBe('options {};');
        await expect(fs.read(resolvePath('memory:///nope'))).rejects.toThrow('File not found: memory:///nope');
    });

    it('keeps file and memory paths apart', async () => {
        const fs = fixture();
        await expect(fs.exists(resolvePath('/etc/x'))).resolves.toBe(true);
        await expect(fs.exists(resolvePath('memory:///etc/x'))).resolves.toBe(false);
    });

    it('refuses to write resources', async () => {
        await expect(fixture().write(resolvePath('resource:bind/recursor.conf'), ''))
            .rejects.toThrow('Cannot write to read-only location: resource:bind/recursor.conf');
    });

    it('copies between supported protocols only', async () => {
        const fs = fixture();
        await fs.copy(resolvePath('resource:bind/recursor.conf'), resolvePath('memory:///out/named.conf'));
        await expect(fs.read(resolvePath('memory:///out/named.conf'))).resolves.toBe('options {};');
        await expect(fs.copy(resolvePath('memory:///lab/a.txt'), resolvePath('resource:a.txt')))
            .rejects.toThrow('Copy from memory to resource is not supported: memory:///lab/a.txt → resource:a.txt');
    });

    it('creates parent directories', async () => {
        const fs = fixture();
        await fs.mkdir(resolvePath('memory:///out/web/contents'));
        await expect(fs.exists(resolvePath('memory:///out/web'))).resolves.toBe(true);
        await expect(fs.exists(resolvePath('memory:///out'))).resolves.toBe(true);
    });

    it('lists stored files by formatted path', () => {
        expect(fixture().list()).toEqual(['/etc/x', 'memory:///lab/a.txt']);
    });
});

describe('DiskFileSystem', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'dnsplan-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('reads the bundled resources by default', async () => {
        const fs = new DiskFileSystem();
        const content = await fs.read(resolvePath('resource:bind/recursor.conf'));
        expect(content.startsWith('options {')).toBe(true);
        await expect(fs.exists(resolvePath('resource:bind/recursor.conf'))).resolves.toBe(true);
        await expect(fs.exists(resolvePath('resource:bind/missing.conf'))).resolves.toBe(false);
    });

    it('reads resources from the given root', async () => {
        await writeFile(path.join(dir, 'named.conf'), 'options {};');
        const fs = new DiskFileSystem(dir);
        await expect(fs.read(resolvePath('resource:named.conf'))).resolves.toBe('options {};');
    });

    it('creates directories and copies resources to disk', async () => {
        const fs = new DiskFileSystem();
        await fs.mkdir(resolvePath('out/web/contents', dir));
        await fs.copy(resolvePath('resource:bind/recursor.conf'), resolvePath('out/web/contents/named.conf', dir));
        expect(await readFile(path.join(dir, 'out', 'web', 'contents', 'named.conf'), 'utf-8'))
            .toBe(await fs.read(resolvePath('resource:bind/recursor.conf')));
        await expect(fs.exists(resolvePath('out/web', dir))).resolves.toBe(true);
    });

    it('refuses to write resources', async () => {
        const fs = new DiskFileSystem(dir);
        await expect(fs.write(resolvePath('resource:named.conf'), ''))
            .rejects.toThrow('Cannot write to read-only location: resource:named.conf');
        await expect(fs.mkdir(resolvePath('resource:zones'))).rejects.toThrow(FileSystemError);
    });

    it('keeps memory paths in process', async () => {
        const fs = new DiskFileSystem(dir);
        await fs.write(resolvePath('memory:///lab/a.txt'), 'A');
        await expect(fs.read(resolvePath('memory:///lab/a.txt'))).resolves.toBe('A');
        await expect(fs.exists(resolvePath('memory:///lab/a.txt'))).resolves.toBe(true);
        await expect(fs.exists(resolvePath(path.join(dir, 'lab', 'a.txt')))).resolves.toBe(false);
    });

    it('wraps read failures in FileSystemError', async () => {
        const fs = new DiskFileSystem(dir);
        const missing = path.join(dir, 'missing.yml');
        await expect(fs.read(resolvePath(missing))).rejects.toThrow(FileSystemError);
        await expect(fs.read(resolvePath(missing))).rejects.toThrow(`Cannot read ${missing}: `);
    });
});
