// tests/resolve.test.ts — Tests for image and service inheritance
import { describe, it, expect } from 'vitest';
import { ImageResolver, ServiceResolver } from '../src/lib/resolve.js';
import { TemplateCatalog, loadBuiltinTemplates } from '../src/lib/templates.js';
import {
    CircularReferenceError,
    ConfigError,
    ReferenceNotFoundError,
} from '../src/lib/errors.js';
import type { Definition } from '../src/lib/types.js';

const templates = new TemplateCatalog({
    bind: {
        recursor: { cap_add: ['NET_ADMIN'], volumes: ['resource:bind/recursor.conf:/etc/named.conf'] },
        authoritative: { volumes: ['resource:bind/auth.conf:/etc/named.conf'] },
    },
    unbound: {
        recursor: { volumes: ['resource:unbound/recursor.conf:/etc/unbound.conf'] },
    },
});

const images: Record<string, Definition> = {
    'bind-base': { software: 'bind', version: '9.18.18', util: ['vim'] },
    'bind-debug': { ref: 'bind-base', util: ['tcpdump'] },
    unbound: { ref: 'unbound:1.19.0' },
};

function services(builds: Record<string, Definition>): ServiceResolver {
    return new ServiceResolver(builds, new ImageResolver(images), templates);
}

// ─── Images ─────────────────────────────────────────────────────────

describe('ImageResolver', () => {
    it('merges a sibling image under its own fields', () => {
        const image = new ImageResolver(images).resolve('bind-debug');
        expect(image.software).toBe('bind');
        expect(image.version).toBe('9.18.18');
        expect(image.definition.util).toEqual(['vim', 'tcpdump']);
        expect(image.definition.ref).toBeUndefined();
    });

    it('takes software and version from a software:version preset', () => {
        const image = new ImageResolver(images).resolve('unbound');
        expect(image).toMatchObject({ name: 'unbound', software: 'unbound', version: '1.19.0' });
    });

    it('treats an undefined software:version name as a preset image', () => {
        const image = new ImageResolver({}).resolve('bind:9.18.18');
        expect(image).toMatchObject({ name: 'bind:9.18.18', software: 'bind', version: '9.18.18' });
    });

    it('requires a software value', () => {
        expect(() => new ImageResolver({ bare: { version: '1' } }).resolve('bare'))
            .toThrow("Image 'bare' has no 'software'");
    });

    it('detects image reference cycles', () => {
        const resolver = new ImageResolver({ a: { ref: 'b' }, b: { ref: 'a' } });
        expect(() => resolver.resolve('a')).toThrow('Circular reference in images: a → b → a');
    });
});

// ─── Services ───────────────────────────────────────────────────────

describe('ServiceResolver', () => {
    it('layers ref, then mixins in order, then own fields', () => {
        const resolver = services({
            base: { image: 'bind-base', behavior: 'base', tags: ['base'] },
            first: { image: 'bind-base', behavior: 'first', tags: ['first'], build: false },
            second: { image: 'bind-base', behavior: 'second', build: false },
            svc: { ref: 'base', mixins: ['first', 'second'], address: '10.0.0.9' },
        });
        const svc = resolver.resolve('svc');
        expect(svc).toEqual({
            image: 'bind-base',
            behavior: 'second',
            tags: ['base', 'first'],
            address: '10.0.0.9',
        });
    });

    it('lets own fields win over everything inherited', () => {
        const resolver = services({
            parent: { image: 'bind-base', behavior: 'parent' },
            child: { ref: 'parent', behavior: 'child' },
        });
        expect(resolver.resolve('child').behavior).toBe('child');
    });

    it('does not inherit build: false from an abstract parent', () => {
        const resolver = services({
            abstract: { image: 'bind-base', build: false },
            concrete: { ref: 'abstract' },
        });
        expect(resolver.resolve('concrete')).toEqual({ image: 'bind-base' });
        expect(resolver.resolve('abstract').build).toBe(false);
    });

    it('expands software:role templates', () => {
        const resolver = services({ auth: { ref: 'bind:authoritative', image: 'bind-base' } });
        expect(resolver.resolve('auth')).toEqual({
            volumes: ['resource:bind/auth.conf:/etc/named.conf'],
            image: 'bind-base',
        });
    });

    it('expands std:role through the software of the declared image', () => {
        const resolver = services({ rec: { ref: 'std:recursor', image: 'unbound' } });
        expect(resolver.resolve('rec').volumes).toEqual(['resource:unbound/recursor.conf:/etc/unbound.conf']);
    });

    it('expands std:role for preset image names', () => {
        const resolver = services({ rec: { ref: 'std:recursor', image: 'bind:9.18.18' } });
        expect(resolver.resolve('rec').cap_add).toEqual(['NET_ADMIN']);
    });

    it('accepts templates as mixins', () => {
        const resolver = services({ rec: { image: 'bind-base', mixins: ['bind:recursor'] } });
        expect(resolver.resolve('rec')).toEqual({
            cap_add: ['NET_ADMIN'],
            volumes: ['resource:bind/recursor.conf:/etc/named.conf'],
            image: 'bind-base',
        });
    });

    it('requires an image for std:role references', () => {
        const resolver = services({ rec: { ref: 'std:recursor' } });
        expect(() => resolver.resolve('rec')).toThrow(ConfigError);
        expect(() => resolver.resolve('rec')).toThrow("Service 'rec': reference 'std:recursor' requires an 'image'");
    });

    it('rejects unknown templates', () => {
        const resolver = services({ rec: { ref: 'bind:hidden-primary', image: 'bind-base' } });
        expect(() => resolver.resolve('rec')).toThrow(ReferenceNotFoundError);
        expect(() => resolver.resolve('rec')).toThrow("unknown template 'bind:hidden-primary'");
    });

    it('rejects unknown siblings', () => {
        const resolver = services({ rec: { ref: 'missing' } });
        expect(() => resolver.resolve('rec')).toThrow(ReferenceNotFoundError);
    });

    it('aborts on service cycles with the full path', () => {
        const resolver = services({ A: { ref: 'B' }, B: { ref: 'A' } });
        expect(() => resolver.resolve('A')).toThrow(CircularReferenceError);
        expect(() => resolver.resolve('A')).toThrow('Circular reference in services: A → B → A');
    });

    it('never mutates the declared definitions', () => {
        const builds: Record<string, Definition> = {
            parent: { image: 'bind-base', tags: ['p'] },
            child: { ref: 'parent', tags: ['c'] },
        };
        services(builds).resolveAll();
        expect(builds).toEqual({
            parent: { image: 'bind-base', tags: ['p'] },
            child: { ref: 'parent', tags: ['c'] },
        });
    });
});

// ─── Built-in catalog ───────────────────────────────────────────────

describe('loadBuiltinTemplates', () => {
    it('ships recursor roles for every supported software', () => {
        const catalog = loadBuiltinTemplates();
        expect(catalog.has('bind', 'recursor')).toBe(true);
        expect(catalog.has('unbound', 'recursor')).toBe(true);
        expect(catalog.has('pdns-recursor', 'recursor')).toBe(true);
    });

    it('hands out copies', () => {
        const catalog = loadBuiltinTemplates();
        const first = catalog.get('bind', 'recursor');
        if (first !== undefined) first.cap_add = [];
        expect(catalog.get('bind', 'recursor')?.cap_add).toEqual(['NET_ADMIN']);
    });

    it('rejects malformed catalogs', () => {
        expect(() => TemplateCatalog.fromJson('{"bind": {"recursor": 3}}')).toThrow(ConfigError);
    });
});
