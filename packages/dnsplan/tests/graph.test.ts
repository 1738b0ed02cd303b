// tests/graph.test.ts — Tests for reference graph resolution
import { describe, it, expect, vi } from 'vitest';
import { ReferenceGraph } from '../src/lib/graph.js';
import { CircularReferenceError, ReferenceNotFoundError } from '../src/lib/errors.js';

function chainGraph(edges: Record<string, string[]>) {
    const build = vi.fn((id: string, get: (dep: string) => string[]) =>
        [...(edges[id] ?? []).flatMap(dep => get(dep)), id]);
    const graph = new ReferenceGraph<string[]>({
        collection: 'services',
        nodes: Object.keys(edges),
        edges: id => edges[id] ?? [],
        build,
    });
    return { graph, build };
}

describe('ReferenceGraph', () => {
    it('builds dependencies before dependents', () => {
        const { graph } = chainGraph({ c: ['b'], b: ['a'], a: [] });
        expect(graph.resolve('c')).toEqual(['a', 'b', 'c']);
    });

    it('builds each node once per graph', () => {
        const { graph, build } = chainGraph({ top: ['left', 'right'], left: ['base'], right: ['base'], base: [] });
        expect(graph.resolve('top')).toEqual(['base', 'left', 'base', 'right', 'top']);
        graph.resolve('left');
        expect(build).toHaveBeenCalledTimes(4);
    });

    it('reports a two-node cycle with its full path', () => {
        const { graph } = chainGraph({ A: ['B'], B: ['A'] });
        expect(() => graph.resolve('A')).toThrow(CircularReferenceError);
        expect(() => graph.resolve('A')).toThrow('Circular reference in services: A → B → A');
    });

    it('reports a self reference as a cycle', () => {
        const { graph } = chainGraph({ A: ['A'] });
        let caught: unknown;
        try {
            graph.resolve('A');
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(CircularReferenceError);
        if (caught instanceof CircularReferenceError) {
            expect(caught.cycle).toEqual(['A', 'A']);
        }
    });

    it('reports only the looping part of a longer chain', () => {
        const { graph } = chainGraph({ entry: ['x'], x: ['y'], y: ['z'], z: ['x'] });
        expect(() => graph.resolve('entry')).toThrow('Circular reference in services: x → y → z → x');
    });

    it('rejects unknown sibling references', () => {
        const { graph } = chainGraph({ a: ['ghost'] });
        expect(() => graph.resolve('a')).toThrow(ReferenceNotFoundError);
        expect(() => graph.resolve('a')).toThrow("Unknown services 'ghost' (referenced by 'a')");
    });

    it('rejects unknown roots', () => {
        const { graph } = chainGraph({ a: [] });
        expect(() => graph.resolve('b')).toThrow("Unknown services 'b'");
    });

    it('resolves chains deeper than a recursive walk could handle', () => {
        const edges: Record<string, string[]> = { n0: [] };
        for (let i = 1; i <= 20000; i++) edges[`n${i}`] = [`n${i - 1}`];
        const graph = new ReferenceGraph<number>({
            collection: 'images',
            nodes: Object.keys(edges),
            edges: id => edges[id],
            build: (id, get) => (id === 'n0' ? 0 : get(edges[id][0]) + 1),
        });
        expect(graph.resolve('n20000')).toBe(20000);
    });
});
