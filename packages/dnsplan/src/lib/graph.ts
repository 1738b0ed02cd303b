// dnsplan/src/lib/graph.ts — memoized reference resolution over a named collection
//
// Nodes are resolved after every sibling they reference. The walk is an
// iterative depth-first search with three colors kept in a Map, so deep
// `ref` chains never grow the call stack.

import { CircularReferenceError, ReferenceNotFoundError } from './errors.js';
import type { Collection } from './types.js';

type Color = 'active' | 'done';

interface Frame {
    id: string;
    expanded: boolean;
}

export interface GraphSpec<T> {
    /** Collection name used in error messages. */
    collection: Collection;
    /** Every node id of the collection. */
    nodes: Iterable<string>;
    /** Sibling ids a node depends on, in resolution order. */
    edges: (id: string) => readonly string[];
    /** Builds a node once all of its dependencies are built. */
    build: (id: string, get: (dep: string) => T) => T;
}

export class ReferenceGraph<T> {
    private readonly nodes: ReadonlySet<string>;
    private readonly color = new Map<string, Color>();
    private readonly memo = new Map<string, { value: T }>();

    constructor(private readonly spec: GraphSpec<T>) {
        this.nodes = new Set(spec.nodes);
    }

    has(id: string): boolean {
        return this.nodes.has(id);
    }

    ids(): string[] {
        return [...this.nodes];
    }

    resolve(id: string): T {
        this.requireNode(id);
        if (this.color.get(id) !== 'done') {
            this.walk(id);
        }
        return this.get(id);
    }

    private walk(root: string): void {
        const path: string[] = [];
        const stack: Frame[] = [{ id: root, expanded: false }];

        try {
            while (stack.length > 0) {
                const frame = stack[stack.length - 1];

                if (!frame.expanded) {
                    if (this.color.get(frame.id) === 'done') {
                        stack.pop();
                        continue;
                    }
                    frame.expanded = true;
                    this.color.set(frame.id, 'active');
                    path.push(frame.id);

                    // Push in reverse so the first edge is visited first
                    const deps = this.spec.edges(frame.id);
                    for (let i = deps.length - 1; i >= 0; i--) {
                        const dep = deps[i];
                        this.requireNode(dep, frame.id);
                        const state = this.color.get(dep);
                        if (state === 'active') {
                            const cycle = [...path.slice(path.indexOf(dep)), dep];
                            throw new CircularReferenceError(this.spec.collection, cycle);
                        }
                        if (state === undefined) {
                            stack.push({ id: dep, expanded: false });
                        }
                    }
                    continue;
                }

                stack.pop();
                this.memo.set(frame.id, { value: this.spec.build(frame.id, dep => this.get(dep)) });
                this.color.set(frame.id, 'done');
                path.pop();
            }
        } catch (err) {
            // Forget partial progress so a later call reports the same failure
            for (const id of path) {
                if (this.color.get(id) === 'active') this.color.delete(id);
            }
            throw err;
        }
    }

    private get(id: string): T {
        const entry = this.memo.get(id);
        if (entry === undefined) {
            throw new ReferenceNotFoundError(`${this.spec.collection} '${id}' has not been resolved`);
        }
        return entry.value;
    }

    private requireNode(id: string, from?: string): void {
        if (this.nodes.has(id)) return;
        const source = from === undefined ? '' : ` (referenced by '${from}')`;
        throw new ReferenceNotFoundError(`Unknown ${this.spec.collection} '${id}'${source}`);
    }
}
