import type { Term } from '../types/entities.js';

export interface ClosureOptions {
    /** Levels to follow; negative means no limit */
    depth?: number;
    /**
     * Include every term met on the way (default). When false, only the
     * terms exactly `depth` levels away are returned, or, without a depth
     * limit, the most distant ones (roots for ancestors, leaves for descendants).
     */
    intermediate?: boolean;
}

type Direction = 'up' | 'down';

/**
 * Cached hierarchy views over the resolved is_a DAG.
 *
 * Every cache is filled once and never invalidated: the term map is
 * immutable, and a merge produces a new Ontology with a new engine.
 */
export class TraversalEngine {
    private terms: ReadonlyMap<string, Term>;
    private parentIndex: Map<string, string[]> | null = null;
    private childIndex: Map<string, string[]> | null = null;
    private closureCache = new Map<string, string[]>();

    constructor(terms: ReadonlyMap<string, Term>) {
        this.terms = terms;
    }

    parents(id: string): readonly string[] {
        return this.indexes().parents.get(id) ?? [];
    }

    children(id: string): readonly string[] {
        return this.indexes().children.get(id) ?? [];
    }

    ancestors(id: string, options: ClosureOptions = {}): readonly string[] {
        return this.closure('up', id, options);
    }

    descendants(id: string, options: ClosureOptions = {}): readonly string[] {
        return this.closure('down', id, options);
    }

    private step(direction: Direction, id: string): readonly string[] {
        return direction === 'up' ? this.parents(id) : this.children(id);
    }

    private closure(direction: Direction, id: string, options: ClosureOptions): readonly string[] {
        const depth = options.depth ?? -1;
        const intermediate = options.intermediate ?? true;
        const key = `${direction}|${depth < 0 ? -1 : depth}|${intermediate}|${id}`;

        const cached = this.closureCache.get(key);
        if (cached) return cached;

        const result = depth < 0
            ? this.unboundedClosure(direction, id, intermediate)
            : this.boundedClosure(direction, id, depth, intermediate);
        const ordered = this.inTermOrder(result);
        this.closureCache.set(key, ordered);
        return ordered;
    }

    private unboundedClosure(direction: Direction, id: string, intermediate: boolean): Set<string> {
        const seen = new Set<string>();
        const queue = [...this.step(direction, id)];

        for (let cursor = 0; cursor < queue.length; cursor++) {
            const next = queue[cursor];
            if (seen.has(next)) continue;
            seen.add(next);
            for (const related of this.step(direction, next)) {
                if (!seen.has(related)) queue.push(related);
            }
        }

        if (intermediate) return seen;
        return new Set([...seen].filter(t => this.step(direction, t).length === 0));
    }

    private boundedClosure(direction: Direction, id: string, depth: number, intermediate: boolean): Set<string> {
        const collected = new Set<string>();
        if (depth === 0) return collected;
        let frontier = new Set<string>([id]);

        for (let level = 1; level <= depth && frontier.size > 0; level++) {
            const next = new Set<string>();
            for (const member of frontier) {
                for (const related of this.step(direction, member)) next.add(related);
            }
            frontier = next;
            if (intermediate) {
                for (const member of frontier) collected.add(member);
            }
        }

        return intermediate ? collected : frontier;
    }

    private inTermOrder(ids: Set<string>): string[] {
        const ordered: string[] = [];
        for (const id of this.terms.keys()) {
            if (ids.has(id)) ordered.push(id);
        }
        return ordered;
    }

    private indexes(): { parents: Map<string, string[]>; children: Map<string, string[]> } {
        if (!this.parentIndex || !this.childIndex) {
            const parents = new Map<string, string[]>();
            const children = new Map<string, string[]>();

            for (const term of this.terms.values()) {
                const resolved = [...term.isA].filter(p => this.terms.has(p));
                parents.set(term.id, resolved);
                for (const parent of resolved) {
                    const list = children.get(parent);
                    if (list) {
                        list.push(term.id);
                    } else {
                        children.set(parent, [term.id]);
                    }
                }
            }

            this.parentIndex = parents;
            this.childIndex = children;
        }
        return { parents: this.parentIndex, children: this.childIndex };
    }
}
