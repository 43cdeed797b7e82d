import type { Edge, HeaderEntry, Term, Typedef } from '../types/entities.js';
import { IS_A } from '../types/entities.js';
import type { Diagnostic, UnresolvedReferenceDiagnostic } from '../types/diagnostics.js';
import { diagnosticsOfKind } from '../types/diagnostics.js';
import { createNotFoundError, createUnresolvedReferenceError } from '../types/errors.js';
import type { TypedefRegistry } from '../graph/registry.js';
import { ClosureOptions, TraversalEngine } from './traversal.js';

export type TermRef = string | Term;

/** A single term or any collection of terms; results over a collection are flattened */
export type TermSelection = TermRef | Iterable<TermRef>;

export interface OntologyData {
    header: HeaderEntry[];
    defaultNamespace?: string;
    typedefs: TypedefRegistry;
    terms: Map<string, Term>;
    diagnostics: Diagnostic[];
}

/**
 * A validated ontology.
 *
 * Instances are only created by the graph builder (or by merging, which
 * goes through the builder) and are never modified afterwards, so any
 * number of readers can query one concurrently.
 */
export class Ontology implements Iterable<Term> {
    readonly header: readonly HeaderEntry[];
    readonly defaultNamespace?: string;
    readonly diagnostics: readonly Diagnostic[];

    private data: OntologyData;
    private traversal: TraversalEngine;
    /** typedef -> target -> sources, over stored edges with resolved targets */
    private reverseIndex: Map<string, Map<string, string[]>> | null = null;

    constructor(data: OntologyData) {
        this.data = data;
        this.header = data.header;
        this.defaultNamespace = data.defaultNamespace;
        this.diagnostics = data.diagnostics;
        this.traversal = new TraversalEngine(data.terms);
    }

    // === Lookup ===

    get size(): number {
        return this.data.terms.size;
    }

    has(ref: TermRef): boolean {
        return this.data.terms.has(typeof ref === 'string' ? ref : ref.id);
    }

    /**
     * Retrieve a term by id; throws NOT_FOUND for unknown ids
     */
    get(id: string): Term {
        const term = this.data.terms.get(id);
        if (!term) {
            throw createNotFoundError(id);
        }
        return term;
    }

    find(id: string): Term | undefined {
        return this.data.terms.get(id);
    }

    /** Terms in insertion order */
    terms(): IterableIterator<Term> {
        return this.data.terms.values();
    }

    [Symbol.iterator](): Iterator<Term> {
        return this.terms();
    }

    ids(): string[] {
        return [...this.data.terms.keys()];
    }

    hasTypedef(id: string): boolean {
        return this.data.typedefs.has(id);
    }

    typedef(id: string): Typedef {
        const typedef = this.data.typedefs.get(id);
        if (!typedef) {
            throw createNotFoundError(id, 'typedef');
        }
        return typedef;
    }

    typedefs(): Typedef[] {
        return [...this.data.typedefs.values()];
    }

    /**
     * Registered inverse of a typedef (both sides declared)
     */
    inverseOf(typedefId: string): string | undefined {
        return this.data.typedefs.inverseOf(typedefId);
    }

    // === Metadata ===

    headerValues(key: string): string[] {
        return this.header.filter(entry => entry.key === key).map(entry => entry.value);
    }

    get formatVersion(): string | undefined {
        return this.headerValues('format-version')[0];
    }

    get imports(): string[] {
        return this.headerValues('import');
    }

    get remarks(): string[] {
        return this.headerValues('remark');
    }

    unresolvedReferences(): UnresolvedReferenceDiagnostic[] {
        return diagnosticsOfKind(this.diagnostics, 'UNRESOLVED_REFERENCE');
    }

    /**
     * Strict validation: throws UNRESOLVED_REFERENCE if any reference is dangling
     */
    assertResolved(): void {
        const unresolved = this.unresolvedReferences();
        if (unresolved.length > 0) {
            throw createUnresolvedReferenceError(unresolved.map(d => `${d.source} -> ${d.target}`));
        }
    }

    /**
     * Same ontology with extra diagnostics attached
     */
    withDiagnostics(extra: readonly Diagnostic[]): Ontology {
        return new Ontology({ ...this.data, diagnostics: [...this.diagnostics, ...extra] });
    }

    // === Hierarchy ===

    parents(selection: TermSelection): Term[] {
        return this.collect(selection, id => this.traversal.parents(id));
    }

    children(selection: TermSelection): Term[] {
        return this.collect(selection, id => this.traversal.children(id));
    }

    ancestors(selection: TermSelection, options?: ClosureOptions): Term[] {
        return this.collect(selection, id => this.traversal.ancestors(id, options));
    }

    descendants(selection: TermSelection, options?: ClosureOptions): Term[] {
        return this.collect(selection, id => this.traversal.descendants(id, options));
    }

    // === Relationships ===

    /**
     * Targets of `typedefId` from a term: stored edges plus the ones implied
     * by an inverse declaration
     */
    related(ref: TermRef, typedefId: string): Term[] {
        const id = this.requireId(ref);
        const found = new Set<string>();

        for (const target of this.get(id).relationships.get(typedefId) ?? []) {
            if (this.data.terms.has(target)) found.add(target);
        }

        const inverse = this.inverseOf(typedefId);
        if (inverse !== undefined) {
            for (const source of this.reverse().get(inverse)?.get(id) ?? []) {
                found.add(source);
            }
        }

        return this.toTerms(found);
    }

    /**
     * Every relationship of a term, stored or derived, keyed by typedef
     */
    relations(ref: TermRef): Map<string, Term[]> {
        const id = this.requireId(ref);
        const typedefs = new Set(this.get(id).relationships.keys());

        for (const [typedef, byTarget] of this.reverse()) {
            const inverse = this.inverseOf(typedef);
            if (inverse !== undefined && byTarget.has(id)) typedefs.add(inverse);
        }

        const result = new Map<string, Term[]>();
        for (const typedef of typedefs) {
            const targets = this.related(id, typedef);
            if (targets.length > 0) result.set(typedef, targets);
        }
        return result;
    }

    /**
     * All edges of the relationship graph, is_a first, then stored
     * relationships, then derived inverse edges
     */
    edges(): Edge[] {
        const isA: Edge[] = [];
        const stored: Edge[] = [];
        const storedKeys = new Set<string>();

        for (const term of this.data.terms.values()) {
            for (const parent of this.traversal.parents(term.id)) {
                isA.push({ source: term.id, typedef: IS_A, target: parent, derived: false });
            }
            for (const [typedef, targets] of term.relationships) {
                for (const target of targets) {
                    if (!this.data.terms.has(target)) continue;
                    stored.push({ source: term.id, typedef, target, derived: false });
                    storedKeys.add(edgeKey(term.id, typedef, target));
                }
            }
        }

        const derived: Edge[] = [];
        const derivedKeys = new Set<string>();
        for (const edge of stored) {
            const inverse = this.inverseOf(edge.typedef);
            if (inverse === undefined) continue;
            const key = edgeKey(edge.target, inverse, edge.source);
            if (storedKeys.has(key) || derivedKeys.has(key)) continue;
            derivedKeys.add(key);
            derived.push({ source: edge.target, typedef: inverse, target: edge.source, derived: true });
        }

        return [...isA, ...stored, ...derived];
    }

    // === Internals ===

    private requireId(ref: TermRef): string {
        const id = typeof ref === 'string' ? ref : ref.id;
        if (!this.data.terms.has(id)) {
            throw createNotFoundError(id);
        }
        return id;
    }

    private collect(selection: TermSelection, step: (id: string) => readonly string[]): Term[] {
        const ids = selectionIds(selection).map(ref => this.requireId(ref));
        if (ids.length === 1) {
            return step(ids[0]).map(id => this.get(id));
        }

        const union = new Set<string>();
        for (const id of ids) {
            for (const found of step(id)) union.add(found);
        }
        return this.toTerms(union);
    }

    private toTerms(ids: Set<string>): Term[] {
        const result: Term[] = [];
        for (const term of this.data.terms.values()) {
            if (ids.has(term.id)) result.push(term);
        }
        return result;
    }

    private reverse(): Map<string, Map<string, string[]>> {
        if (!this.reverseIndex) {
            const index = new Map<string, Map<string, string[]>>();
            for (const term of this.data.terms.values()) {
                for (const [typedef, targets] of term.relationships) {
                    for (const target of targets) {
                        if (!this.data.terms.has(target)) continue;
                        let byTarget = index.get(typedef);
                        if (!byTarget) {
                            byTarget = new Map();
                            index.set(typedef, byTarget);
                        }
                        const sources = byTarget.get(target);
                        if (sources) {
                            sources.push(term.id);
                        } else {
                            byTarget.set(target, [term.id]);
                        }
                    }
                }
            }
            this.reverseIndex = index;
        }
        return this.reverseIndex;
    }
}

function edgeKey(source: string, typedef: string, target: string): string {
    return `${source}\u0000${typedef}\u0000${target}`;
}

function isIterable(selection: TermSelection): selection is Iterable<TermRef> {
    return typeof selection === 'object' && Symbol.iterator in selection;
}

function selectionIds(selection: TermSelection): TermRef[] {
    if (typeof selection === 'string') return [selection];
    if (isIterable(selection)) return [...selection];
    return [selection];
}
