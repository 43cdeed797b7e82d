/**
 * Entity Model
 *
 * Raw entities are what a format adapter produces: ids are plain strings
 * and nothing is resolved. Validated entities are frozen once the graph
 * builder accepts them.
 */

import type { Diagnostic } from './diagnostics.js';

/** Ordered header line, e.g. `format-version: 1.2` */
export interface HeaderEntry {
    key: string;
    value: string;
}

/** Order-preserving tag -> values map for tags without dedicated fields */
export type OtherTags = Map<string, string[]>;

export interface RawTypedef {
    id: string;
    name?: string;
    namespace?: string;
    definition?: string;
    inverseOf?: string;
    obsolete: boolean;
    other: OtherTags;
    /** Line of the stanza header in the source, when known */
    line?: number;
}

export interface RawTerm {
    id: string;
    name?: string;
    namespace?: string;
    definition?: string;
    isA: Set<string>;
    /** Typedef id -> target term ids */
    relationships: Map<string, Set<string>>;
    obsolete: boolean;
    other: OtherTags;
    line?: number;
}

/**
 * Unvalidated output of a format adapter, consumed by the graph builder
 */
export interface RawEntitySet {
    header: HeaderEntry[];
    defaultNamespace?: string;
    typedefs: Map<string, RawTypedef>;
    terms: Map<string, RawTerm>;
    diagnostics: Diagnostic[];
}

export interface Typedef {
    readonly id: string;
    readonly name: string;
    readonly namespace?: string;
    readonly definition?: string;
    readonly inverseOf?: string;
    readonly obsolete: boolean;
    readonly other: ReadonlyMap<string, readonly string[]>;
}

export interface Term {
    readonly id: string;
    readonly name: string;
    readonly namespace?: string;
    readonly definition?: string;
    /** Declared parents, including ids that did not resolve */
    readonly isA: ReadonlySet<string>;
    readonly relationships: ReadonlyMap<string, ReadonlySet<string>>;
    readonly obsolete: boolean;
    readonly other: ReadonlyMap<string, readonly string[]>;
}

/** One edge of the relationship graph; `is_a` edges use the typedef `is_a` */
export interface Edge {
    source: string;
    typedef: string;
    target: string;
    /** True when the edge is implied by an inverse declaration rather than stored */
    derived: boolean;
}

export const IS_A = 'is_a';

export function createRawTerm(id: string, line?: number): RawTerm {
    return {
        id,
        isA: new Set(),
        relationships: new Map(),
        obsolete: false,
        other: new Map(),
        line,
    };
}

export function createRawTypedef(id: string, line?: number): RawTypedef {
    return { id, obsolete: false, other: new Map(), line };
}

export function createRawEntitySet(): RawEntitySet {
    return { header: [], typedefs: new Map(), terms: new Map(), diagnostics: [] };
}

export function addOther(other: OtherTags, tag: string, value: string): void {
    const values = other.get(tag);
    if (values) {
        if (!values.includes(value)) values.push(value);
    } else {
        other.set(tag, [value]);
    }
}

export function addRelationship(term: RawTerm, typedef: string, target: string): void {
    let targets = term.relationships.get(typedef);
    if (!targets) {
        targets = new Set();
        term.relationships.set(typedef, targets);
    }
    targets.add(target);
}
