import type { RawEntitySet, RawTerm, RawTypedef, Term, Typedef } from '../types/entities.js';
import type { Ontology } from '../ontology/ontology.js';

/**
 * Detached, mutable copy of a validated ontology's content.
 * Diagnostics are not carried over; rebuilding recomputes them.
 */
export function ontologyToRaw(ontology: Ontology): RawEntitySet {
    const typedefs = new Map<string, RawTypedef>();
    for (const typedef of ontology.typedefs()) {
        typedefs.set(typedef.id, typedefToRaw(typedef));
    }

    const terms = new Map<string, RawTerm>();
    for (const term of ontology.terms()) {
        terms.set(term.id, termToRaw(term));
    }

    return {
        header: ontology.header.map(entry => ({ ...entry })),
        defaultNamespace: ontology.defaultNamespace,
        typedefs,
        terms,
        diagnostics: [],
    };
}

export function typedefToRaw(typedef: Typedef): RawTypedef {
    return {
        id: typedef.id,
        name: typedef.name || undefined,
        namespace: typedef.namespace,
        definition: typedef.definition,
        inverseOf: typedef.inverseOf,
        obsolete: typedef.obsolete,
        other: copyOther(typedef.other),
    };
}

export function termToRaw(term: Term): RawTerm {
    return {
        id: term.id,
        name: term.name || undefined,
        namespace: term.namespace,
        definition: term.definition,
        isA: new Set(term.isA),
        relationships: new Map(
            [...term.relationships].map(([typedef, targets]): [string, Set<string>] => [typedef, new Set(targets)])
        ),
        obsolete: term.obsolete,
        other: copyOther(term.other),
    };
}

function copyOther(other: ReadonlyMap<string, readonly string[]>): Map<string, string[]> {
    return new Map([...other].map(([tag, values]): [string, string[]] => [tag, [...values]]));
}
