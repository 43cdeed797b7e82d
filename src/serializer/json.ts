import type { Ontology } from '../ontology/ontology.js';
import type { Term } from '../types/entities.js';

export interface TermExport {
    id: string;
    name: string;
    namespace?: string;
    definition?: string;
    obsolete: boolean;
    isA: string[];
    relationships: Record<string, string[]>;
    other: Record<string, string[]>;
}

export type OntologyExport = Record<string, TermExport>;

export interface ExportOptions {
    /**
     * Export the resolved relationship view, inverse-derived edges
     * included, instead of the stored edges
     */
    includeDerived?: boolean;
}

/**
 * One entry per term id with its attributes and edge sets.
 * One-way: nothing reads this format back.
 */
export function exportMapping(ontology: Ontology, options: ExportOptions = {}): OntologyExport {
    const result: OntologyExport = {};
    for (const term of ontology.terms()) {
        result[term.id] = exportTerm(ontology, term, options.includeDerived ?? false);
    }
    return result;
}

export function exportJson(ontology: Ontology, indent: number = 2, options: ExportOptions = {}): string {
    return JSON.stringify(exportMapping(ontology, options), null, indent);
}

function exportTerm(ontology: Ontology, term: Term, includeDerived: boolean): TermExport {
    const relationships: Record<string, string[]> = {};
    if (includeDerived) {
        for (const [typedef, targets] of ontology.relations(term)) {
            relationships[typedef] = targets.map(t => t.id);
        }
    } else {
        for (const [typedef, targets] of term.relationships) {
            relationships[typedef] = [...targets];
        }
    }

    const other: Record<string, string[]> = {};
    for (const [tag, values] of term.other) {
        other[tag] = [...values];
    }

    return {
        id: term.id,
        name: term.name,
        ...(term.namespace !== undefined && { namespace: term.namespace }),
        ...(term.definition !== undefined && { definition: term.definition }),
        obsolete: term.obsolete,
        isA: includeDerived ? ontology.parents(term).map(t => t.id) : [...term.isA],
        relationships,
        other,
    };
}
