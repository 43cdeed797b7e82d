import type { HeaderEntry, RawEntitySet, RawTerm, RawTypedef, Term, Typedef } from '../types/entities.js';
import { addOther, addRelationship } from '../types/entities.js';
import type { Diagnostic } from '../types/diagnostics.js';
import type { BuildOptions } from '../types/options.js';
import { createMergeConflictError, isOntologyException } from '../types/errors.js';
import type { Ontology } from '../ontology/ontology.js';
import { buildOntology } from '../graph/builder.js';
import { ontologyToRaw, termToRaw, typedefToRaw } from '../graph/raw.js';

/** Header keys that hold a single value; the primary's value is kept */
const SINGLE_VALUED_HEADER_KEYS = new Set([
    'format-version',
    'data-version',
    'date',
    'saved-by',
    'auto-generated-by',
    'default-namespace',
    'namespace',
    'ontology',
]);

/** Diagnostics that only a merge or an import produces; rebuilding cannot recompute them */
const CARRIED_KINDS = new Set<Diagnostic['kind']>(['NAME_MISMATCH', 'IMPORT_FAILED']);

/**
 * Merge `secondary` into a copy of `primary`.
 *
 * - typedefs with the same id are unified; two different declared
 *   inverses raise MERGE_CONFLICT
 * - terms present in both get their is_a and relationship sets unioned,
 *   the primary's metadata is kept and name clashes are reported
 * - the union is validated again, so a cycle it introduces raises
 *   CYCLE_DETECTED
 *
 * Name mismatches and import failures already attached to either input
 * are kept on the result. Neither input is modified, and nothing is
 * returned on failure.
 */
export function mergeOntologies(primary: Ontology, secondary: Ontology, options: BuildOptions = {}): Ontology {
    const merged = ontologyToRaw(primary);
    const inputs = secondary === primary ? [primary] : [primary, secondary];
    const diagnostics: Diagnostic[] = inputs.flatMap(o => o.diagnostics.filter(d => CARRIED_KINDS.has(d.kind)));

    for (const typedef of secondary.typedefs()) {
        mergeTypedef(merged, typedef);
    }
    for (const term of secondary.terms()) {
        mergeTerm(merged, term, diagnostics);
    }
    mergeHeader(merged.header, secondary.header);
    if (merged.defaultNamespace === undefined) {
        merged.defaultNamespace = secondary.defaultNamespace;
    }

    try {
        return buildOntology(merged, options).withDiagnostics(diagnostics);
    } catch (e) {
        if (isOntologyException(e, 'INVERSE_CONFLICT')) {
            throw createMergeConflictError(e.message, e.error.details);
        }
        throw e;
    }
}

function mergeTypedef(merged: RawEntitySet, typedef: Typedef): void {
    const existing = merged.typedefs.get(typedef.id);
    if (!existing) {
        merged.typedefs.set(typedef.id, typedefToRaw(typedef));
        return;
    }

    if (typedef.inverseOf !== undefined) {
        if (existing.inverseOf === undefined) {
            existing.inverseOf = typedef.inverseOf;
        } else if (existing.inverseOf !== typedef.inverseOf) {
            throw createMergeConflictError(
                `typedef '${typedef.id}' is inverse_of '${existing.inverseOf}' in the primary ontology ` +
                `but '${typedef.inverseOf}' in the secondary one`,
                { typedefId: typedef.id, primary: existing.inverseOf, secondary: typedef.inverseOf }
            );
        }
    }
    fillMetadata(existing, typedef);
}

function mergeTerm(merged: RawEntitySet, term: Term, diagnostics: Diagnostic[]): void {
    const existing = merged.terms.get(term.id);
    if (!existing) {
        merged.terms.set(term.id, termToRaw(term));
        return;
    }

    if (existing.name && term.name && existing.name !== term.name) {
        diagnostics.push({
            kind: 'NAME_MISMATCH',
            severity: 'warning',
            id: term.id,
            kept: existing.name,
            discarded: term.name,
            message: `Term '${term.id}' is named '${existing.name}' and '${term.name}'; keeping '${existing.name}'`,
        });
    }

    for (const parent of term.isA) {
        existing.isA.add(parent);
    }
    for (const [typedef, targets] of term.relationships) {
        for (const target of targets) addRelationship(existing, typedef, target);
    }
    fillMetadata(existing, term);
}

/**
 * Fill fields the primary left empty; never overwrite
 */
function fillMetadata(existing: RawTerm | RawTypedef, incoming: Term | Typedef): void {
    if (!existing.name && incoming.name) existing.name = incoming.name;
    if (existing.definition === undefined) existing.definition = incoming.definition;
    if (existing.namespace === undefined) existing.namespace = incoming.namespace;
    for (const [tag, values] of incoming.other) {
        for (const value of values) addOther(existing.other, tag, value);
    }
}

function mergeHeader(header: HeaderEntry[], incoming: readonly HeaderEntry[]): void {
    for (const entry of incoming) {
        const present = SINGLE_VALUED_HEADER_KEYS.has(entry.key)
            ? header.some(e => e.key === entry.key)
            : header.some(e => e.key === entry.key && e.value === entry.value);
        if (!present) header.push({ ...entry });
    }
}
