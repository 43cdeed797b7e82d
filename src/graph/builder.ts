import type { RawEntitySet, RawTerm, Term } from '../types/entities.js';
import type { Diagnostic, UnresolvedReferenceDiagnostic } from '../types/diagnostics.js';
import { BuildOptions, resolveOptions } from '../types/options.js';
import { createCycleError, createUnresolvedReferenceError } from '../types/errors.js';
import { Ontology } from '../ontology/ontology.js';
import { TypedefRegistry } from './registry.js';
import { findCycle } from './cycles.js';

/**
 * Validate a raw entity set and link it into an Ontology.
 *
 * 1. finalize the typedef registry (inverse pairing)
 * 2. look up every is_a / relationship reference, recording misses
 * 3. reject is_a cycles
 * 4. inverse edges are derived on demand by the Ontology
 *
 * The raw set is not modified.
 */
export function buildOntology(raw: RawEntitySet, options: BuildOptions = {}): Ontology {
    const { strict } = resolveOptions(options);
    const { registry, diagnostics: registryDiagnostics } = TypedefRegistry.fromRaw(raw.typedefs.values());

    const terms = new Map<string, Term>();
    for (const term of raw.terms.values()) {
        terms.set(term.id, freezeTerm(term, raw.defaultNamespace));
    }

    const unresolved = findUnresolved(raw.terms.values(), terms, registry);

    const cycle = findCycle(terms.keys(), id => resolvedParents(terms, id));
    if (cycle) {
        throw createCycleError(cycle);
    }

    if (strict && unresolved.length > 0) {
        throw createUnresolvedReferenceError(unresolved.map(d => `${d.source} -> ${d.target}`));
    }

    const diagnostics: Diagnostic[] = [...raw.diagnostics, ...registryDiagnostics, ...unresolved];
    return new Ontology({
        header: raw.header.map(entry => ({ ...entry })),
        defaultNamespace: raw.defaultNamespace,
        typedefs: registry,
        terms,
        diagnostics,
    });
}

function* resolvedParents(terms: Map<string, Term>, id: string): Generator<string> {
    const term = terms.get(id);
    if (!term) return;
    for (const parent of term.isA) {
        if (terms.has(parent)) yield parent;
    }
}

function findUnresolved(
    rawTerms: Iterable<RawTerm>,
    terms: Map<string, Term>,
    registry: TypedefRegistry
): UnresolvedReferenceDiagnostic[] {
    const found: UnresolvedReferenceDiagnostic[] = [];

    for (const term of rawTerms) {
        for (const parent of term.isA) {
            if (!terms.has(parent)) {
                found.push({
                    kind: 'UNRESOLVED_REFERENCE',
                    severity: 'warning',
                    line: term.line,
                    source: term.id,
                    target: parent,
                    reference: 'is_a',
                    message: `Term '${term.id}' is_a unknown term '${parent}'`,
                });
            }
        }

        for (const [typedef, targets] of term.relationships) {
            if (!registry.has(typedef)) {
                found.push({
                    kind: 'UNRESOLVED_REFERENCE',
                    severity: 'warning',
                    line: term.line,
                    source: term.id,
                    target: typedef,
                    reference: 'typedef',
                    message: `Term '${term.id}' uses undeclared typedef '${typedef}'`,
                });
            }
            for (const target of targets) {
                if (!terms.has(target)) {
                    found.push({
                        kind: 'UNRESOLVED_REFERENCE',
                        severity: 'warning',
                        line: term.line,
                        source: term.id,
                        target,
                        reference: 'relationship',
                        message: `Term '${term.id}' ${typedef} unknown term '${target}'`,
                    });
                }
            }
        }
    }

    return found;
}

function freezeTerm(raw: RawTerm, defaultNamespace?: string): Term {
    return Object.freeze({
        id: raw.id,
        name: raw.name ?? '',
        namespace: raw.namespace ?? defaultNamespace,
        definition: raw.definition,
        isA: new Set(raw.isA),
        relationships: new Map(
            [...raw.relationships].map(([typedef, targets]) => [typedef, new Set(targets)] as const)
        ),
        obsolete: raw.obsolete,
        other: new Map([...raw.other].map(([tag, values]) => [tag, [...values]] as const)),
    });
}
