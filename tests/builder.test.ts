/**
 * Graph builder: reference resolution, inverse pairing and DAG checks
 */

import { parse } from '../src/parser/index.js';
import { buildOntology } from '../src/graph/builder.js';
import { findCycle } from '../src/graph/cycles.js';
import { parseOntology } from '../src/ontology/index.js';
import { OntologyException } from '../src/types/errors.js';
import { diagnosticsOfKind } from '../src/types/diagnostics.js';
import { LITERATURE, IDS } from './fixtures.js';

function thrown(fn: () => unknown): OntologyException {
    try {
        fn();
    } catch (e) {
        if (e instanceof OntologyException) return e;
        throw e;
    }
    throw new Error('expected an OntologyException');
}

describe('buildOntology', () => {
    test('resolves forward references once the whole set is known', () => {
        const ontology = parseOntology(LITERATURE);
        expect(ontology.unresolvedReferences()).toEqual([]);
        expect(ontology.related(IDS.hamlet, 'written_by').map(t => t.id)).toEqual([IDS.shakespeare]);
    });

    test('does not modify the raw entity set', () => {
        const raw = parse('[Typedef]\nid: r\ninverse_of: s\n\n[Typedef]\nid: s');
        buildOntology(raw);
        expect(raw.typedefs.get('s')?.inverseOf).toBeUndefined();
    });

    test('applies the default namespace to terms without one', () => {
        const ontology = parseOntology('default-namespace: lit\n\n[Term]\nid: A:1\n\n[Term]\nid: A:2\nnamespace: own');
        expect(ontology.get('A:1').namespace).toBe('lit');
        expect(ontology.get('A:2').namespace).toBe('own');
    });

    describe('Unresolved references', () => {
        const text = '[Term]\nid: A:1\nis_a: A:404\nrelationship: part_of A:2\nrelationship: part_of A:405\n\n[Term]\nid: A:2';

        test('are reported, not dropped, and leave the ontology usable', () => {
            const ontology = parseOntology(text);
            const unresolved = ontology.unresolvedReferences();

            expect(unresolved.map(d => [d.reference, d.source, d.target])).toEqual([
                ['is_a', 'A:1', 'A:404'],
                ['typedef', 'A:1', 'part_of'],
                ['relationship', 'A:1', 'A:405'],
            ]);
            expect(ontology.parents('A:1')).toEqual([]);
            expect([...ontology.get('A:1').isA]).toEqual(['A:404']);
            expect(ontology.related('A:1', 'part_of').map(t => t.id)).toEqual(['A:2']);
        });

        test('are fatal in strict mode', () => {
            const error = thrown(() => parseOntology(text, { strict: true }));
            expect(error.code).toBe('UNRESOLVED_REFERENCE');
            expect(error.error.details).toEqual({ references: ['A:1 -> A:404', 'A:1 -> part_of', 'A:1 -> A:405'] });
        });

        test('assertResolved offers the strict check on demand', () => {
            expect(() => parseOntology(text).assertResolved()).toThrow(/3 unresolved reference/);
            expect(() => parseOntology(LITERATURE).assertResolved()).not.toThrow();
        });
    });

    describe('Inverse pairing', () => {
        test('completes a one-sided declaration', () => {
            const ontology = parseOntology('[Typedef]\nid: part_of\ninverse_of: has_part\n\n[Typedef]\nid: has_part');
            expect(ontology.typedef('has_part').inverseOf).toBe('part_of');
            expect(diagnosticsOfKind(ontology.diagnostics, 'INVERSE_REPAIRED')).toEqual([
                expect.objectContaining({ typedef: 'has_part', inverse: 'part_of' }),
            ]);
        });

        test('rejects a pair whose sides disagree', () => {
            const text = '[Typedef]\nid: a\ninverse_of: b\n\n[Typedef]\nid: b\ninverse_of: c\n\n[Typedef]\nid: c';
            const error = thrown(() => parseOntology(text));
            expect(error.code).toBe('INVERSE_CONFLICT');
            expect(error.error.details).toEqual({ typedefId: 'a', declared: 'b', counterpart: 'b', counterpartDeclared: 'c' });
        });

        test('reports an inverse that names no typedef', () => {
            const ontology = parseOntology('[Typedef]\nid: a\ninverse_of: ghost');
            expect(ontology.inverseOf('a')).toBeUndefined();
            expect(ontology.unresolvedReferences()).toEqual([
                expect.objectContaining({ reference: 'inverse_of', source: 'a', target: 'ghost' }),
            ]);
        });

        test('accepts a self-inverse typedef', () => {
            const ontology = parseOntology('[Typedef]\nid: adjacent_to\ninverse_of: adjacent_to');
            expect(ontology.inverseOf('adjacent_to')).toBe('adjacent_to');
            expect(ontology.diagnostics).toEqual([]);
        });
    });

    describe('Cycle detection', () => {
        test('rejects a two-term cycle and names its members', () => {
            const cyclic = LITERATURE.replace(
                'name: Drama\n',
                `name: Drama\nis_a: ${IDS.hamlet}\n`
            );
            const error = thrown(() => parseOntology(cyclic));
            expect(error.code).toBe('CYCLE_DETECTED');
            expect(error.error.details).toEqual({ cycle: [IDS.drama, IDS.hamlet] });
            expect(error.message).toBe(`is_a cycle detected: ${IDS.drama} -> ${IDS.hamlet} -> ${IDS.drama}`);
        });

        test('rejects a term that is its own parent', () => {
            const error = thrown(() => parseOntology('[Term]\nid: A:1\nis_a: A:1'));
            expect(error.error.details).toEqual({ cycle: ['A:1'] });
        });

        test('ignores unresolved parents', () => {
            expect(() => parseOntology('[Term]\nid: A:1\nis_a: A:2\n\n[Term]\nid: A:3\nis_a: A:1')).not.toThrow();
        });
    });
});

describe('findCycle', () => {
    const graph = (edges: Record<string, string[]>) => (id: string) => edges[id] ?? [];

    test('returns null for a diamond', () => {
        expect(findCycle(['d', 'b', 'c', 'a'], graph({ d: ['b', 'c'], b: ['a'], c: ['a'] }))).toBeNull();
    });

    test('returns only the ids on the cycle', () => {
        expect(findCycle(['x', 'a', 'b', 'c'], graph({ x: ['a'], a: ['b'], b: ['c'], c: ['a'] }))).toEqual(['a', 'b', 'c']);
    });
});
