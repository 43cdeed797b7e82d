import { parseOntology } from '../src/ontology/index.js';
import { LITERATURE, IDS } from './fixtures.js';

describe('Relationship graph', () => {
    const literature = parseOntology(LITERATURE);

    test('has_written is derived from the stored written_by edge', () => {
        expect(literature.related(IDS.shakespeare, 'has_written').map(t => t.id)).toEqual([IDS.hamlet]);
        expect(literature.get(IDS.shakespeare).relationships.size).toBe(0);
    });

    test('relations lists stored and derived edges by typedef', () => {
        const ofShakespeare = literature.relations(IDS.shakespeare);
        expect([...ofShakespeare.keys()]).toEqual(['has_written']);

        const ofHamlet = literature.relations(IDS.hamlet);
        expect([...ofHamlet.entries()].map(([k, v]) => [k, v.map(t => t.id)])).toEqual([
            ['written_by', [IDS.shakespeare]],
        ]);
    });

    test('edges expose is_a, stored and derived edges', () => {
        expect(literature.edges()).toEqual([
            { source: IDS.drama, typedef: 'is_a', target: IDS.literatureForm, derived: false },
            { source: IDS.hamlet, typedef: 'is_a', target: IDS.drama, derived: false },
            { source: IDS.shakespeare, typedef: 'is_a', target: IDS.playwright, derived: false },
            { source: IDS.hamlet, typedef: 'written_by', target: IDS.shakespeare, derived: false },
            { source: IDS.shakespeare, typedef: 'has_written', target: IDS.hamlet, derived: true },
        ]);
    });

    test('every edge with a declared inverse has its mirror in the graph', () => {
        const edges = literature.edges();
        for (const edge of edges) {
            const inverse = literature.inverseOf(edge.typedef);
            if (inverse === undefined) continue;
            expect(edges).toContainEqual(expect.objectContaining({
                source: edge.target,
                typedef: inverse,
                target: edge.source,
            }));
        }
    });

    test('an edge stored on both sides is not duplicated', () => {
        const text = LITERATURE.replace(
            'is_a: LIT:0000004 ! Playwright\n',
            'is_a: LIT:0000004 ! Playwright\nrelationship: has_written LIT:0000003\n'
        );
        const ontology = parseOntology(text);
        expect(ontology.edges().filter(e => e.typedef !== 'is_a')).toEqual([
            { source: IDS.hamlet, typedef: 'written_by', target: IDS.shakespeare, derived: false },
            { source: IDS.shakespeare, typedef: 'has_written', target: IDS.hamlet, derived: false },
        ]);
        expect(ontology.related(IDS.shakespeare, 'has_written').map(t => t.id)).toEqual([IDS.hamlet]);
    });

    test('a symmetric typedef relates both ends', () => {
        const ontology = parseOntology(
            '[Typedef]\nid: adjacent_to\ninverse_of: adjacent_to\n\n' +
            '[Term]\nid: R:1\nrelationship: adjacent_to R:2\n\n[Term]\nid: R:2'
        );
        expect(ontology.related('R:2', 'adjacent_to').map(t => t.id)).toEqual(['R:1']);
        expect(ontology.related('R:1', 'adjacent_to').map(t => t.id)).toEqual(['R:2']);
    });
});
