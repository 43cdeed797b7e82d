import { loadOntology } from '../src/io/loader.js';
import { MemoryLineSource, FileLineSource } from '../src/io/source.js';
import { diagnosticsOfKind } from '../src/types/diagnostics.js';
import { LITERATURE, IDS } from './fixtures.js';

const ROOT = `format-version: 1.2
import: shared/base.obo
import: missing.obo

[Term]
id: APP:1
name: Application term
is_a: BASE:1
foo bar
`;

const BASE = `format-version: 1.2
import: ../root.obo

[Term]
id: BASE:1
name: Base term
`;

describe('loadOntology', () => {
    let warn: jest.SpyInstance;

    beforeEach(() => {
        warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        warn.mockRestore();
    });

    const source = () => new MemoryLineSource({
        'root.obo': ROOT,
        'shared/base.obo': BASE,
        'lit.obo': LITERATURE,
    });

    test('loads a document without imports', async () => {
        const ontology = await loadOntology('lit.obo', source());
        expect(ontology.ids()).toContain(IDS.hamlet);
        expect(ontology.diagnostics).toEqual([]);
    });

    test('merges imports relative to the importing document', async () => {
        const ontology = await loadOntology('root.obo', source());
        expect(ontology.ids()).toEqual(['APP:1', 'BASE:1']);
        expect(ontology.parents('APP:1').map(t => t.id)).toEqual(['BASE:1']);
        expect(ontology.unresolvedReferences()).toEqual([]);
    });

    test('reports unreadable imports and keeps parse diagnostics', async () => {
        const ontology = await loadOntology('root.obo', source());
        expect(diagnosticsOfKind(ontology.diagnostics, 'IMPORT_FAILED')).toEqual([
            expect.objectContaining({ location: 'missing.obo' }),
        ]);
        expect(diagnosticsOfKind(ontology.diagnostics, 'UNKNOWN_LINE')).toEqual([
            expect.objectContaining({ line: 9, text: 'foo bar' }),
        ]);
        expect(warn).toHaveBeenCalledTimes(1);
    });

    test('keeps the name mismatches of every import, nested ones included', async () => {
        const renamed = new MemoryLineSource({
            'root.obo': 'import: a.obo\nimport: b.obo\n\n[Term]\nid: X:1\nname: one\n\n[Term]\nid: X:2\nname: two',
            'a.obo': '[Term]\nid: X:1\nname: uno',
            'b.obo': 'import: c.obo\n\n[Term]\nid: X:2\nname: dos\n\n[Term]\nid: X:3\nname: tres',
            'c.obo': '[Term]\nid: X:3\nname: three',
        });
        const ontology = await loadOntology('root.obo', renamed);

        expect(ontology.ids()).toEqual(['X:1', 'X:2', 'X:3']);
        expect(diagnosticsOfKind(ontology.diagnostics, 'NAME_MISMATCH').map(d => [d.id, d.kept, d.discarded])).toEqual([
            ['X:1', 'one', 'uno'],
            ['X:3', 'tres', 'three'],
            ['X:2', 'two', 'dos'],
        ]);
    });

    test('an import depth of zero skips imports', async () => {
        const ontology = await loadOntology('root.obo', source(), { importDepth: 0 });
        expect(ontology.ids()).toEqual(['APP:1']);
        expect(ontology.unresolvedReferences().map(d => d.target)).toEqual(['BASE:1']);
        expect(warn).not.toHaveBeenCalled();
    });

    test('strict loading checks references after imports are merged', async () => {
        await expect(loadOntology('root.obo', source(), { strict: true })).resolves.toBeDefined();
        await expect(loadOntology('root.obo', source(), { strict: true, importDepth: 0 }))
            .rejects.toMatchObject({ error: { code: 'UNRESOLVED_REFERENCE' } });
    });

    test('an unreadable root document is a SOURCE_ERROR', async () => {
        await expect(loadOntology('nowhere.obo', source()))
            .rejects.toMatchObject({ error: { code: 'SOURCE_ERROR', context: 'nowhere.obo' } });
    });

    test('rejects invalid options', async () => {
        await expect(loadOntology('lit.obo', source(), { importDepth: 1.5 }))
            .rejects.toMatchObject({ error: { code: 'INVALID_OPTIONS' } });
    });
});

describe('Line sources', () => {
    test('file sources resolve relative imports next to the importing file', () => {
        const files = new FileLineSource();
        expect(files.resolve('/data/onto/main.obo', 'sub/dep.obo')).toBe('/data/onto/sub/dep.obo');
        expect(files.resolve('/data/onto/main.obo', '/abs/dep.obo')).toBe('/abs/dep.obo');
        expect(files.resolve('/data/onto/main.obo', 'http://example.org/dep.obo')).toBe('http://example.org/dep.obo');
    });

    test('file sources report missing files as SOURCE_ERROR', async () => {
        await expect(new FileLineSource().read('/nonexistent/dir/none.obo'))
            .rejects.toMatchObject({ error: { code: 'SOURCE_ERROR' } });
    });

    test('memory sources split documents into lines', async () => {
        await expect(new MemoryLineSource({ 'a.obo': 'x: 1\ny: 2' }).read('a.obo')).resolves.toEqual(['x: 1', 'y: 2']);
    });
});
