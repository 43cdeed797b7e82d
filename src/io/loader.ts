import type { Diagnostic } from '../types/diagnostics.js';
import { LoadOptions, ResolvedOptions, resolveOptions } from '../types/options.js';
import { isOntologyException } from '../types/errors.js';
import type { Ontology } from '../ontology/ontology.js';
import { buildOntology } from '../graph/builder.js';
import { mergeOntologies } from '../merge/merge.js';
import { formatFor } from '../formats/index.js';
import type { LineSource } from './source.js';

interface Loaded {
    ontology: Ontology;
    /** Parse diagnostics of this document and everything it imported */
    sourceDiagnostics: Diagnostic[];
}

/**
 * Read, parse and validate the ontology at `location`, then merge in its
 * `import:` headers recursively up to `importDepth` levels.
 *
 * An import that cannot be read is reported as IMPORT_FAILED and skipped;
 * parse errors, cycles and merge conflicts in imports are fatal.
 */
export async function loadOntology(
    location: string,
    source: LineSource,
    options: LoadOptions = {}
): Promise<Ontology> {
    const resolved = resolveOptions(options);
    const { ontology } = await loadDocument(location, source, resolved, resolved.importDepth, new Set([location]));

    if (resolved.strict) {
        ontology.assertResolved();
    }
    return ontology;
}

async function loadDocument(
    location: string,
    source: LineSource,
    options: ResolvedOptions,
    depth: number,
    visited: Set<string>
): Promise<Loaded> {
    const lines = await source.read(location);
    const raw = formatFor(location).parse(lines, { defaultNamespace: options.defaultNamespace });
    let ontology = buildOntology(raw);

    // merging rebuilds from the validated content, which drops parse
    // diagnostics; merge and import diagnostics travel with the ontology
    const sourceDiagnostics: Diagnostic[] = [...raw.diagnostics];
    let merged = false;

    if (depth !== 0) {
        for (const reference of new Set(ontology.imports)) {
            const target = source.resolve(location, reference);
            if (visited.has(target)) continue;
            visited.add(target);

            try {
                const imported = await loadDocument(target, source, options, depth - 1, visited);
                ontology = mergeOntologies(ontology, imported.ontology);
                sourceDiagnostics.push(...imported.sourceDiagnostics);
                merged = true;
            } catch (e) {
                if (!isOntologyException(e, 'SOURCE_ERROR')) throw e;
                console.warn(`Import '${reference}' of ${location} failed: ${e.message}`);
                ontology = ontology.withDiagnostics([{
                    kind: 'IMPORT_FAILED',
                    severity: 'warning',
                    location: target,
                    message: e.message,
                }]);
            }
        }
    }

    if (merged) {
        ontology = ontology.withDiagnostics(sourceDiagnostics);
    }
    return { ontology, sourceDiagnostics };
}
