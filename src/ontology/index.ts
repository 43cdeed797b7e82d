import type { ParseOptions, BuildOptions } from '../types/options.js';
import { resolveOptions } from '../types/options.js';
import type { FormatAdapter } from '../formats/adapter.js';
import { oboFormat } from '../formats/obo.js';
import { buildOntology } from '../graph/builder.js';
import type { Ontology } from './ontology.js';

export { Ontology } from './ontology.js';
export type { OntologyData, TermRef, TermSelection } from './ontology.js';
export { TraversalEngine } from './traversal.js';
export type { ClosureOptions } from './traversal.js';

/**
 * Parse and validate ontology text in one step
 */
export function parseOntology(
    input: string | readonly string[],
    options: ParseOptions & BuildOptions = {},
    format: FormatAdapter = oboFormat
): Ontology {
    const { defaultNamespace, strict } = resolveOptions(options);
    return buildOntology(format.parse(input, { defaultNamespace }), { strict });
}
