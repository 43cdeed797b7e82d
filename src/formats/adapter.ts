import type { RawEntitySet } from '../types/entities.js';
import type { ParseOptions, SerializeOptions } from '../types/options.js';
import type { Ontology } from '../ontology/ontology.js';

/**
 * A supported text format. Adapters only translate between text and the
 * raw entity shape; validation and linking stay in the graph builder, so
 * every format yields the same normalized model.
 */
export interface FormatAdapter {
    readonly name: string;
    /** File extensions handled by this adapter, without the dot */
    readonly extensions: readonly string[];
    parse(lines: string | readonly string[], options?: ParseOptions): RawEntitySet;
    serialize(ontology: Ontology, options?: SerializeOptions): string;
}
