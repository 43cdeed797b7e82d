/**
 * ontograph - Library Entry Point
 *
 * Stanza-format ontology parsing, validation, traversal, merging and
 * serialization.
 */

// Ontology model and queries
export { Ontology, TraversalEngine, parseOntology } from './ontology/index.js';
export type { OntologyData, TermRef, TermSelection, ClosureOptions } from './ontology/index.js';

// Parser
export { parse, LineTokenizer, StanzaParser } from './parser/index.js';

// Graph builder
export { buildOntology } from './graph/builder.js';
export { TypedefRegistry } from './graph/registry.js';
export { findCycle } from './graph/cycles.js';

// Merge
export { mergeOntologies } from './merge/merge.js';

// Serializers
export { serializeOntology } from './serializer/obo.js';
export { exportMapping, exportJson } from './serializer/json.js';
export type { TermExport, OntologyExport, ExportOptions } from './serializer/json.js';

// Formats and loading
export { oboFormat, formatFor } from './formats/index.js';
export type { FormatAdapter } from './formats/index.js';
export { FileLineSource, MemoryLineSource } from './io/source.js';
export type { LineSource } from './io/source.js';
export { loadOntology } from './io/loader.js';

// Types and Interfaces
export * from './types/index.js';
