/**
 * Structured Error System for ontograph
 *
 * Provides machine-readable errors with codes, line numbers, and suggestions.
 */

/**
 * Error codes for ontology operations
 */
export type OntologyErrorCode =
  | 'PARSE_ERROR'           // Malformed stanza or missing required tag
  | 'CYCLE_DETECTED'        // is_a hierarchy is not a DAG
  | 'MERGE_CONFLICT'        // Irreconcilable Typedef declarations on merge
  | 'INVERSE_CONFLICT'      // Typedef pair declares two different inverses
  | 'NOT_FOUND'             // Lookup of an unknown id
  | 'UNRESOLVED_REFERENCE'  // Strict validation found dangling references
  | 'INVALID_OPTIONS'       // Options rejected by schema validation
  | 'SOURCE_ERROR';         // Line source could not be read

/**
 * Structured error with code, message, location and suggestions
 */
export interface OntologyError {
  code: OntologyErrorCode;
  message: string;
  line?: number;
  suggestion?: string;
  context?: string;          // The offending line or id
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping OntologyError for throw/catch patterns
 */
export class OntologyException extends Error {
  public readonly error: OntologyError;

  constructor(error: OntologyError) {
    super(error.message);
    this.name = 'OntologyException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OntologyException);
    }
  }

  get code(): OntologyErrorCode {
    return this.error.code;
  }

  toJSON(): OntologyError {
    return this.error;
  }
}

/**
 * Narrow an unknown thrown value to an OntologyException, optionally of a given code
 */
export function isOntologyException(
  value: unknown,
  code?: OntologyErrorCode
): value is OntologyException {
  return value instanceof OntologyException && (code === undefined || value.error.code === code);
}

/**
 * Create a parse error pointing at a line of the source
 */
export function createParseError(
  message: string,
  line: number,
  context?: string
): OntologyException {
  return new OntologyException({
    code: 'PARSE_ERROR',
    message: `Line ${line}: ${message}`,
    line,
    context,
    suggestion: /\bid\b/.test(message)
      ? "Every [Term] and [Typedef] stanza needs an 'id: <accession>' line"
      : undefined,
  });
}

/**
 * Create a cycle error naming the terms that take part in the cycle
 */
export function createCycleError(cycle: string[]): OntologyException {
  return new OntologyException({
    code: 'CYCLE_DETECTED',
    message: `is_a cycle detected: ${[...cycle, cycle[0]].join(' -> ')}`,
    suggestion: 'Remove one of the is_a declarations along the cycle',
    details: { cycle },
  });
}

export function createInverseConflictError(
  typedefId: string,
  declared: string,
  counterpart: string,
  counterpartDeclared: string
): OntologyException {
  return new OntologyException({
    code: 'INVERSE_CONFLICT',
    message: `Typedef '${typedefId}' declares inverse '${declared}', ` +
      `but '${counterpart}' declares inverse '${counterpartDeclared}'`,
    context: typedefId,
    details: { typedefId, declared, counterpart, counterpartDeclared },
  });
}

/**
 * Create a merge conflict error
 */
export function createMergeConflictError(
  message: string,
  details?: Record<string, unknown>
): OntologyException {
  return new OntologyException({
    code: 'MERGE_CONFLICT',
    message: `Merge failed: ${message}`,
    suggestion: 'Align the inverse_of declarations of both ontologies before merging',
    details,
  });
}

/**
 * Create a not found error for a term or typedef id
 */
export function createNotFoundError(
  id: string,
  kind: 'term' | 'typedef' = 'term'
): OntologyException {
  return new OntologyException({
    code: 'NOT_FOUND',
    message: `No ${kind} with id '${id}' in the ontology`,
    context: id,
    details: { id, kind },
  });
}

export function createUnresolvedReferenceError(references: string[]): OntologyException {
  return new OntologyException({
    code: 'UNRESOLVED_REFERENCE',
    message: `${references.length} unresolved reference(s): ${references.join(', ')}`,
    suggestion: 'Declare the missing terms or load the ontologies they come from',
    details: { references },
  });
}

export function createInvalidOptionsError(
  message: string,
  details?: Record<string, unknown>
): OntologyException {
  return new OntologyException({
    code: 'INVALID_OPTIONS',
    message: `Invalid options: ${message}`,
    details,
  });
}

export function createSourceError(location: string, cause: unknown): OntologyException {
  return new OntologyException({
    code: 'SOURCE_ERROR',
    message: `Could not read '${location}': ${cause instanceof Error ? cause.message : String(cause)}`,
    context: location,
  });
}

/**
 * Serialize an OntologyError for JSON output
 */
export function serializeOntologyError(error: OntologyError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.line !== undefined && { line: error.line }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
