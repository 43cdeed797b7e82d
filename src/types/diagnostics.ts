/**
 * Non-fatal findings collected while parsing, building and merging.
 * They are attached to results instead of being thrown or logged.
 */

export type DiagnosticSeverity = 'info' | 'warning';

interface DiagnosticBase {
    severity: DiagnosticSeverity;
    message: string;
    line?: number;
}

export interface UnknownLineDiagnostic extends DiagnosticBase {
    kind: 'UNKNOWN_LINE';
    text: string;
}

export interface UnknownStanzaDiagnostic extends DiagnosticBase {
    kind: 'UNKNOWN_STANZA';
    stanza: string;
}

export interface MalformedValueDiagnostic extends DiagnosticBase {
    kind: 'MALFORMED_VALUE';
    tag: string;
    value: string;
}

export interface DuplicateIdDiagnostic extends DiagnosticBase {
    kind: 'DUPLICATE_ID';
    id: string;
}

export type ReferenceKind = 'is_a' | 'relationship' | 'typedef' | 'inverse_of';

export interface UnresolvedReferenceDiagnostic extends DiagnosticBase {
    kind: 'UNRESOLVED_REFERENCE';
    /** Term or Typedef that holds the reference */
    source: string;
    /** The id that could not be found */
    target: string;
    reference: ReferenceKind;
}

export interface InverseRepairedDiagnostic extends DiagnosticBase {
    kind: 'INVERSE_REPAIRED';
    typedef: string;
    inverse: string;
}

export interface NameMismatchDiagnostic extends DiagnosticBase {
    kind: 'NAME_MISMATCH';
    id: string;
    kept: string;
    discarded: string;
}

export interface ImportFailedDiagnostic extends DiagnosticBase {
    kind: 'IMPORT_FAILED';
    location: string;
}

export type Diagnostic =
    | UnknownLineDiagnostic
    | UnknownStanzaDiagnostic
    | MalformedValueDiagnostic
    | DuplicateIdDiagnostic
    | UnresolvedReferenceDiagnostic
    | InverseRepairedDiagnostic
    | NameMismatchDiagnostic
    | ImportFailedDiagnostic;

export type DiagnosticKind = Diagnostic['kind'];

/**
 * Narrow a diagnostic list to one kind
 */
export function diagnosticsOfKind<K extends DiagnosticKind>(
    diagnostics: readonly Diagnostic[],
    kind: K
): Extract<Diagnostic, { kind: K }>[] {
    return diagnostics.filter((d): d is Extract<Diagnostic, { kind: K }> => d.kind === kind);
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
    const where = diagnostic.line !== undefined ? `line ${diagnostic.line}: ` : '';
    return `[${diagnostic.severity}] ${where}${diagnostic.message}`;
}
