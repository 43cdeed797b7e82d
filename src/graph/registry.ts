import type { RawTypedef, Typedef } from '../types/entities.js';
import type { Diagnostic } from '../types/diagnostics.js';
import { createInverseConflictError } from '../types/errors.js';

/**
 * Namespace-scoped registry of relationship types.
 *
 * Inverse declarations are mutual: when only one side of a pair declares
 * `inverse_of`, the other side is completed; two sides that disagree are
 * rejected with INVERSE_CONFLICT.
 */
export class TypedefRegistry {
    private typedefs: Map<string, Typedef>;

    private constructor(typedefs: Map<string, Typedef>) {
        this.typedefs = typedefs;
    }

    static fromRaw(raw: Iterable<RawTypedef>): { registry: TypedefRegistry; diagnostics: Diagnostic[] } {
        const diagnostics: Diagnostic[] = [];
        const drafts = new Map<string, RawTypedef>();
        for (const typedef of raw) {
            drafts.set(typedef.id, { ...typedef, other: new Map(typedef.other) });
        }

        for (const typedef of drafts.values()) {
            const inverseId = typedef.inverseOf;
            if (inverseId === undefined || inverseId === typedef.id) continue;

            const inverse = drafts.get(inverseId);
            if (!inverse) {
                diagnostics.push({
                    kind: 'UNRESOLVED_REFERENCE',
                    severity: 'warning',
                    line: typedef.line,
                    source: typedef.id,
                    target: inverseId,
                    reference: 'inverse_of',
                    message: `Typedef '${typedef.id}' declares unknown inverse '${inverseId}'`,
                });
                continue;
            }

            if (inverse.inverseOf === undefined) {
                inverse.inverseOf = typedef.id;
                diagnostics.push({
                    kind: 'INVERSE_REPAIRED',
                    severity: 'info',
                    line: inverse.line,
                    typedef: inverse.id,
                    inverse: typedef.id,
                    message: `Typedef '${inverse.id}' completed with inverse_of '${typedef.id}'`,
                });
            } else if (inverse.inverseOf !== typedef.id) {
                throw createInverseConflictError(typedef.id, inverseId, inverse.id, inverse.inverseOf);
            }
        }

        const typedefs = new Map<string, Typedef>();
        for (const draft of drafts.values()) {
            typedefs.set(draft.id, freezeTypedef(draft));
        }
        return { registry: new TypedefRegistry(typedefs), diagnostics };
    }

    get size(): number {
        return this.typedefs.size;
    }

    has(id: string): boolean {
        return this.typedefs.has(id);
    }

    get(id: string): Typedef | undefined {
        return this.typedefs.get(id);
    }

    /**
     * The registered inverse of a typedef, if both sides of the pair exist
     */
    inverseOf(id: string): string | undefined {
        const inverse = this.typedefs.get(id)?.inverseOf;
        return inverse !== undefined && this.typedefs.has(inverse) ? inverse : undefined;
    }

    values(): IterableIterator<Typedef> {
        return this.typedefs.values();
    }
}

function freezeTypedef(raw: RawTypedef): Typedef {
    return Object.freeze({
        id: raw.id,
        name: raw.name ?? '',
        namespace: raw.namespace,
        definition: raw.definition,
        inverseOf: raw.inverseOf,
        obsolete: raw.obsolete,
        other: new Map([...raw.other].map(([tag, values]) => [tag, [...values]] as const)),
    });
}
