import type { HeaderEntry, Term, Typedef } from '../types/entities.js';
import { DEFAULTS, SerializeOptions } from '../types/options.js';
import type { Ontology } from '../ontology/ontology.js';
import { escapeValue } from '../parser/tokenizer.js';

const NAMESPACE_KEYS = ['default-namespace', 'namespace'];

/**
 * Emit an ontology as canonical stanza text.
 *
 * Header entries keep their order, then typedefs and terms follow in
 * insertion order. Trailing `! name` comments are regenerated from the
 * current names. Only stored edges are written; inverse edges are
 * derived again when the text is parsed.
 */
export function serializeOntology(ontology: Ontology, options: SerializeOptions = {}): string {
    const blocks: string[][] = [headerLines(ontology, options)];

    for (const typedef of ontology.typedefs()) {
        blocks.push(typedefLines(ontology, typedef));
    }
    for (const term of ontology.terms()) {
        blocks.push(termLines(ontology, term));
    }

    return blocks
        .filter(block => block.length > 0)
        .map(block => block.join('\n'))
        .join('\n\n') + '\n';
}

function headerLines(ontology: Ontology, options: SerializeOptions): string[] {
    const header: HeaderEntry[] = [...ontology.header];

    if (!header.some(entry => entry.key === 'format-version')) {
        header.unshift({ key: 'format-version', value: options.formatVersion ?? DEFAULTS.formatVersion });
    }
    if (ontology.defaultNamespace && !header.some(entry => NAMESPACE_KEYS.includes(entry.key))) {
        header.push({ key: 'default-namespace', value: ontology.defaultNamespace });
    }

    return header.map(entry => line(entry.key, entry.value));
}

function typedefLines(ontology: Ontology, typedef: Typedef): string[] {
    const lines = ['[Typedef]', line('id', typedef.id)];
    if (typedef.name) lines.push(line('name', typedef.name));
    if (typedef.namespace) lines.push(line('namespace', typedef.namespace));
    if (typedef.definition) lines.push(line('def', typedef.definition));
    lines.push(...otherLines(typedef.other));

    if (typedef.inverseOf !== undefined) {
        const inverse = ontology.hasTypedef(typedef.inverseOf) ? ontology.typedef(typedef.inverseOf) : undefined;
        lines.push(line('inverse_of', typedef.inverseOf, inverse?.name));
    }
    if (typedef.obsolete) lines.push(line('is_obsolete', 'true'));
    return lines;
}

function termLines(ontology: Ontology, term: Term): string[] {
    const lines = ['[Term]', line('id', term.id)];
    if (term.name) lines.push(line('name', term.name));
    if (term.namespace && term.namespace !== ontology.defaultNamespace) {
        lines.push(line('namespace', term.namespace));
    }
    if (term.definition) lines.push(line('def', term.definition));
    lines.push(...otherLines(term.other));

    for (const parent of term.isA) {
        lines.push(line('is_a', parent, ontology.find(parent)?.name));
    }
    for (const [typedef, targets] of term.relationships) {
        for (const target of targets) {
            lines.push(line('relationship', `${typedef} ${target}`, ontology.find(target)?.name));
        }
    }

    if (term.obsolete) lines.push(line('is_obsolete', 'true'));
    return lines;
}

function otherLines(other: ReadonlyMap<string, readonly string[]>): string[] {
    const lines: string[] = [];
    for (const [tag, values] of other) {
        for (const value of values) lines.push(line(tag, value));
    }
    return lines;
}

function line(tag: string, value: string, comment?: string): string {
    const text = value ? `${tag}: ${escapeValue(value)}` : `${tag}:`;
    return comment ? `${text} ! ${comment}` : text;
}
