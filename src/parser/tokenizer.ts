import type { LineToken } from '../types/parser.js';

const STANZA_PATTERN = /^\[([^\]]*)\]$/;
const TAG_PATTERN = /^([A-Za-z0-9_][A-Za-z0-9_.-]*):(.*)$/;

/**
 * Tokenizer for stanza-format ontology text.
 * Produces one token per input line; it never throws.
 */
export class LineTokenizer {
    private lines: string[];

    constructor(input: string | readonly string[]) {
        this.lines = typeof input === 'string' ? input.split(/\r?\n/) : [...input];
    }

    tokenize(): LineToken[] {
        return this.lines.map((raw, index) => tokenizeLine(raw, index + 1));
    }
}

export function tokenizeLine(raw: string, line: number): LineToken {
    const text = raw.trim();

    if (text.length === 0) {
        return { type: 'BLANK', line, raw };
    }
    if (text.startsWith('!')) {
        return { type: 'COMMENT', line, raw, comment: text.slice(1).trim() };
    }

    // a bracketed header always ends the block before it, even when its
    // name is malformed; the parser skips stanzas it does not know
    if (text.startsWith('[')) {
        const { value, comment } = splitComment(text);
        const stanza = STANZA_PATTERN.exec(value);
        if (stanza) {
            return { type: 'STANZA', line, raw, tag: stanza[1].trim(), comment };
        }
    }

    const tagged = TAG_PATTERN.exec(text);
    if (tagged) {
        const { value, comment } = splitComment(tagged[2]);
        return { type: 'TAG_VALUE', line, raw, tag: tagged[1], value, comment };
    }

    return { type: 'INVALID', line, raw };
}

/**
 * Split `value ! comment`. A `!` inside double quotes or escaped as `\!`
 * belongs to the value; `\!` is unescaped, other escapes are kept verbatim.
 */
export function splitComment(text: string): { value: string; comment?: string } {
    let value = '';
    let inQuotes = false;

    for (let i = 0; i < text.length; i++) {
        const char = text[i];

        if (char === '\\' && i + 1 < text.length) {
            const next = text[i + 1];
            value += next === '!' ? '!' : char + next;
            i++;
            continue;
        }
        if (char === '"') {
            inQuotes = !inQuotes;
        } else if (char === '!' && !inQuotes) {
            const comment = text.slice(i + 1).trim();
            return { value: value.trim(), comment: comment.length > 0 ? comment : undefined };
        }
        value += char;
    }

    return { value: value.trim() };
}

/**
 * Inverse of the unescaping done by splitComment
 */
export function escapeValue(value: string): string {
    return value.replace(/!/g, '\\!');
}
