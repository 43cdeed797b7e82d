import type { LineToken, ParserState } from '../types/parser.js';
import type { Diagnostic } from '../types/diagnostics.js';
import type { ParseOptions } from '../types/options.js';
import {
    RawEntitySet,
    RawTerm,
    RawTypedef,
    addOther,
    addRelationship,
    createRawEntitySet,
    createRawTerm,
    createRawTypedef,
} from '../types/entities.js';
import { createParseError } from '../types/errors.js';

const NAMESPACE_KEYS = new Set(['default-namespace', 'namespace']);

interface OpenStanza {
    kind: 'Term' | 'Typedef';
    line: number;
    tags: LineToken[];
}

/**
 * Parser for stanza-format ontology text
 *
 * States:
 *   Header           key: value metadata until the first bracketed header
 *   InTermStanza     tag lines of a [Term] block
 *   InTypedefStanza  tag lines of a [Typedef] block
 *   InUnknownStanza  lines of any other block, skipped
 *
 * A stanza is only turned into an entity once it is closed, so a missing
 * `id` can be reported against the stanza header line. References are
 * stored as raw ids and resolved later by the graph builder.
 */
export class StanzaParser {
    private tokens: LineToken[];
    private options: ParseOptions;
    private state: ParserState = 'Header';
    private stanza: OpenStanza | null = null;
    private result: RawEntitySet = createRawEntitySet();

    constructor(tokens: LineToken[], options: ParseOptions = {}) {
        this.tokens = tokens;
        this.options = options;
    }

    parse(): RawEntitySet {
        for (const token of this.tokens) {
            this.consume(token);
        }
        this.closeStanza();

        if (this.result.defaultNamespace === undefined && this.options.defaultNamespace) {
            this.result.defaultNamespace = this.options.defaultNamespace;
        }
        return this.result;
    }

    private consume(token: LineToken): void {
        switch (token.type) {
            case 'BLANK':
            case 'COMMENT':
                return;
            case 'STANZA':
                this.openStanza(token);
                return;
            case 'INVALID':
                if (this.state !== 'InUnknownStanza') {
                    this.report({
                        kind: 'UNKNOWN_LINE',
                        severity: 'warning',
                        line: token.line,
                        text: token.raw,
                        message: `Unrecognized line skipped: '${token.raw.trim()}'`,
                    });
                }
                return;
            case 'TAG_VALUE':
                if (this.state === 'Header') {
                    this.readHeader(token);
                } else if (this.stanza) {
                    this.stanza.tags.push(token);
                }
                return;
        }
    }

    private openStanza(token: LineToken): void {
        this.closeStanza();

        if (token.tag === 'Term' || token.tag === 'Typedef') {
            this.state = token.tag === 'Term' ? 'InTermStanza' : 'InTypedefStanza';
            this.stanza = { kind: token.tag, line: token.line, tags: [] };
            return;
        }

        this.state = 'InUnknownStanza';
        this.stanza = null;
        this.report({
            kind: 'UNKNOWN_STANZA',
            severity: 'warning',
            line: token.line,
            stanza: token.tag ?? token.raw,
            message: `Unsupported stanza [${token.tag}] skipped`,
        });
    }

    private readHeader(token: LineToken): void {
        const key = token.tag ?? '';
        const value = token.value ?? '';
        this.result.header.push({ key, value });

        if (NAMESPACE_KEYS.has(key) && value && this.result.defaultNamespace === undefined) {
            this.result.defaultNamespace = value;
        }
    }

    private closeStanza(): void {
        const stanza = this.stanza;
        this.stanza = null;
        if (!stanza) return;

        const idTokens = stanza.tags.filter(t => t.tag === 'id' && t.value);
        if (idTokens.length === 0) {
            throw createParseError(`[${stanza.kind}] stanza has no id`, stanza.line, `[${stanza.kind}]`);
        }
        const id = idTokens[0].value ?? '';

        if (stanza.kind === 'Term') {
            this.buildTerm(id, stanza);
        } else {
            this.buildTypedef(id, stanza);
        }
    }

    private buildTerm(id: string, stanza: OpenStanza): void {
        let term = this.result.terms.get(id);
        if (term) {
            this.reportDuplicate(id, stanza.line);
        } else {
            term = createRawTerm(id, stanza.line);
            this.result.terms.set(id, term);
        }

        for (const token of stanza.tags) {
            const tag = token.tag ?? '';
            const value = token.value ?? '';

            switch (tag) {
                case 'id':
                    if (value !== id) this.reportMalformed(token, `extra id ignored, stanza id is '${id}'`);
                    break;
                case 'is_a':
                    if (value) {
                        term.isA.add(value);
                    } else {
                        this.reportMalformed(token, 'is_a needs a parent id');
                    }
                    break;
                case 'relationship':
                    this.readRelationship(term, token);
                    break;
                default:
                    this.readCommonTag(term, token);
            }
        }
    }

    private buildTypedef(id: string, stanza: OpenStanza): void {
        let typedef = this.result.typedefs.get(id);
        if (typedef) {
            this.reportDuplicate(id, stanza.line);
        } else {
            typedef = createRawTypedef(id, stanza.line);
            this.result.typedefs.set(id, typedef);
        }

        for (const token of stanza.tags) {
            const value = token.value ?? '';

            switch (token.tag) {
                case 'id':
                    if (value !== id) this.reportMalformed(token, `extra id ignored, stanza id is '${id}'`);
                    break;
                case 'inverse_of':
                    if (!value) {
                        this.reportMalformed(token, 'inverse_of needs a typedef id');
                    } else if (typedef.inverseOf === undefined) {
                        typedef.inverseOf = value;
                    } else if (typedef.inverseOf !== value) {
                        this.reportMalformed(token, `second inverse_of ignored, '${typedef.inverseOf}' is kept`);
                    }
                    break;
                default:
                    this.readCommonTag(typedef, token);
            }
        }
    }

    /**
     * Tags shared by both stanza kinds; the first value of a single-valued tag wins
     */
    private readCommonTag(entity: RawTerm | RawTypedef, token: LineToken): void {
        const value = token.value ?? '';

        switch (token.tag) {
            case 'name':
                if (entity.name === undefined) entity.name = value;
                break;
            case 'def':
                if (entity.definition === undefined) entity.definition = value;
                break;
            case 'namespace':
                if (entity.namespace === undefined && value) entity.namespace = value;
                break;
            case 'is_obsolete':
                entity.obsolete = entity.obsolete || value === 'true';
                break;
            default:
                this.keepOther(entity, token);
        }
    }

    /**
     * relationship: <typedef-id> <target-id>
     */
    private readRelationship(term: RawTerm, token: LineToken): void {
        const value = token.value ?? '';
        const match = /^(\S+)\s+(.+)$/.exec(value);
        if (!match) {
            this.reportMalformed(token, 'relationship needs a typedef id and a target id');
            return;
        }
        addRelationship(term, match[1], match[2].trim());
    }

    private keepOther(entity: RawTerm | RawTypedef, token: LineToken): void {
        addOther(entity.other, token.tag ?? '', token.value ?? '');
    }

    private reportDuplicate(id: string, line: number): void {
        this.report({
            kind: 'DUPLICATE_ID',
            severity: 'info',
            line,
            id,
            message: `Stanza '${id}' declared more than once; stanzas were combined`,
        });
    }

    private reportMalformed(token: LineToken, message: string): void {
        this.report({
            kind: 'MALFORMED_VALUE',
            severity: 'warning',
            line: token.line,
            tag: token.tag ?? '',
            value: token.value ?? '',
            message,
        });
    }

    private report(diagnostic: Diagnostic): void {
        this.result.diagnostics.push(diagnostic);
    }
}
