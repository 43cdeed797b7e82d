/**
 * Parser Types
 */

export type LineType =
    | 'BLANK'         // empty or whitespace only
    | 'COMMENT'       // line starting with '!'
    | 'STANZA'        // [Term], [Typedef], ...
    | 'TAG_VALUE'     // tag: value ! comment
    | 'INVALID';      // anything else

export interface LineToken {
    type: LineType;
    /** 1-based line number */
    line: number;
    raw: string;
    /** Stanza name for STANZA lines, tag for TAG_VALUE lines */
    tag?: string;
    /** Value with the trailing comment removed and escapes resolved */
    value?: string;
    comment?: string;
}

export type ParserState = 'Header' | 'InTypedefStanza' | 'InTermStanza' | 'InUnknownStanza';
