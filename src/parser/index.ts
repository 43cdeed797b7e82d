import type { RawEntitySet } from '../types/entities.js';
import type { ParseOptions } from '../types/options.js';
import { LineTokenizer } from './tokenizer.js';
import { StanzaParser } from './parser.js';

export { LineTokenizer, tokenizeLine, splitComment, escapeValue } from './tokenizer.js';
export { StanzaParser } from './parser.js';

/**
 * Parse stanza-format text into a raw, unvalidated entity set
 */
export function parse(input: string | readonly string[], options: ParseOptions = {}): RawEntitySet {
    const tokenizer = new LineTokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new StanzaParser(tokens, options);
    return parser.parse();
}
