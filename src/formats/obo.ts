import type { FormatAdapter } from './adapter.js';
import { parse } from '../parser/index.js';
import { serializeOntology } from '../serializer/obo.js';

export const oboFormat: FormatAdapter = {
    name: 'obo',
    extensions: ['obo'],
    parse,
    serialize: serializeOntology,
};
