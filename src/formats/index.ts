import type { FormatAdapter } from './adapter.js';
import { oboFormat } from './obo.js';

export type { FormatAdapter } from './adapter.js';
export { oboFormat } from './obo.js';

const FORMATS: FormatAdapter[] = [oboFormat];

/**
 * Pick the adapter for a location by its extension, defaulting to obo
 */
export function formatFor(location: string): FormatAdapter {
    const match = /\.([A-Za-z0-9]+)(?:[?#].*)?$/.exec(location);
    const extension = match ? match[1].toLowerCase() : '';
    return FORMATS.find(format => format.extensions.includes(extension)) ?? oboFormat;
}
