import { readFile } from 'fs/promises';
import * as path from 'path';
import { createSourceError } from '../types/errors.js';

/**
 * Where ontology text comes from. Implementations decide how locations
 * are read (disk, network, memory) and how relative imports resolve.
 */
export interface LineSource {
    read(location: string): Promise<string[]>;
    /** Resolve an `import:` reference found in the ontology at `base` */
    resolve(base: string, reference: string): string;
}

const URL_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;

/**
 * Reads ontologies from the local file system
 */
export class FileLineSource implements LineSource {
    async read(location: string): Promise<string[]> {
        try {
            const content = await readFile(location, 'utf-8');
            return content.split(/\r?\n/);
        } catch (e) {
            throw createSourceError(location, e);
        }
    }

    resolve(base: string, reference: string): string {
        if (URL_PATTERN.test(reference) || path.isAbsolute(reference)) {
            return reference;
        }
        return path.join(path.dirname(base), reference);
    }
}

/**
 * In-memory source keyed by location, mostly useful for tests and for
 * callers that already hold the text
 */
export class MemoryLineSource implements LineSource {
    private documents: Map<string, string>;

    constructor(documents: Record<string, string> = {}) {
        this.documents = new Map(Object.entries(documents));
    }

    async read(location: string): Promise<string[]> {
        const content = this.documents.get(location);
        if (content === undefined) {
            throw createSourceError(location, new Error('no such document'));
        }
        return content.split(/\r?\n/);
    }

    resolve(base: string, reference: string): string {
        if (URL_PATTERN.test(reference) || reference.startsWith('/')) {
            return reference;
        }
        return path.posix.join(path.posix.dirname(base), reference);
    }
}
