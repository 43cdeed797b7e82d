import { z } from 'zod';
import { createInvalidOptionsError } from './errors.js';

export interface ParseOptions {
    /** Namespace applied when the header declares none */
    defaultNamespace?: string;
}

export interface BuildOptions {
    /** Treat unresolved references as fatal */
    strict?: boolean;
}

export interface LoadOptions extends ParseOptions, BuildOptions {
    /**
     * How many levels of `import:` headers to follow.
     * 0 disables imports, a negative value follows them all.
     */
    importDepth?: number;
}

export interface SerializeOptions {
    /** Value written to `format-version` when the ontology has none */
    formatVersion?: string;
}

export const DEFAULTS = {
    strict: false,
    importDepth: -1,
    formatVersion: '1.2',
} as const;

const optionsSchema = z.object({
    defaultNamespace: z.string().min(1).regex(/^\S+$/, 'namespace must not contain whitespace').optional(),
    strict: z.boolean().default(DEFAULTS.strict),
    importDepth: z.number().int().default(DEFAULTS.importDepth),
    formatVersion: z.string().min(1).default(DEFAULTS.formatVersion),
});

export type ResolvedOptions = z.infer<typeof optionsSchema>;

/**
 * Validate caller options and fill in defaults
 */
export function resolveOptions(options: LoadOptions & SerializeOptions = {}): ResolvedOptions {
    const result = optionsSchema.safeParse(options);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw createInvalidOptionsError(issues.join('; '), { issues });
    }
    return result.data;
}
