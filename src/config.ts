import { z } from 'zod';
import { createConfigError } from './types/errors.js';
import { DEFAULTS } from './types/options.js';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(v => v === 'true' || v === '1');

export const ConfigSchema = z.object({
    HPOA_INPUT_DIR: z.string().min(1).default(DEFAULTS.inputDir),
    HPOA_OUTPUT_DIR: z.string().min(1).default(DEFAULTS.outputDir),
    // Checked once flags are merged in, see resolveRunOptions
    HPOA_COMPRESSION: z.string().default(DEFAULTS.compression),
    HPOA_ADD_EXCLUDED: booleanFlag.optional(),
    HPOA_SORT_OUTPUT: booleanFlag.optional(),
    HPOA_FULL_EDGES: booleanFlag.optional(),
});

export interface AppConfig {
    inputDir: string;
    outputDir: string;
    compression: string;
    addExcludedPhenotypes: boolean;
    sortOutput: boolean;
    fullEdgeSchema: boolean;
}

/**
 * Build the configuration from environment variables. Unset variables take
 * their defaults; invalid ones fail with INVALID_CONFIG.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = ConfigSchema.safeParse(env);
    if (!result.success) {
        throw createConfigError(
            result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const parsed = result.data;
    return {
        inputDir: parsed.HPOA_INPUT_DIR,
        outputDir: parsed.HPOA_OUTPUT_DIR,
        compression: parsed.HPOA_COMPRESSION,
        addExcludedPhenotypes: parsed.HPOA_ADD_EXCLUDED ?? DEFAULTS.addExcludedPhenotypes,
        sortOutput: parsed.HPOA_SORT_OUTPUT ?? DEFAULTS.sortOutput,
        fullEdgeSchema: parsed.HPOA_FULL_EDGES ?? DEFAULTS.fullEdgeSchema,
    };
}
