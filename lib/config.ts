import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { INTERACTIVITY_LEVELS } from './models';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const configSchema = z.object({
    tempDir: z.string().min(1),
    logDir: z.string().min(1),
    /** Unset means the catalog bundled in data/packages.json */
    catalogPath: z.string().min(1).optional(),
    logLevel: z.enum(LOG_LEVELS),
    interactivity: z.enum(INTERACTIVITY_LEVELS),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Reads the configuration from SETUP_CONDUCTOR_* environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const tempDir = env.SETUP_CONDUCTOR_TEMP_DIR || path.join(os.tmpdir(), 'setup-conductor');

    const result = configSchema.safeParse({
        tempDir,
        logDir: env.SETUP_CONDUCTOR_LOG_DIR || path.join(tempDir, 'logs'),
        catalogPath: env.SETUP_CONDUCTOR_CATALOG || undefined,
        logLevel: env.SETUP_CONDUCTOR_LOG_LEVEL || 'info',
        interactivity: env.SETUP_CONDUCTOR_INTERACTIVITY || 'silent',
    });

    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    return result.data;
}
