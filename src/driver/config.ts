/**
 * Driver Configuration
 *
 * Read from environment variables and validated with zod.
 *
 * - OUTLINE_LOG_LEVEL: debug | info | warn | error (default: info)
 * - OUTLINE_LOG_FORMAT: pretty | json (default: pretty)
 * - OUTLINE_DETECT_PARSE_ERRORS: true | false (default: true)
 * - OUTLINE_SESSION_SENTINEL: line that ends a session (default: end)
 * - OUTLINE_MAX_FILE_SIZE_KB: largest input accepted (default: 1024)
 */

import { z } from 'zod';
import { LOG_FORMATS, LOG_LEVELS, LogFormat, LogLevel } from '../common/logger';
import { OutlineError } from '../common/errors';

export interface Config {
    logLevel: LogLevel;
    logFormat: LogFormat;
    detectParseErrors: boolean;
    sessionSentinel: string;
    maxFileSizeKB: number;
}

export const DEFAULT_CONFIG: Config = {
    logLevel: 'info',
    logFormat: 'pretty',
    detectParseErrors: true,
    sessionSentinel: 'end',
    maxFileSizeKB: 1024,
};

export const ENV_VARS = {
    LOG_LEVEL: 'OUTLINE_LOG_LEVEL',
    LOG_FORMAT: 'OUTLINE_LOG_FORMAT',
    DETECT_PARSE_ERRORS: 'OUTLINE_DETECT_PARSE_ERRORS',
    SESSION_SENTINEL: 'OUTLINE_SESSION_SENTINEL',
    MAX_FILE_SIZE_KB: 'OUTLINE_MAX_FILE_SIZE_KB',
} as const;

const EnvSchema = z.object({
    [ENV_VARS.LOG_LEVEL]: z.enum(LOG_LEVELS).default(DEFAULT_CONFIG.logLevel),
    [ENV_VARS.LOG_FORMAT]: z.enum(LOG_FORMATS).default(DEFAULT_CONFIG.logFormat),
    [ENV_VARS.DETECT_PARSE_ERRORS]: z.enum(['true', 'false'])
        .default('true')
        .transform(value => value === 'true'),
    [ENV_VARS.SESSION_SENTINEL]: z.string().trim().min(1).default(DEFAULT_CONFIG.sessionSentinel),
    [ENV_VARS.MAX_FILE_SIZE_KB]: z.coerce.number().int().positive().default(DEFAULT_CONFIG.maxFileSizeKB),
});

/**
 * Load configuration from an environment map.
 *
 * @throws OutlineError InvalidConfiguration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    // Unset and empty variables both fall back to defaults
    const present: Record<string, string> = {};
    for (const name of Object.values(ENV_VARS)) {
        const value = env[name];
        if (value !== undefined && value !== '') {
            present[name] = value;
        }
    }

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new OutlineError('InvalidConfiguration', `Invalid environment: ${issues.join(', ')}`, parsed.error);
    }

    const values = parsed.data;
    return {
        logLevel: values[ENV_VARS.LOG_LEVEL],
        logFormat: values[ENV_VARS.LOG_FORMAT],
        detectParseErrors: values[ENV_VARS.DETECT_PARSE_ERRORS],
        sessionSentinel: values[ENV_VARS.SESSION_SENTINEL],
        maxFileSizeKB: values[ENV_VARS.MAX_FILE_SIZE_KB],
    };
}
