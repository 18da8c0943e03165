/**
 * Scheduler Configuration
 *
 * Features:
 * - Schema validation with defaults
 * - Optional JSON config file
 * - COOPLOOP_* environment overrides on top of the file
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';

export const ErrorPolicySchema = z.enum(['throw', 'report']);

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

/**
 * Full scheduler config schema
 */
export const SchedulerConfigSchema = z.object({
    // What happens to a failure nobody joined on
    errorPolicy: ErrorPolicySchema.default('throw'),

    // Consecutive ready drains before a non-blocking I/O poll is forced
    maxDrainsWithoutPoll: z.number().int().positive().default(16),

    logLevel: LogLevelSchema.default('warn'),
});

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type ErrorPolicy = z.infer<typeof ErrorPolicySchema>;

export const ENV_PREFIX = 'COOPLOOP_';

/**
 * Raised when a config source fails validation or cannot be read
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly errors: string[]
    ) {
        super(`${message}: ${errors.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    /** JSON config path; falls back to COOPLOOP_CONFIG */
    file?: string;
}

/**
 * Defaults with nothing overridden
 */
export function defaultConfig(): SchedulerConfig {
    return SchedulerConfigSchema.parse({});
}

/**
 * Resolve config from an optional file and environment overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): SchedulerConfig {
    const env = options.env ?? process.env;
    const file = options.file ?? env[`${ENV_PREFIX}CONFIG`];

    const merged: Record<string, unknown> = {
        ...(file !== undefined ? readConfigFile(file) : {}),
        ...fromEnv(env),
    };

    const result = SchedulerConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError('Invalid scheduler config', formatIssues(result.error));
    }
    return result.data;
}

/**
 * Validate a config object
 */
export function validateConfig(obj: unknown): { valid: boolean; errors?: string[] } {
    const result = SchedulerConfigSchema.safeParse(obj);
    if (result.success) {
        return { valid: true };
    }
    return {
        valid: false,
        errors: formatIssues(result.error),
    };
}

function formatIssues(error: z.ZodError): string[] {
    return error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
}

function readConfigFile(path: string): Record<string, unknown> {
    if (!existsSync(path)) {
        throw new ConfigError('Config file not found', [path]);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Failed to parse ${path}`, [error instanceof Error ? error.message : String(error)]);
    }

    const object = z.record(z.unknown()).safeParse(parsed);
    if (!object.success || Array.isArray(parsed)) {
        throw new ConfigError(`Config file ${path} must contain a JSON object`, [path]);
    }
    return object.data;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    const errorPolicy = env[`${ENV_PREFIX}ERROR_POLICY`];
    if (errorPolicy !== undefined && errorPolicy !== '') {
        overrides['errorPolicy'] = errorPolicy.trim();
    }

    const maxDrains = env[`${ENV_PREFIX}MAX_DRAINS_WITHOUT_POLL`];
    if (maxDrains !== undefined && maxDrains !== '') {
        overrides['maxDrainsWithoutPoll'] = Number(maxDrains);
    }

    const logLevel = env[`${ENV_PREFIX}LOG_LEVEL`];
    if (logLevel !== undefined && logLevel !== '') {
        overrides['logLevel'] = logLevel.trim();
    }

    return overrides;
}
