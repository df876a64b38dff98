/**
 * @fileoverview Runtime configuration
 * @module core/AppConfig
 *
 * Defaults come from Constants; environment variables and explicit overrides
 * are layered on top. Invalid environment values are reported and ignored.
 *
 * Usage:
 * ```typescript
 * const config = loadConfig(process.env, { pollIntervalMs: 500 });
 * ```
 */

import { z } from 'zod';
import { APP_NAME, ENV_KEYS, POLL_INTERVAL_MS } from './Constants';

/**
 * Configuration consumed by AppInitializer
 */
export interface AppConfig {
    /** Name of the per-user data directory */
    appName: string;
    /** Clipboard poll period */
    pollIntervalMs: number;
    /** Explicit history file; null = resolve from appName */
    historyFilePath: string | null;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Readonly<AppConfig> = Object.freeze({
    appName: APP_NAME,
    pollIntervalMs: POLL_INTERVAL_MS,
    historyFilePath: null,
});

const pollIntervalSchema = z.coerce.number().int().positive();
const nonEmptySchema = z.string().trim().min(1);

/**
 * Read one environment variable through a schema
 * @returns Parsed value, or undefined when unset or invalid
 */
function readEnv<T>(env: NodeJS.ProcessEnv, key: string, schema: z.ZodType<T>): T | undefined {
    const raw = env[key];
    if (raw === undefined) return undefined;

    const result = schema.safeParse(raw);
    if (!result.success) {
        const reason = result.error.issues.map(issue => issue.message).join('; ');
        console.warn(`[AppConfig] Ignoring ${key}=${JSON.stringify(raw)}: ${reason}`);
        return undefined;
    }
    return result.data;
}

/**
 * Build the effective configuration
 * @param env - Environment to read (defaults to process.env)
 * @param overrides - Values that win over both defaults and environment
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<AppConfig> = {}
): AppConfig {
    const fromEnv: Partial<AppConfig> = {};

    const pollIntervalMs = readEnv(env, ENV_KEYS.POLL_INTERVAL_MS, pollIntervalSchema);
    if (pollIntervalMs !== undefined) fromEnv.pollIntervalMs = pollIntervalMs;

    const historyFilePath = readEnv(env, ENV_KEYS.HISTORY_FILE, nonEmptySchema);
    if (historyFilePath !== undefined) fromEnv.historyFilePath = historyFilePath;

    const appName = readEnv(env, ENV_KEYS.APP_NAME, nonEmptySchema);
    if (appName !== undefined) fromEnv.appName = appName;

    return {
        ...DEFAULT_CONFIG,
        ...fromEnv,
        ...overrides,
    };
}
