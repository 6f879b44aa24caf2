import { config as loadDotenv } from 'dotenv';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export function isTruthyEnv(name: string, env: EnvSource = process.env): boolean {
    const value = env[name];
    if (!value) return false;
    return TRUE_VALUES.has(value.trim().toLowerCase());
}

export function readBooleanEnv(
    name: string,
    defaultValue: boolean,
    env: EnvSource = process.env
): boolean {
    const value = env[name];
    if (value === undefined) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    return defaultValue;
}

/**
 * Empty and whitespace-only values count as unset
 */
export function readStringEnv(name: string, env: EnvSource = process.env): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

/**
 * Load a `.env` file into process.env without overriding variables that are already set.
 * A missing file is not an error; returns whether a file was loaded.
 */
export function loadEnvFile(path?: string): boolean {
    const result = loadDotenv({ ...(path !== undefined && { path }), override: false });
    return result.error === undefined;
}
