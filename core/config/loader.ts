/**
 * Stitch Config Loader
 *
 * Loads stitch.config.json (or a .mjs/.js module) from the project root
 */

import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { CONFIG_KEYS, type StitchConfig } from './types';
import type { Logger } from '../logger';

export const CONFIG_FILENAMES = [
    'stitch.config.json',
    'stitch.config.mjs',
    'stitch.config.js',
] as const;

function findConfigFile(projectRoot: string): string | null {
    for (const name of CONFIG_FILENAMES) {
        const candidate = path.join(projectRoot, name);
        if (fs.existsSync(candidate)) {
            return candidate;
        }
    }
    return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the known string keys of a raw config value, warning about the rest
 */
export function validateConfig(raw: unknown, source: string, logger: Logger): StitchConfig {
    if (!isRecord(raw)) {
        logger.warn(`Invalid config format in ${source}, using defaults`);
        return {};
    }

    const config: StitchConfig = {};
    for (const key of CONFIG_KEYS) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value === 'string' && value.trim() !== '') {
            config[key] = value.trim();
        } else {
            logger.warn(`Ignoring config key "${key}" in ${source}: expected a non-empty string`);
        }
    }

    for (const key of Object.keys(raw)) {
        if (!CONFIG_KEYS.some(known => known === key)) {
            logger.debug(`Unknown config key "${key}" in ${source}`);
        }
    }

    return config;
}

/**
 * Load the stitch config from the project root
 *
 * @returns The validated config, or an empty config when none is found or it fails to load
 */
export async function loadStitchConfig(projectRoot: string, logger: Logger): Promise<StitchConfig> {
    const configPath = findConfigFile(projectRoot);

    if (!configPath) {
        return {};
    }

    try {
        if (configPath.endsWith('.json')) {
            const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
            return validateConfig(raw, configPath, logger);
        }

        const configModule: unknown = await import(pathToFileURL(configPath).href);
        const raw = isRecord(configModule) && 'default' in configModule ? configModule.default : configModule;
        return validateConfig(raw, configPath, logger);
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Failed to load config from ${configPath}: ${message}`);
        return {};
    }
}

/**
 * Check if a stitch config exists in the project
 */
export function hasStitchConfig(projectRoot: string): boolean {
    return findConfigFile(projectRoot) !== null;
}

/**
 * Find the project root by walking up until a directory holds a stitch config.
 * Falls back to the start directory.
 */
export function findProjectRoot(startDir: string = process.cwd()): string {
    let current = path.resolve(startDir);

    while (current !== path.dirname(current)) {
        if (hasStitchConfig(current)) {
            return current;
        }
        current = path.dirname(current);
    }

    return path.resolve(startDir);
}
