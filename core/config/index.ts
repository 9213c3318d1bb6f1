/**
 * Stitch Config
 *
 * Public exports for the config layer
 */

export { defineConfig, resolveConfig, DEFAULT_CONFIG, CONFIG_KEYS } from './types';
export type { StitchConfig, ResolvedStitchConfig } from './types';
export { loadStitchConfig, hasStitchConfig, findProjectRoot, validateConfig, CONFIG_FILENAMES } from './loader';
