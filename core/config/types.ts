/**
 * Stitch Config Types
 *
 * Configuration interfaces for stitch.config.json / stitch.config.mjs
 */

// ============================================
// Main Config Types
// ============================================

/**
 * Stitch configuration object. Every key is optional; see DEFAULT_CONFIG.
 */
export interface StitchConfig {
    /** Source root relative to the project root */
    sourceDir?: string;
    /** Output root for production builds */
    outputDir?: string;
    /** Output root for development and watch builds */
    devOutputDir?: string;
    /** Static asset directory, relative to the source root */
    staticDirName?: string;
    /** Components directory, relative to the source root */
    componentsDir?: string;
}

export type ResolvedStitchConfig = Required<StitchConfig>;

export const CONFIG_KEYS = [
    'sourceDir',
    'outputDir',
    'devOutputDir',
    'staticDirName',
    'componentsDir'
] as const satisfies ReadonlyArray<keyof StitchConfig>;

export const DEFAULT_CONFIG: ResolvedStitchConfig = {
    sourceDir: 'src',
    outputDir: 'dist',
    devOutputDir: '.stitch-dev',
    staticDirName: 'static',
    componentsDir: 'components'
};

/**
 * Define a Stitch configuration with full type safety
 */
export function defineConfig(config: StitchConfig): StitchConfig {
    return config;
}

/**
 * Fill in missing keys from DEFAULT_CONFIG
 */
export function resolveConfig(config: StitchConfig = {}): ResolvedStitchConfig {
    const resolved: ResolvedStitchConfig = { ...DEFAULT_CONFIG };
    for (const key of CONFIG_KEYS) {
        const value = config[key];
        if (value !== undefined && value !== '') {
            resolved[key] = value;
        }
    }
    return resolved;
}
