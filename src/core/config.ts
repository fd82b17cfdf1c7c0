/**
 * Rootstake configuration
 * Defaults merged with environment overrides and explicit options
 */

export interface RootConfig {
    /** Key the resolved root is stored under. */
    rootKey: string;
    /** Suffix that marks a file as loadable into the environment. */
    auxSuffix: string;
    /** Directory name that anchors git-based resolution. */
    gitMarker: string;
    /**
     * Substring of the executable path that marks a program launched from a
     * transient cache rather than an install. The default matches npm's exec
     * cache (`~/.npm/_npx/<hash>/node_modules/...`), where `npx` and
     * `npm exec` place and run packages fetched for a single invocation.
     */
    buildCacheMarker: string;
}

export const DEFAULT_ROOT_KEY = 'GROOT';
export const DEFAULT_BUILD_CACHE_MARKER = '_npx';

export function getDefaultConfig(): RootConfig {
    return {
        rootKey: DEFAULT_ROOT_KEY,
        auxSuffix: '.env',
        gitMarker: '.git',
        buildCacheMarker: DEFAULT_BUILD_CACHE_MARKER,
    };
}

function pick(value: string | undefined): string | undefined {
    const trimmed = (value || '').trim();
    return trimmed === '' ? undefined : trimmed;
}

/**
 * Build the effective configuration. Blank values never replace a default.
 */
export function loadConfig(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<RootConfig> = {}
): RootConfig {
    const defaults = getDefaultConfig();
    return {
        rootKey: pick(overrides.rootKey) || pick(env.ROOTSTAKE_KEY) || defaults.rootKey,
        auxSuffix: pick(overrides.auxSuffix) || pick(env.ROOTSTAKE_AUX_SUFFIX) || defaults.auxSuffix,
        gitMarker: pick(overrides.gitMarker) || defaults.gitMarker,
        buildCacheMarker: pick(overrides.buildCacheMarker) || pick(env.ROOTSTAKE_BUILD_MARKER) || defaults.buildCacheMarker,
    };
}
