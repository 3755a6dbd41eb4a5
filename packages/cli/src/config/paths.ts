import { resolve } from 'node:path';
import { createRequire } from 'node:module';

const localRequire = createRequire(import.meta.url);

/**
 * Environment variable naming a registry file.
 */
export const REGISTRY_ENV_VAR = 'HABIT_CATEGORIZER_REGISTRY';

/**
 * Path of the registry asset shipped with this package.
 * Resolved through the package's own exports so it works from sources and from dist.
 */
export function defaultRegistryPath(): string {
    return localRequire.resolve('@habit-categorizer/cli/assets/default-registry.yaml');
}

/**
 * Pick the registry file: explicit flag, then environment, then the bundled default.
 */
export function resolveRegistryPath(
    explicit?: string,
    env: NodeJS.ProcessEnv = process.env
): string {
    if (explicit && explicit.trim() !== '') {
        return resolve(explicit);
    }

    const fromEnv = env[REGISTRY_ENV_VAR];
    if (fromEnv && fromEnv.trim() !== '') {
        return resolve(fromEnv);
    }

    return defaultRegistryPath();
}
