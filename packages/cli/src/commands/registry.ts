import { loadRegistry } from '../config/registry.js';
import { resolveRegistryPath } from '../config/paths.js';
import { failWith } from '../utils/console.js';
import type { Registry } from '@habit-categorizer/core';
import type { RegistryOptions } from '../types.js';

/**
 * Loads the registry a command runs against, exiting on failure.
 */
export function openRegistry(options: RegistryOptions): Registry {
    const path = resolveRegistryPath(options.registry);
    try {
        return loadRegistry(path);
    } catch (err) {
        failWith(`Failed to load registry ${path}`, err);
        process.exit(1);
    }
}
