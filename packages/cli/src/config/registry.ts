import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { buildRegistry, validateRegistryConfig } from '@habit-categorizer/core';
import type { Registry, RegistryValidationResult } from '@habit-categorizer/core';

/**
 * Reads and parses a registry YAML file without validating it.
 */
export function readRegistryFile(path: string): unknown {
    if (!existsSync(path)) {
        throw new Error(`Registry file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    try {
        return parse(content);
    } catch (err) {
        throw new Error(`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Loads a registry file into an immutable Registry.
 * Throws RegistryValidationError when the file does not validate.
 */
export function loadRegistry(path: string): Registry {
    return buildRegistry(readRegistryFile(path));
}

/**
 * Validates a registry file, returning issues as data.
 */
export function checkRegistryFile(path: string): RegistryValidationResult {
    return validateRegistryConfig(readRegistryFile(path));
}
