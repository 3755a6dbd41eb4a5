import { buildRegistry, validateRegistryConfig } from '@habit-categorizer/core';
import { readRegistryFile } from '../config/registry.js';
import { resolveRegistryPath } from '../config/paths.js';
import { success, warn, arrow, fail, failWith, log } from '../utils/console.js';
import type { RegistryOptions } from '../types.js';

/**
 * Validates a registry file. Exits with 1 when it has errors.
 */
export function validate(options: RegistryOptions): void {
    const path = resolveRegistryPath(options.registry);
    log(`Validating ${path}`);

    let raw: unknown;
    try {
        raw = readRegistryFile(path);
    } catch (err) {
        failWith('Failed to read registry', err);
        process.exit(1);
    }

    const result = validateRegistryConfig(raw);
    for (const warning of result.warnings) {
        warn(warning);
    }

    if (!result.valid) {
        fail(`Registry has ${result.errors.length} error(s).`);
        for (const error of result.errors) {
            console.error(`  - ${error}`);
        }
        process.exit(1);
    }

    const registry = buildRegistry(raw);
    success(`Registry ${registry.version} is valid.`);
    arrow(`Fingerprint: ${registry.fingerprint}`);
    arrow(`Categories:  ${registry.definitions.length}`);
    arrow(`Keywords:    ${registry.fuzzyKeywords.length}`);
    arrow(`Phrases:     ${registry.phraseIndex.size}`);
    arrow(`Patterns:    ${registry.patterns.length}`);
}
