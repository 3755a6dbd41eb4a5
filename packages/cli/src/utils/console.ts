/**
 * Formatted console output helpers
 */

import { RegistryValidationError } from '@habit-categorizer/core';

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function fail(message: string): void {
    console.error(`\n✖ Error: ${message}`);
}

/**
 * Print an error, listing each issue of a registry validation failure.
 */
export function failWith(context: string, err: unknown): void {
    if (err instanceof RegistryValidationError) {
        fail(`${context}: registry has ${err.issues.length} error(s).`);
        for (const issue of err.issues) {
            console.error(`  - ${issue}`);
        }
        return;
    }
    fail(`${context}: ${err instanceof Error ? err.message : String(err)}`);
}
