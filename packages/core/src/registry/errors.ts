/**
 * Raised when a registry config fails validation. Carries every issue found,
 * not just the first.
 */
export class RegistryValidationError extends Error {
    readonly issues: string[];
    readonly warnings: string[];

    constructor(issues: string[], warnings: string[] = []) {
        super(`Invalid category registry: ${issues.join('; ')}`);
        this.name = 'RegistryValidationError';
        this.issues = issues;
        this.warnings = warnings;
    }
}
