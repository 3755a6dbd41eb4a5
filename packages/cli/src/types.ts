/**
 * Habit Categorizer CLI - Core Types
 */

export interface RegistryOptions {
    /** Explicit registry file; overrides the environment and the bundled default. */
    registry?: string;
}

export interface SuggestOptions extends RegistryOptions {
    top?: number;
    json: boolean;
    explain: boolean;
}

export interface BatchOptions extends RegistryOptions {
    out?: string;
}

export interface AddKeywordOptions extends RegistryOptions {
    weight?: number;
}
