/**
 * Types for the built, read-only category registry.
 */

import type { CategoryDefinition, CategoryId, RegistrySettings } from '../types/index.js';
import type { NormalizeOptions } from '../utils/normalize.js';

/**
 * One keyword or phrase mapping to a category.
 * For phrases `weight` already includes the specificity bonus.
 */
export interface IndexedTerm {
    category: CategoryId;
    term: string;
    weight: number;
}

/**
 * Pattern rule compiled at build time. Never carries the `g` flag, so
 * evaluating it leaves no state behind.
 */
export interface CompiledPattern {
    category: CategoryId;
    source: string;
    regex: RegExp;
    weight: number;
}

/**
 * Immutable registry value passed to every categorization call.
 */
export interface Registry {
    readonly version: string;
    /** First 16 hex chars of the SHA-256 of the canonical config. */
    readonly fingerprint: string;
    readonly settings: Readonly<RegistrySettings>;
    readonly normalize: Readonly<NormalizeOptions>;
    /** Definitions in declared order. */
    readonly definitions: readonly CategoryDefinition[];
    readonly priorities: ReadonlyMap<CategoryId, number>;
    readonly keywordIndex: ReadonlyMap<string, readonly IndexedTerm[]>;
    readonly phraseIndex: ReadonlyMap<string, readonly IndexedTerm[]>;
    /** All pattern rules, in registry order. */
    readonly patterns: readonly CompiledPattern[];
    /** Distinct keywords in registry order, the fuzzy matcher's dictionary. */
    readonly fuzzyKeywords: readonly string[];
}
