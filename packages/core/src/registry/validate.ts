/**
 * Registry config validation.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { tokenize } from '../utils/normalize.js';
import type { NormalizeOptions } from '../utils/normalize.js';
import {
    CATEGORY_IDS,
    FALLBACK_CATEGORY_ID,
    PHRASE_LENGTH,
    RegistryConfigSchema,
} from '../types/index.js';
import type {
    CategoryDefinition,
    RegistryConfig,
    RegistrySettings,
    RegistryValidationResult,
} from '../types/index.js';

/**
 * Validation result together with the parsed config, when parsing succeeded.
 */
export interface RegistryInspection {
    result: RegistryValidationResult;
    config: RegistryConfig | null;
}

/**
 * Normalizer options implied by a registry's settings.
 */
export function normalizeOptionsFor(settings: RegistrySettings): NormalizeOptions {
    // Stop words go through the same cleanup as input, minus stop word removal itself
    const stopWords = new Set(
        settings.stop_words.flatMap((word) =>
            tokenize(word, { stopWords: new Set(), maxLength: settings.max_input_length })
        )
    );
    return { stopWords, maxLength: settings.max_input_length };
}

/**
 * Validate a raw registry config (as parsed from YAML or JSON).
 *
 * Errors (fatal):
 * - schema violations, empty category set, missing "Other"
 * - duplicate category ids or priorities
 * - keywords that do not normalize to one token, phrases that do not
 *   normalize to 2-3 tokens, patterns that do not compile
 * - one term listed twice in a category with contradictory weights
 *
 * Warnings: exact duplicate terms, categories with no definition.
 *
 * @param raw - Unvalidated config value
 * @returns Validation result with errors and warnings
 */
export function validateRegistryConfig(raw: unknown): RegistryValidationResult {
    return inspectRegistryConfig(raw).result;
}

/**
 * Same checks as validateRegistryConfig, also returning the parsed config.
 */
export function inspectRegistryConfig(raw: unknown): RegistryInspection {
    const errors: string[] = [];
    const warnings: string[] = [];

    const parsed = RegistryConfigSchema.safeParse(raw);
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            errors.push(`${path}: ${issue.message}`);
        }
        return { result: { valid: false, errors, warnings }, config: null };
    }

    const config = parsed.data;

    if (config.categories.length === 0) {
        errors.push('Registry must define at least one category');
        return { result: { valid: false, errors, warnings }, config };
    }

    const seenIds = new Set<string>();
    const seenPriorities = new Map<number, string>();

    for (const definition of config.categories) {
        if (seenIds.has(definition.id)) {
            errors.push(`Duplicate category definition "${definition.id}"`);
        }
        seenIds.add(definition.id);

        const samePriority = seenPriorities.get(definition.priority);
        if (samePriority !== undefined) {
            errors.push(
                `Categories "${samePriority}" and "${definition.id}" share priority ${definition.priority}`
            );
        } else {
            seenPriorities.set(definition.priority, definition.id);
        }
    }

    if (!seenIds.has(FALLBACK_CATEGORY_ID)) {
        errors.push(`Registry must define the fallback category "${FALLBACK_CATEGORY_ID}"`);
    }

    for (const id of CATEGORY_IDS) {
        if (!seenIds.has(id)) {
            warnings.push(`Category "${id}" has no definition and can never be suggested`);
        }
    }

    const normalizeOptions = normalizeOptionsFor(config.settings);
    for (const definition of config.categories) {
        checkTerms(definition, normalizeOptions, errors, warnings);
        checkPatterns(definition, errors);
    }

    return {
        result: { valid: errors.length === 0, errors, warnings },
        config,
    };
}

function checkTerms(
    definition: CategoryDefinition,
    normalizeOptions: NormalizeOptions,
    errors: string[],
    warnings: string[]
): void {
    const groups = [
        { kind: 'keyword', entries: definition.keywords, min: 1, max: 1 },
        { kind: 'phrase', entries: definition.phrases, min: PHRASE_LENGTH.MIN, max: PHRASE_LENGTH.MAX },
    ];

    for (const { kind, entries, min, max } of groups) {
        const weights = new Map<string, number>();

        for (const entry of entries) {
            const tokens = tokenize(entry.term, normalizeOptions);
            if (tokens.length < min || tokens.length > max) {
                const expected = min === max ? `${min} token` : `${min}-${max} tokens`;
                errors.push(
                    `Category "${definition.id}": ${kind} "${entry.term}" must normalize to ` +
                    `${expected} (got ${tokens.length})`
                );
                continue;
            }

            const key = tokens.join(' ');
            const previous = weights.get(key);
            if (previous === undefined) {
                weights.set(key, entry.weight);
            } else if (previous !== entry.weight) {
                errors.push(
                    `Category "${definition.id}": ${kind} "${key}" listed with contradictory ` +
                    `weights ${previous} and ${entry.weight}`
                );
            } else {
                warnings.push(`Category "${definition.id}": duplicate ${kind} "${key}" ignored`);
            }
        }
    }
}

function checkPatterns(definition: CategoryDefinition, errors: string[]): void {
    for (const entry of definition.patterns) {
        try {
            new RegExp(entry.pattern, 'u');
        } catch (e) {
            const errorMsg = e instanceof Error ? e.message : String(e);
            errors.push(`Category "${definition.id}": invalid pattern "${entry.pattern}": ${errorMsg}`);
        }
    }
}
