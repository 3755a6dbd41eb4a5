/**
 * Zod schemas for habit categorizer data structures.
 *
 * Registry files are snake_case YAML; the schemas keep those names so a
 * parsed file and its typed value look the same.
 */

import { z } from 'zod';
import {
    CATEGORY_IDS,
    DEFAULT_SETTINGS,
    DEFAULT_STOP_WORDS,
    DEFAULT_WEIGHTS,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

const weight = z.number().positive().max(10);

const probability = z.number().min(0).max(1);

/**
 * Hex color as used by the UI (#RRGGBB).
 */
const hexColor = z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'Must be #RRGGBB format');

// ============================================================================
// Category
// ============================================================================

export const CategoryIdSchema = z.enum(CATEGORY_IDS);

export type CategoryId = z.infer<typeof CategoryIdSchema>;

// ============================================================================
// Registry Configuration Schemas
// ============================================================================

/**
 * A keyword or phrase entry. Bare strings are accepted in YAML and take the
 * default weight.
 */
function termEntry(defaultWeight: number) {
    return z.union([
        z.string().min(1).transform((term) => ({ term, weight: defaultWeight })),
        z.object({
            term: z.string().min(1),
            weight: weight.default(defaultWeight),
        }),
    ]);
}

export const KeywordEntrySchema = termEntry(DEFAULT_WEIGHTS.KEYWORD);

export type KeywordEntry = z.infer<typeof KeywordEntrySchema>;

export const PhraseEntrySchema = termEntry(DEFAULT_WEIGHTS.PHRASE);

export type PhraseEntry = z.infer<typeof PhraseEntrySchema>;

/**
 * Pattern rule, written against the normalized (lowercase, stop-word free) text.
 */
export const PatternEntrySchema = z.object({
    pattern: z.string().min(1),
    weight: weight.default(DEFAULT_WEIGHTS.PATTERN),
    note: z.string().optional(),
});

export type PatternEntry = z.infer<typeof PatternEntrySchema>;

export const CategoryDefinitionSchema = z.object({
    id: CategoryIdSchema,
    label: z.string().min(1).optional(),
    priority: z.number().int().min(0),
    icon: z.string().optional(),
    color: hexColor.optional(),
    keywords: z.array(KeywordEntrySchema).default([]),
    phrases: z.array(PhraseEntrySchema).default([]),
    patterns: z.array(PatternEntrySchema).default([]),
});

export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;

export const RegistrySettingsSchema = z.object({
    fuzzy_threshold: probability.default(DEFAULT_SETTINGS.FUZZY_THRESHOLD),
    fallback_threshold: probability.default(DEFAULT_SETTINGS.FALLBACK_THRESHOLD),
    tie_epsilon: probability.default(DEFAULT_SETTINGS.TIE_EPSILON),
    max_score: z.number().positive().default(DEFAULT_SETTINGS.MAX_SCORE),
    phrase_bonus: z.number().min(0).default(DEFAULT_SETTINGS.PHRASE_BONUS),
    min_fuzzy_token_length: z.number().int().min(1).default(DEFAULT_SETTINGS.MIN_FUZZY_TOKEN_LENGTH),
    max_input_length: z.number().int().positive().default(DEFAULT_SETTINGS.MAX_INPUT_LENGTH),
    stop_words: z.array(z.string()).default([...DEFAULT_STOP_WORDS]),
});

export type RegistrySettings = z.infer<typeof RegistrySettingsSchema>;

/**
 * The versioned registry asset.
 */
export const RegistryConfigSchema = z.object({
    version: z.string().min(1),
    settings: RegistrySettingsSchema.default({}),
    categories: z.array(CategoryDefinitionSchema),
});

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;

/**
 * Registry validation result. Errors are fatal, warnings are not.
 */
export const RegistryValidationResultSchema = z.object({
    valid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
});

export type RegistryValidationResult = z.infer<typeof RegistryValidationResultSchema>;

// ============================================================================
// Categorization Schemas
// ============================================================================

export const SignalSourceSchema = z.enum(['keyword', 'phrase', 'pattern', 'fuzzy']);

export type SignalSource = z.infer<typeof SignalSourceSchema>;

/**
 * One piece of evidence for one category.
 */
export const MatchSignalSchema = z.object({
    category: CategoryIdSchema,
    source: SignalSourceSchema,
    match: z.string(),
    weight: z.number().min(0),
    keyword: z.string().optional(),
    similarity: probability.optional(),
});

export type MatchSignal = z.infer<typeof MatchSignalSchema>;

const score = z.number().min(0);

/**
 * Aggregate score per category. Every category is always present.
 */
export const CategoryScoresSchema = z.object({
    Fitness: score,
    Education: score,
    Mindfulness: score,
    Work: score,
    Health: score,
    Social: score,
    Finance: score,
    Other: score,
}) satisfies z.ZodType<Record<CategoryId, number>>;

export type CategoryScores = z.infer<typeof CategoryScoresSchema>;

/**
 * What suggestCategory() returns.
 */
export const CategorizationResultSchema = z.object({
    input: z.string(),
    tokens: z.array(z.string()),
    scores: CategoryScoresSchema,
    category: CategoryIdSchema,
    confidence: probability,
    signals: z.array(MatchSignalSchema),
    fallback: z.boolean(),
    registry_version: z.string(),
});

export type CategorizationResult = z.infer<typeof CategorizationResultSchema>;

/**
 * Ranked suggestion entry.
 */
export const CategorySuggestionSchema = z.object({
    category: CategoryIdSchema,
    confidence: probability,
});

export type CategorySuggestion = z.infer<typeof CategorySuggestionSchema>;

/**
 * Display info for a category, as shown in pickers.
 */
export const CategoryInfoSchema = z.object({
    id: CategoryIdSchema,
    label: z.string(),
    icon: z.string().optional(),
    color: hexColor.optional(),
    priority: z.number().int().min(0),
});

export type CategoryInfo = z.infer<typeof CategoryInfoSchema>;
