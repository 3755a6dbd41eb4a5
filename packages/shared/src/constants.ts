/**
 * Constants for the habit categorizer.
 */

/**
 * The closed category enumeration.
 * Order here is not the tie-break order; that comes from each definition's priority.
 */
export const CATEGORY_IDS = [
    'Fitness',
    'Education',
    'Mindfulness',
    'Work',
    'Health',
    'Social',
    'Finance',
    'Other',
] as const;

/**
 * Category returned whenever nothing clears the fallback threshold.
 */
export const FALLBACK_CATEGORY_ID = 'Other';

/**
 * Default scoring settings. A registry may override any of them in its
 * `settings` block.
 */
export const DEFAULT_SETTINGS = {
    FUZZY_THRESHOLD: 0.8,
    FALLBACK_THRESHOLD: 0.15,
    TIE_EPSILON: 0.01,
    MAX_SCORE: 2.0,
    PHRASE_BONUS: 0.2,
    MIN_FUZZY_TOKEN_LENGTH: 3,
    MAX_INPUT_LENGTH: 200,
} as const;

export const DEFAULT_STOP_WORDS = ['a', 'an', 'the', 'to', 'my', 'of'] as const;

/**
 * Weight given to registry entries that omit one.
 */
export const DEFAULT_WEIGHTS = {
    KEYWORD: 1.0,
    PHRASE: 1.0,
    PATTERN: 0.6,
} as const;

/**
 * Phrase window bounds, in tokens.
 */
export const PHRASE_LENGTH = {
    MIN: 2,
    MAX: 3,
} as const;

export const DEFAULT_SUGGESTION_COUNT = 3;
