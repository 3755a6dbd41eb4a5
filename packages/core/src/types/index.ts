/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    CategoryId,
    KeywordEntry,
    PhraseEntry,
    PatternEntry,
    CategoryDefinition,
    RegistrySettings,
    RegistryConfig,
    RegistryValidationResult,
    SignalSource,
    MatchSignal,
    CategoryScores,
    CategorizationResult,
    CategorySuggestion,
    CategoryInfo,
} from '@habit-categorizer/shared';

export {
    CategoryIdSchema,
    RegistryConfigSchema,
    CategorizationResultSchema,
    CATEGORY_IDS,
    FALLBACK_CATEGORY_ID,
    DEFAULT_SETTINGS,
    DEFAULT_STOP_WORDS,
    DEFAULT_WEIGHTS,
    PHRASE_LENGTH,
    DEFAULT_SUGGESTION_COUNT,
} from '@habit-categorizer/shared';
