// Schemas
export {
    CategoryIdSchema,
    KeywordEntrySchema,
    PhraseEntrySchema,
    PatternEntrySchema,
    CategoryDefinitionSchema,
    RegistrySettingsSchema,
    RegistryConfigSchema,
    RegistryValidationResultSchema,
    SignalSourceSchema,
    MatchSignalSchema,
    CategoryScoresSchema,
    CategorizationResultSchema,
    CategorySuggestionSchema,
    CategoryInfoSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    CATEGORY_IDS,
    FALLBACK_CATEGORY_ID,
    DEFAULT_SETTINGS,
    DEFAULT_STOP_WORDS,
    DEFAULT_WEIGHTS,
    PHRASE_LENGTH,
    DEFAULT_SUGGESTION_COUNT,
} from './constants.js';
