// Types (re-exported from shared)
export type {
    CategoryId,
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
} from './types/index.js';

export {
    CategoryIdSchema,
    RegistryConfigSchema,
    CategorizationResultSchema,
    CATEGORY_IDS,
    FALLBACK_CATEGORY_ID,
    DEFAULT_SETTINGS,
    DEFAULT_STOP_WORDS,
    DEFAULT_WEIGHTS,
    DEFAULT_SUGGESTION_COUNT,
} from './types/index.js';

// Utils
export { tokenize, normalizeHabitName, editDistance, similarity } from './utils/index.js';
export type { NormalizeOptions } from './utils/index.js';

// Registry
export { buildRegistry, validateRegistryConfig, RegistryValidationError } from './registry/index.js';
export type { Registry, IndexedTerm, CompiledPattern } from './registry/index.js';

// Categorizer
export {
    suggestCategory,
    createCategorizationService,
    matchKeywords,
    matchPatterns,
    matchFuzzy,
    aggregateSignals,
    rankCategories,
} from './categorizer/index.js';
export type { CategorizationService, AggregateOutcome, KeywordMatchResult } from './categorizer/index.js';
