/**
 * Internal types for categorizer module.
 */

import type {
    CategorizationResult,
    CategoryId,
    CategoryInfo,
    CategoryScores,
    CategorySuggestion,
    MatchSignal,
} from '../types/index.js';
import type { Registry } from '../registry/types.js';

/**
 * Output of the keyword/phrase matcher.
 */
export interface KeywordMatchResult {
    signals: MatchSignal[];
    /** Token positions with an exact keyword hit; the fuzzy matcher skips them. */
    matchedPositions: ReadonlySet<number>;
}

/**
 * Decision made by the score aggregator.
 */
export interface AggregateOutcome {
    scores: CategoryScores;
    category: CategoryId;
    confidence: number;
    fallback: boolean;
    /** Registry categories, winner first, then by confidence and priority. */
    ranking: CategorySuggestion[];
}

/**
 * Facade bound to one registry.
 */
export interface CategorizationService {
    readonly registry: Registry;
    suggestCategory(habitName: string): CategorizationResult;
    getSuggestions(habitName: string, topN?: number): CategorySuggestion[];
    listCategories(): CategoryInfo[];
}
