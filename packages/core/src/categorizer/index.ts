/**
 * Categorizer module: habit name → category.
 */

export { suggestCategory } from './suggest.js';
export { createCategorizationService } from './service.js';
export { matchKeywords } from './keyword.js';
export { matchPatterns } from './pattern.js';
export { matchFuzzy } from './fuzzy.js';
export { aggregateSignals, rankCategories, emptyScores, toConfidence } from './aggregate.js';
export type { KeywordMatchResult, AggregateOutcome, CategorizationService } from './types.js';
