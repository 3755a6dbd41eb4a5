/**
 * Habit categorization.
 *
 * Data flow: raw text → tokenize → {keyword, pattern, fuzzy} matchers →
 * aggregate → result. Pure function of (input, registry): no I/O, no shared
 * mutable state, safe to call on every keystroke.
 *
 * ARCHITECTURAL NOTE: No console.* calls.
 */

import { tokenize } from '../utils/normalize.js';
import { matchKeywords } from './keyword.js';
import { matchPatterns } from './pattern.js';
import { matchFuzzy } from './fuzzy.js';
import { aggregateSignals } from './aggregate.js';
import type { CategorizationResult } from '../types/index.js';
import type { Registry } from '../registry/types.js';

/**
 * Suggest a category for a habit name.
 *
 * Never throws. Empty, punctuation-only or unrecognized input falls back to
 * "Other" with confidence 0.
 *
 * @param habitName - Free-text habit name as typed by the user
 * @param registry - Built registry
 */
export function suggestCategory(habitName: string, registry: Registry): CategorizationResult {
    const input = typeof habitName === 'string' ? habitName : '';
    const tokens = tokenize(input, registry.normalize);

    const keywordMatch = matchKeywords(tokens, registry);
    const patternSignals = matchPatterns(tokens.join(' '), registry);
    const fuzzySignals = matchFuzzy(tokens, keywordMatch.matchedPositions, registry);
    const signals = [...keywordMatch.signals, ...patternSignals, ...fuzzySignals];

    const outcome = aggregateSignals(signals, registry);

    return {
        input,
        tokens,
        scores: outcome.scores,
        category: outcome.category,
        confidence: outcome.confidence,
        signals,
        fallback: outcome.fallback,
        registry_version: registry.version,
    };
}
