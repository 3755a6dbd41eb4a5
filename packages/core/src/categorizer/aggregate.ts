/**
 * Signal fusion and the final decision.
 *
 * Layer summary:
 * 1. Sum signal weights per category
 * 2. confidence = clamp(score / max_score, 0, 1)
 * 3. Highest confidence wins; categories within tie_epsilon of it compete
 *    and the lowest priority rank takes the tie
 * 4. Below fallback_threshold the decision becomes "Other" with confidence 0
 */

import { FALLBACK_CATEGORY_ID } from '../types/index.js';
import type { CategoryScores, CategorySuggestion, MatchSignal } from '../types/index.js';
import type { Registry } from '../registry/types.js';
import type { AggregateOutcome } from './types.js';

/**
 * A score map with every category at zero.
 */
export function emptyScores(): CategoryScores {
    return {
        Fitness: 0,
        Education: 0,
        Mindfulness: 0,
        Work: 0,
        Health: 0,
        Social: 0,
        Finance: 0,
        Other: 0,
    };
}

export function toConfidence(score: number, registry: Registry): number {
    return Math.min(1, Math.max(0, score / registry.settings.max_score));
}

/**
 * Rank the registry's categories by confidence.
 *
 * The first entry is always the tie-break winner. The rest follow by
 * confidence descending, then priority ascending.
 */
export function rankCategories(scores: CategoryScores, registry: Registry): CategorySuggestion[] {
    const entries = registry.definitions.map((definition) => ({
        category: definition.id,
        confidence: toConfidence(scores[definition.id], registry),
        priority: definition.priority,
    }));
    if (entries.length === 0) return [];

    const ordered = [...entries].sort(
        (a, b) => b.confidence - a.confidence || a.priority - b.priority
    );

    const top = ordered[0].confidence;
    const winner = ordered
        .filter((entry) => top - entry.confidence <= registry.settings.tie_epsilon)
        .reduce((best, entry) => (entry.priority < best.priority ? entry : best));

    return [winner, ...ordered.filter((entry) => entry !== winner)].map(({ category, confidence }) => ({
        category,
        confidence,
    }));
}

/**
 * Fuse all signals into one decision.
 *
 * @param signals - Signals from every matcher
 * @param registry - Built registry
 */
export function aggregateSignals(signals: readonly MatchSignal[], registry: Registry): AggregateOutcome {
    const scores = emptyScores();
    for (const signal of signals) {
        scores[signal.category] += signal.weight;
    }

    const ranking = rankCategories(scores, registry);
    const winner = ranking.length > 0 ? ranking[0] : null;

    if (winner === null || winner.confidence < registry.settings.fallback_threshold) {
        return { scores, category: FALLBACK_CATEGORY_ID, confidence: 0, fallback: true, ranking };
    }

    return { scores, category: winner.category, confidence: winner.confidence, fallback: false, ranking };
}
