/**
 * Approximate keyword matching for typo tolerance.
 */

import { similarity, similarityUpperBound } from '../utils/edit-distance.js';
import type { MatchSignal } from '../types/index.js';
import type { Registry } from '../registry/types.js';

interface BestKeyword {
    keyword: string;
    similarity: number;
}

/**
 * Match tokens that had no exact keyword hit against the whole keyword
 * dictionary.
 *
 * Only tokens at least `min_fuzzy_token_length` long are considered. For
 * each, the most similar keyword is kept if it reaches `fuzzy_threshold`;
 * on equal similarity the keyword listed first in the registry wins. The
 * signal weight is the keyword's weight scaled by the similarity.
 *
 * @param tokens - Normalized tokens
 * @param matchedPositions - Positions the keyword matcher already resolved
 * @param registry - Built registry
 */
export function matchFuzzy(
    tokens: readonly string[],
    matchedPositions: ReadonlySet<number>,
    registry: Registry
): MatchSignal[] {
    const { fuzzy_threshold: threshold, min_fuzzy_token_length: minLength } = registry.settings;
    const signals: MatchSignal[] = [];

    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (matchedPositions.has(i) || token.length < minLength) continue;

        const best = findBestKeyword(token, registry.fuzzyKeywords, threshold);
        if (!best) continue;

        for (const hit of registry.keywordIndex.get(best.keyword) ?? []) {
            signals.push({
                category: hit.category,
                source: 'fuzzy',
                match: token,
                keyword: best.keyword,
                similarity: best.similarity,
                weight: hit.weight * best.similarity,
            });
        }
    }

    return signals;
}

function findBestKeyword(
    token: string,
    keywords: readonly string[],
    threshold: number
): BestKeyword | null {
    let best: BestKeyword | null = null;

    for (const keyword of keywords) {
        if (similarityUpperBound(token, keyword) < threshold) continue;

        const score = similarity(token, keyword);
        if (score >= threshold && (best === null || score > best.similarity)) {
            best = { keyword, similarity: score };
        }
    }

    return best;
}
