/**
 * Exact keyword and phrase lookup.
 */

import { PHRASE_LENGTH } from '../types/index.js';
import type { MatchSignal } from '../types/index.js';
import type { Registry } from '../registry/types.js';
import type { KeywordMatchResult } from './types.js';

/**
 * Look up every token in the keyword index, and every window of 2-3
 * contiguous tokens in the phrase index.
 *
 * Signals are emitted in token order: a token's keyword hits first, then the
 * phrases starting at that token, shortest first. Phrase and keyword signals
 * for the same words co-exist.
 *
 * @param tokens - Normalized tokens
 * @param registry - Built registry
 */
export function matchKeywords(tokens: readonly string[], registry: Registry): KeywordMatchResult {
    const signals: MatchSignal[] = [];
    const matchedPositions = new Set<number>();

    for (let i = 0; i < tokens.length; i++) {
        const hits = registry.keywordIndex.get(tokens[i]);
        if (hits) {
            matchedPositions.add(i);
            for (const hit of hits) {
                signals.push({ category: hit.category, source: 'keyword', match: hit.term, weight: hit.weight });
            }
        }

        for (let size = PHRASE_LENGTH.MIN; size <= PHRASE_LENGTH.MAX && i + size <= tokens.length; size++) {
            const phrase = tokens.slice(i, i + size).join(' ');
            for (const hit of registry.phraseIndex.get(phrase) ?? []) {
                signals.push({ category: hit.category, source: 'phrase', match: hit.term, weight: hit.weight });
            }
        }
    }

    return { signals, matchedPositions };
}
