/**
 * Pattern rule evaluation.
 */

import type { MatchSignal } from '../types/index.js';
import type { Registry } from '../registry/types.js';

/**
 * Evaluate every pattern rule against the normalized text.
 *
 * All rules run, in registry order, so several categories can collect
 * evidence from one input.
 *
 * @param normalizedText - Tokens joined by single spaces
 * @param registry - Built registry
 */
export function matchPatterns(normalizedText: string, registry: Registry): MatchSignal[] {
    if (normalizedText === '') return [];

    const signals: MatchSignal[] = [];
    for (const rule of registry.patterns) {
        const match = rule.regex.exec(normalizedText);
        if (match) {
            signals.push({ category: rule.category, source: 'pattern', match: match[0], weight: rule.weight });
        }
    }
    return signals;
}
