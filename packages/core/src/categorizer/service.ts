/**
 * Categorization facade bound to one registry.
 */

import { suggestCategory } from './suggest.js';
import { rankCategories } from './aggregate.js';
import { DEFAULT_SUGGESTION_COUNT, FALLBACK_CATEGORY_ID } from '../types/index.js';
import type { CategoryInfo, CategorySuggestion } from '../types/index.js';
import type { Registry } from '../registry/types.js';
import type { CategorizationService } from './types.js';

/**
 * Create a service over an already built registry.
 * The service holds no state besides the registry reference.
 */
export function createCategorizationService(registry: Registry): CategorizationService {
    return {
        registry,

        suggestCategory(habitName: string) {
            return suggestCategory(habitName, registry);
        },

        /**
         * Up to `topN` categories whose confidence clears the fallback
         * threshold, best first. Falls back to a single "Other" entry.
         */
        getSuggestions(habitName: string, topN: number = DEFAULT_SUGGESTION_COUNT): CategorySuggestion[] {
            const result = suggestCategory(habitName, registry);
            if (result.fallback) {
                return [{ category: FALLBACK_CATEGORY_ID, confidence: 0 }];
            }

            const count = Number.isFinite(topN) ? Math.max(1, Math.floor(topN)) : DEFAULT_SUGGESTION_COUNT;
            return rankCategories(result.scores, registry)
                .filter((entry) => entry.confidence >= registry.settings.fallback_threshold)
                .slice(0, count);
        },

        listCategories(): CategoryInfo[] {
            return registry.definitions.map((definition) => ({
                id: definition.id,
                label: definition.label ?? definition.id,
                icon: definition.icon,
                color: definition.color,
                priority: definition.priority,
            }));
        },
    };
}
