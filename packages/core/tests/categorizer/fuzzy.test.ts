import { describe, it, expect } from 'vitest';
import { matchFuzzy } from '../../src/categorizer/fuzzy.js';
import { buildRegistry } from '../../src/registry/build.js';
import { makeRegistry } from '../fixtures/registry.js';

describe('matchFuzzy', () => {
    const registry = makeRegistry();

    it('matches a transposed keyword, scaled by similarity', () => {
        const signals = matchFuzzy(['workuot'], new Set(), registry);
        expect(signals).toHaveLength(1);
        expect(signals[0]).toMatchObject({
            category: 'Fitness',
            source: 'fuzzy',
            match: 'workuot',
            keyword: 'workout',
        });
        expect(signals[0].similarity).toBeCloseTo(6 / 7, 10);
        expect(signals[0].weight).toBeCloseTo(6 / 7, 10);
    });

    it('ignores tokens that are too far from every keyword', () => {
        expect(matchFuzzy(['wrkt'], new Set(), registry)).toEqual([]);
        expect(matchFuzzy(['asdkjhasd'], new Set(), registry)).toEqual([]);
    });

    it('skips positions that already matched exactly', () => {
        expect(matchFuzzy(['workuot'], new Set([0]), registry)).toEqual([]);
    });

    it('scales by the keyword weight', () => {
        const signals = matchFuzzy(['journl'], new Set(), registry);
        // "journl" is one deletion from "journal": 1 - 1/7
        expect(signals.map((s) => s.category)).toEqual(['Mindfulness', 'Work']);
        expect(signals[0].weight).toBeCloseTo(6 / 7, 10);
    });

    describe('with custom settings', () => {
        const loose = buildRegistry({
            version: 'loose',
            settings: { fuzzy_threshold: 0.6, min_fuzzy_token_length: 3 },
            categories: [
                { id: 'Fitness', priority: 1, keywords: ['gym', 'walks'] },
                { id: 'Social', priority: 2, keywords: ['talks'] },
                { id: 'Other', priority: 3 },
            ],
        });

        it('honours the similarity threshold', () => {
            const signals = matchFuzzy(['gmy'], new Set(), loose);
            expect(signals).toHaveLength(1);
            expect(signals[0].keyword).toBe('gym');
            expect(signals[0].similarity).toBeCloseTo(2 / 3, 10);
        });

        it('skips tokens shorter than the minimum length', () => {
            expect(matchFuzzy(['gm'], new Set(), loose)).toEqual([]);
        });

        it('prefers the keyword listed first on equal similarity', () => {
            const signals = matchFuzzy(['xalks'], new Set(), loose);
            expect(signals).toHaveLength(1);
            expect(signals[0].keyword).toBe('walks');
            expect(signals[0].category).toBe('Fitness');
        });
    });
});
