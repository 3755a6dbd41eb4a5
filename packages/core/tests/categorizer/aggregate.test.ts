import { describe, it, expect } from 'vitest';
import { aggregateSignals, rankCategories, emptyScores, toConfidence } from '../../src/categorizer/aggregate.js';
import { makeRegistry } from '../fixtures/registry.js';
import type { MatchSignal } from '../../src/types/index.js';

function signal(category: MatchSignal['category'], weight: number): MatchSignal {
    return { category, source: 'keyword', match: 'test', weight };
}

describe('aggregateSignals', () => {
    const registry = makeRegistry();
    const { max_score: maxScore, fallback_threshold: threshold, tie_epsilon: epsilon } = registry.settings;

    it('sums contributions per category', () => {
        const outcome = aggregateSignals([signal('Work', 1), signal('Fitness', 0.6), signal('Work', 0.5)], registry);
        expect(outcome.scores.Work).toBeCloseTo(1.5, 10);
        expect(outcome.scores.Fitness).toBeCloseTo(0.6, 10);
        expect(outcome.scores.Other).toBe(0);
        expect(outcome.category).toBe('Work');
        expect(outcome.confidence).toBeCloseTo(1.5 / maxScore, 10);
        expect(outcome.fallback).toBe(false);
    });

    it('reports every category in the score map', () => {
        const outcome = aggregateSignals([], registry);
        expect(Object.keys(outcome.scores).sort()).toEqual(Object.keys(emptyScores()).sort());
    });

    it('clamps confidence to 1', () => {
        const outcome = aggregateSignals([signal('Fitness', maxScore * 3)], registry);
        expect(outcome.confidence).toBe(1);
    });

    it('breaks exact ties by priority rank', () => {
        const outcome = aggregateSignals([signal('Work', 1), signal('Mindfulness', 1)], registry);
        expect(outcome.category).toBe('Mindfulness');
    });

    it('treats confidences within epsilon as tied', () => {
        const nudge = (epsilon / 2) * maxScore;
        const outcome = aggregateSignals([signal('Mindfulness', 1 + nudge), signal('Fitness', 1)], registry);
        expect(outcome.category).toBe('Fitness');
        expect(outcome.confidence).toBeCloseTo(1 / maxScore, 10);
    });

    it('does not tie confidences further apart than epsilon', () => {
        const gap = epsilon * 5 * maxScore;
        const outcome = aggregateSignals([signal('Mindfulness', 1 + gap), signal('Fitness', 1)], registry);
        expect(outcome.category).toBe('Mindfulness');
    });

    it('falls back to Other below the threshold', () => {
        const weight = threshold * maxScore * 0.5;
        const outcome = aggregateSignals([signal('Fitness', weight)], registry);
        expect(outcome.category).toBe('Other');
        expect(outcome.confidence).toBe(0);
        expect(outcome.fallback).toBe(true);
        expect(outcome.scores.Fitness).toBeCloseTo(weight, 10);
    });

    it('keeps the winner at exactly the threshold', () => {
        const outcome = aggregateSignals([signal('Fitness', 0.3)], registry);
        expect(outcome.category).toBe('Fitness');
        expect(outcome.fallback).toBe(false);
    });

    it('falls back when there are no signals', () => {
        const outcome = aggregateSignals([], registry);
        expect(outcome).toMatchObject({ category: 'Other', confidence: 0, fallback: true });
    });
});

describe('rankCategories', () => {
    const registry = makeRegistry();

    it('orders by confidence, then priority', () => {
        const scores = { ...emptyScores(), Work: 1, Fitness: 0.4 };
        expect(rankCategories(scores, registry).map((entry) => entry.category)).toEqual([
            'Work',
            'Fitness',
            'Mindfulness',
            'Other',
        ]);
    });

    it('puts the tie-break winner first', () => {
        const scores = { ...emptyScores(), Mindfulness: 1.015, Fitness: 1 };
        const ranking = rankCategories(scores, registry);
        expect(ranking[0].category).toBe('Fitness');
        expect(ranking[1].category).toBe('Mindfulness');
        expect(ranking[1].confidence).toBeCloseTo(0.5075, 10);
    });

    it('only ranks categories defined in the registry', () => {
        const ranking = rankCategories({ ...emptyScores(), Finance: 5 }, registry);
        expect(ranking.map((entry) => entry.category)).toEqual(['Fitness', 'Mindfulness', 'Work', 'Other']);
    });
});

describe('toConfidence', () => {
    const registry = makeRegistry();

    it('normalizes by max_score and clamps', () => {
        expect(toConfidence(1, registry)).toBe(0.5);
        expect(toConfidence(10, registry)).toBe(1);
        expect(toConfidence(0, registry)).toBe(0);
    });
});
