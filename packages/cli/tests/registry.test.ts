import { describe, it, expect } from 'vitest';
import { createCategorizationService, validateRegistryConfig } from '@habit-categorizer/core';
import { defaultRegistryPath } from '../src/config/paths.js';
import { loadRegistry, readRegistryFile } from '../src/config/registry.js';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

describe('bundled registry', () => {
    const registry = loadRegistry(defaultRegistryPath());
    const service = createCategorizationService(registry);

    it('validates without errors or warnings', () => {
        const result = validateRegistryConfig(readRegistryFile(defaultRegistryPath()));
        expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('defines every category with Other last', () => {
        expect(registry.version).toBe('2026.10.1');
        expect(registry.definitions.map((d) => d.id)).toEqual([
            'Fitness', 'Health', 'Mindfulness', 'Education', 'Work', 'Finance', 'Social', 'Other',
        ]);
    });

    it.each([
        ['Go to gym', 'Fitness'],
        ['Read a book', 'Education'],
        ['Save money', 'Finance'],
        ['Call mom', 'Social'],
        ['Drink water', 'Health'],
        ['meditate', 'Mindfulness'],
        ['Workuot', 'Fitness'],
    ])('categorizes "%s" as %s', (habit, expected) => {
        const result = service.suggestCategory(habit);
        expect(result.category).toBe(expected);
        expect(result.fallback).toBe(false);
        expect(result.confidence).toBeGreaterThanOrEqual(registry.settings.fallback_threshold);
    });

    it.each(['asdkjhasd', 'Wrkt', '', '   ', '!!!'])('falls back to Other for "%s"', (habit) => {
        const result = service.suggestCategory(habit);
        expect(result.category).toBe('Other');
        expect(result.confidence).toBe(0);
        expect(result.fallback).toBe(true);
    });

    it('ignores case', () => {
        expect(service.suggestCategory('MEDITATE')).toEqual({
            ...service.suggestCategory('meditate'),
            input: 'MEDITATE',
        });
    });

    it('resolves a keyword shared by two categories by priority', () => {
        expect(service.suggestCategory('journal').category).toBe('Mindfulness');
        expect(service.getSuggestions('journal')).toEqual([
            { category: 'Mindfulness', confidence: 0.5 },
            { category: 'Work', confidence: 0.5 },
        ]);
    });
});

describe('readRegistryFile', () => {
    it('names a missing file', () => {
        const missing = join(__dirname, 'no-such-registry.yaml');
        expect(() => readRegistryFile(missing)).toThrow(`Registry file not found: ${missing}`);
    });
});
