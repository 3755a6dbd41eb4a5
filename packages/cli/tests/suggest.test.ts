import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { suggest } from '../src/commands/suggest.js';
import { defaultRegistryPath } from '../src/config/paths.js';

describe('suggest command', () => {
    const registry = defaultRegistryPath();

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints the winning category', () => {
        suggest('Go to gym', { registry, json: false, explain: false });
        expect(console.log).toHaveBeenCalledWith('✓ Fitness (confidence 1.00)');
    });

    it('reports a fallback', () => {
        suggest('asdkjhasd', { registry, json: false, explain: false });
        expect(console.info).toHaveBeenCalledWith('ℹ Other (no category reached 0.15)');
    });

    it('lists ranked suggestions with --top', () => {
        suggest('journal', { registry, top: 2, json: false, explain: false });
        expect(console.log).toHaveBeenCalledWith('→ Mindfulness  0.50');
        expect(console.log).toHaveBeenCalledWith('→ Work         0.50');
    });

    it('explains fuzzy signals', () => {
        suggest('Workuot', { registry, json: false, explain: true });
        expect(console.log).toHaveBeenCalledWith('Tokens: workuot');
        expect(console.log).toHaveBeenCalledWith('  fuzzy    workuot ~ workout (0.86) -> Fitness (+0.86)');
    });

    it('prints the result as JSON', () => {
        suggest('Call mom', { registry, top: 1, json: true, explain: false });
        expect(console.log).toHaveBeenCalledTimes(1);

        const output = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
        expect(output.category).toBe('Social');
        expect(output.registry_version).toBe('2026.10.1');
        expect(output.suggestions).toEqual([{ category: 'Social', confidence: 1 }]);
    });
});
