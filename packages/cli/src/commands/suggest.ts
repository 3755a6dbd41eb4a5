import { createCategorizationService } from '@habit-categorizer/core';
import type { CategorizationResult, MatchSignal } from '@habit-categorizer/core';
import { openRegistry } from './registry.js';
import { log, success, info, arrow } from '../utils/console.js';
import type { SuggestOptions } from '../types.js';

function formatSignal(signal: MatchSignal): string {
    const source = signal.source.padEnd(8);
    const match = signal.source === 'fuzzy'
        ? `${signal.match} ~ ${signal.keyword ?? ''} (${(signal.similarity ?? 0).toFixed(2)})`
        : signal.match;
    return `  ${source} ${match} -> ${signal.category} (+${signal.weight.toFixed(2)})`;
}

function printExplanation(result: CategorizationResult): void {
    log('');
    log(`Tokens: ${result.tokens.length > 0 ? result.tokens.join(' ') : '(none)'}`);
    if (result.signals.length === 0) {
        log('Signals: none');
        return;
    }
    log('Signals:');
    for (const signal of result.signals) {
        log(formatSignal(signal));
    }
}

export function suggest(habitName: string, options: SuggestOptions): void {
    const registry = openRegistry(options);
    const service = createCategorizationService(registry);
    const result = service.suggestCategory(habitName);
    const suggestions = options.top !== undefined ? service.getSuggestions(habitName, options.top) : undefined;

    if (options.json) {
        log(JSON.stringify(suggestions ? { ...result, suggestions } : result, null, 2));
        return;
    }

    if (result.fallback) {
        info(`${result.category} (no category reached ${registry.settings.fallback_threshold})`);
    } else {
        success(`${result.category} (confidence ${result.confidence.toFixed(2)})`);
    }

    if (suggestions) {
        log('');
        log('Suggestions:');
        for (const suggestion of suggestions) {
            arrow(`${suggestion.category.padEnd(12)} ${suggestion.confidence.toFixed(2)}`);
        }
    }

    if (options.explain) {
        printExplanation(result);
    }
}
