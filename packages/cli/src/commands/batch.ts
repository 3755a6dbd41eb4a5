import { readFile } from 'node:fs/promises';
import { createCategorizationService } from '@habit-categorizer/core';
import type { CategoryId } from '@habit-categorizer/core';
import { openRegistry } from './registry.js';
import { generateSuggestionExcel } from '../excel/report.js';
import { log, success, arrow, fail } from '../utils/console.js';
import type { BatchOptions } from '../types.js';

/**
 * One habit per line. Blank lines and `#` comments are skipped.
 */
export function parseHabitList(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== '' && !line.startsWith('#'));
}

export async function batch(inputPath: string, options: BatchOptions): Promise<void> {
    let content: string;
    try {
        content = await readFile(inputPath, 'utf8');
    } catch (err) {
        fail(`Cannot read ${inputPath}: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }

    const habits = parseHabitList(content);
    const registry = openRegistry(options);
    const service = createCategorizationService(registry);
    const results = habits.map((habit) => service.suggestCategory(habit));

    if (!options.out) {
        for (const result of results) {
            log(`${result.category.padEnd(12)} ${result.confidence.toFixed(2)}  ${result.input}`);
        }
    }

    const counts = new Map<CategoryId, number>();
    for (const result of results) {
        counts.set(result.category, (counts.get(result.category) ?? 0) + 1);
    }

    log('');
    success(`Categorized ${results.length} habit(s).`);
    for (const definition of registry.definitions) {
        const count = counts.get(definition.id);
        if (count) {
            arrow(`${definition.id.padEnd(12)} ${count}`);
        }
    }

    if (options.out) {
        const workbook = await generateSuggestionExcel(results, registry);
        await workbook.xlsx.writeFile(options.out);
        success(`Report written to ${options.out}`);
    }
}
