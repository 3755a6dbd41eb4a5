import type { Workbook } from 'exceljs';
import type { CategorizationResult, CategoryId, MatchSignal, Registry } from '@habit-categorizer/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatPercentColumn, colorCategoryCells } from './utils.js';

/**
 * Generates the batch report for a list of categorized habits.
 * Sheets: Suggestions, By Category.
 */
export async function generateSuggestionExcel(
    results: CategorizationResult[],
    registry: Registry
): Promise<Workbook> {
    const workbook = createWorkbook();

    addSuggestionSheet(workbook, results, registry);
    addCategorySheet(workbook, results, registry);

    return workbook;
}

/**
 * Compact, human readable form of one signal, e.g. `fuzzy:workuot~workout`.
 */
export function describeSignal(signal: MatchSignal): string {
    const match = signal.source === 'fuzzy' && signal.keyword ? `${signal.match}~${signal.keyword}` : signal.match;
    return `${signal.source}:${match}`;
}

function labelOf(id: CategoryId, registry: Registry): string {
    const definition = registry.definitions.find((d) => d.id === id);
    return definition?.label ?? id;
}

/**
 * Sheet: Suggestions
 * Columns: habit, normalized, category, label, confidence, fallback, signals
 */
function addSuggestionSheet(workbook: Workbook, results: CategorizationResult[], registry: Registry): void {
    const sheet = workbook.addWorksheet('Suggestions');
    sheet.columns = [
        { header: 'habit', key: 'habit' },
        { header: 'normalized', key: 'normalized' },
        { header: 'category', key: 'category' },
        { header: 'label', key: 'label' },
        { header: 'confidence', key: 'confidence' },
        { header: 'fallback', key: 'fallback' },
        { header: 'signals', key: 'signals' },
    ];

    for (const result of results) {
        sheet.addRow({
            habit: result.input,
            normalized: result.tokens.join(' '),
            category: result.category,
            label: labelOf(result.category, registry),
            confidence: result.confidence,
            fallback: result.fallback ? 'yes' : 'no',
            signals: result.signals
                .filter((signal) => signal.category === result.category)
                .map(describeSignal)
                .join(', '),
        });
    }

    formatHeaderRow(sheet);
    formatPercentColumn(sheet, 'confidence');
    colorCategoryCells(sheet, 'category', registry);
    autoFitColumns(sheet);
}

/**
 * Sheet: By Category
 * One row per registry category, in registry order, including empty ones.
 * Columns: category, label, habit_count, mean_confidence
 */
function addCategorySheet(workbook: Workbook, results: CategorizationResult[], registry: Registry): void {
    const sheet = workbook.addWorksheet('By Category');
    sheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'label', key: 'label' },
        { header: 'habit_count', key: 'habit_count' },
        { header: 'mean_confidence', key: 'mean_confidence' },
    ];

    const stats = new Map<CategoryId, { count: number; total: number }>();
    for (const result of results) {
        const entry = stats.get(result.category) || { count: 0, total: 0 };
        entry.count++;
        entry.total += result.confidence;
        stats.set(result.category, entry);
    }

    for (const definition of registry.definitions) {
        const entry = stats.get(definition.id);
        sheet.addRow({
            category: definition.id,
            label: definition.label ?? definition.id,
            habit_count: entry ? entry.count : 0,
            mean_confidence: entry ? entry.total / entry.count : 0,
        });
    }

    formatHeaderRow(sheet);
    formatPercentColumn(sheet, 'mean_confidence');
    colorCategoryCells(sheet, 'category', registry);
    autoFitColumns(sheet);
}
