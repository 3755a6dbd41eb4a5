import { CategoryIdSchema, CATEGORY_IDS } from '@habit-categorizer/core';
import { resolveRegistryPath } from '../config/paths.js';
import { appendKeywordToYaml } from '../yaml/keywords.js';
import { success, log, arrow, warn, fail, failWith } from '../utils/console.js';
import type { AddKeywordOptions } from '../types.js';

export async function addKeyword(category: string, keyword: string, options: AddKeywordOptions): Promise<void> {
    const parsed = CategoryIdSchema.safeParse(category);
    if (!parsed.success) {
        fail(`Unknown category "${category}". Expected one of: ${CATEGORY_IDS.join(', ')}.`);
        process.exit(1);
    }

    if (options.weight !== undefined && !(Number.isFinite(options.weight) && options.weight > 0)) {
        fail('Weight must be a positive number.');
        process.exit(1);
    }

    const term = keyword.trim();
    if (term === '') {
        fail('Keyword must not be empty.');
        process.exit(1);
    }

    const registryPath = resolveRegistryPath(options.registry);
    log(`Adding keyword to: ${registryPath}`);

    try {
        const validation = await appendKeywordToYaml(registryPath, parsed.data, {
            term,
            weight: options.weight,
        });

        success('Keyword successfully added!');
        arrow(`Keyword:  "${term}"`);
        arrow(`Category: ${parsed.data}`);
        if (options.weight !== undefined) {
            arrow(`Weight:   ${options.weight}`);
        }
        for (const warning of validation.warnings) {
            warn(warning);
        }
    } catch (err) {
        failWith('Failed to add keyword', err);
        process.exit(1);
    }
}
