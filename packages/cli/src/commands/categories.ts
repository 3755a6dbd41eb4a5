import { createCategorizationService } from '@habit-categorizer/core';
import { openRegistry } from './registry.js';
import { log } from '../utils/console.js';
import type { RegistryOptions } from '../types.js';

export function categories(options: RegistryOptions): void {
    const registry = openRegistry(options);
    const service = createCategorizationService(registry);

    log(`Registry ${registry.version}`);
    log('');
    for (const category of service.listCategories()) {
        const icon = category.icon ?? ' ';
        const color = category.color ?? '-';
        log(`${icon} ${category.id.padEnd(12)} ${category.label.padEnd(14)} ${color.padEnd(8)} priority ${category.priority}`);
    }
}
