#!/usr/bin/env node
/**
 * Habit Categorizer CLI
 *
 * The CLI owns all file I/O and output:
 * - Registry YAML is read here and handed to the core as plain data
 * - The core has no file system access and no console.* calls
 */

import { parseArgs } from 'node:util';
import { suggest } from './commands/suggest.js';
import { categories } from './commands/categories.js';
import { validate } from './commands/validate.js';
import { batch } from './commands/batch.js';
import { addKeyword } from './commands/add-keyword.js';
import { REGISTRY_ENV_VAR } from './config/paths.js';
import { fail } from './utils/console.js';

const USAGE = `Habit Categorizer CLI

Usage:
  habitcat suggest <habit name...> [--top N] [--json] [--explain]
  habitcat categories
  habitcat validate
  habitcat batch <habits.txt> [--out report.xlsx]
  habitcat add-keyword <category> <keyword> [--weight W]

Options:
  --registry <path>   Registry YAML (default: $${REGISTRY_ENV_VAR} or the bundled registry)
  -h, --help          Show this help

Example:
  habitcat suggest "Go to gym" --top 3`;

function parseNumber(value: string | undefined, name: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        fail(`--${name} must be a number (got "${value}").`);
        process.exit(1);
    }
    return parsed;
}

async function main(): Promise<void> {
    const { values, positionals } = parseArgs({
        args: process.argv.slice(2),
        allowPositionals: true,
        options: {
            registry: { type: 'string' },
            top: { type: 'string' },
            json: { type: 'boolean', default: false },
            explain: { type: 'boolean', default: false },
            out: { type: 'string' },
            weight: { type: 'string' },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const [command, ...args] = positionals;
    if (!command || values.help) {
        console.log(USAGE);
        process.exit(0);
    }

    const registry = values.registry;

    switch (command) {
        case 'suggest':
            if (args.length === 0) {
                fail('suggest needs a habit name.');
                process.exit(1);
            }
            suggest(args.join(' '), {
                registry,
                top: parseNumber(values.top, 'top'),
                json: values.json === true,
                explain: values.explain === true,
            });
            break;
        case 'categories':
            categories({ registry });
            break;
        case 'validate':
            validate({ registry });
            break;
        case 'batch':
            if (args.length !== 1) {
                fail('batch needs exactly one input file.');
                process.exit(1);
            }
            await batch(args[0], { registry, out: values.out });
            break;
        case 'add-keyword':
            if (args.length !== 2) {
                fail('add-keyword needs a category and a keyword.');
                process.exit(1);
            }
            await addKeyword(args[0], args[1], {
                registry,
                weight: parseNumber(values.weight, 'weight'),
            });
            break;
        default:
            fail(`Unknown command "${command}".`);
            console.log(USAGE);
            process.exit(1);
    }
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
