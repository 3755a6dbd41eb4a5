/**
 * Registry construction.
 *
 * A registry is built once, at startup, from a validated config. Building
 * either returns a complete frozen registry or throws; there is no partially
 * loaded state.
 */

import { sha256 } from 'js-sha256';
import { tokenize } from '../utils/normalize.js';
import { inspectRegistryConfig, normalizeOptionsFor } from './validate.js';
import { RegistryValidationError } from './errors.js';
import type { CategoryDefinition, CategoryId, RegistryConfig } from '../types/index.js';
import type { CompiledPattern, IndexedTerm, Registry } from './types.js';

const FINGERPRINT_LENGTH = 16;

/**
 * Build an immutable registry from a raw config value.
 *
 * @param raw - Unvalidated config (e.g. parsed YAML)
 * @returns Frozen registry
 * @throws RegistryValidationError when the config has any validation error
 */
export function buildRegistry(raw: unknown): Registry {
    const { result, config } = inspectRegistryConfig(raw);
    if (!result.valid || config === null) {
        throw new RegistryValidationError(result.errors, result.warnings);
    }
    return assembleRegistry(config);
}

function assembleRegistry(config: RegistryConfig): Registry {
    const normalize = normalizeOptionsFor(config.settings);
    const keywordIndex = new Map<string, IndexedTerm[]>();
    const phraseIndex = new Map<string, IndexedTerm[]>();
    const patterns: CompiledPattern[] = [];
    const priorities = new Map<CategoryId, number>();

    for (const definition of config.categories) {
        priorities.set(definition.id, definition.priority);

        for (const entry of definition.keywords) {
            const [token] = tokenize(entry.term, normalize);
            addTerm(keywordIndex, token, { category: definition.id, term: token, weight: entry.weight });
        }

        for (const entry of definition.patterns) {
            patterns.push({
                category: definition.id,
                source: entry.pattern,
                regex: new RegExp(entry.pattern, 'u'),
                weight: entry.weight,
            });
        }
    }

    // Phrases need the finished keyword index to price the specificity bonus
    for (const definition of config.categories) {
        for (const entry of definition.phrases) {
            const tokens = tokenize(entry.term, normalize);
            const phrase = tokens.join(' ');
            const heaviestConstituent = Math.max(
                0,
                ...tokens.flatMap((token) => (keywordIndex.get(token) ?? []).map((hit) => hit.weight))
            );
            addTerm(phraseIndex, phrase, {
                category: definition.id,
                term: phrase,
                weight: Math.max(entry.weight, heaviestConstituent) + config.settings.phrase_bonus,
            });
        }
    }

    const registry: Registry = {
        version: config.version,
        fingerprint: sha256(JSON.stringify(config)).slice(0, FINGERPRINT_LENGTH),
        settings: Object.freeze({ ...config.settings, stop_words: freezeList(config.settings.stop_words) }),
        normalize: Object.freeze(normalize),
        definitions: Object.freeze(config.categories.map(freezeDefinition)),
        priorities: readOnlyView(priorities),
        keywordIndex: freezeIndex(keywordIndex),
        phraseIndex: freezeIndex(phraseIndex),
        patterns: Object.freeze(patterns.map((pattern) => Object.freeze(pattern))),
        fuzzyKeywords: Object.freeze([...keywordIndex.keys()]),
    };

    return Object.freeze(registry);
}

/**
 * Add a term to an index. Exact duplicates within a category were already
 * reported by validation and are skipped here.
 */
function addTerm(index: Map<string, IndexedTerm[]>, key: string, term: IndexedTerm): void {
    const entries = index.get(key);
    if (!entries) {
        index.set(key, [term]);
        return;
    }
    if (!entries.some((existing) => existing.category === term.category)) {
        entries.push(term);
    }
}

function freezeIndex(index: Map<string, IndexedTerm[]>): ReadonlyMap<string, readonly IndexedTerm[]> {
    const frozen = new Map<string, readonly IndexedTerm[]>();
    for (const [key, entries] of index) {
        frozen.set(key, Object.freeze(entries.map((entry) => Object.freeze(entry))));
    }
    return readOnlyView(frozen);
}

/**
 * Freezes a list and its items in place, keeping the mutable array type the
 * schema infers.
 */
function freezeList<T>(items: T[]): T[] {
    for (const item of items) {
        Object.freeze(item);
    }
    Object.freeze(items);
    return items;
}

function freezeDefinition(definition: CategoryDefinition): CategoryDefinition {
    freezeList(definition.keywords);
    freezeList(definition.phrases);
    freezeList(definition.patterns);
    return Object.freeze(definition);
}

/**
 * Read-only facade over a map. Unlike a `ReadonlyMap` type annotation it has
 * no `set`, `delete` or `clear` at runtime.
 */
function readOnlyView<K, V>(source: Map<K, V>): ReadonlyMap<K, V> {
    const view: ReadonlyMap<K, V> = {
        get size() {
            return source.size;
        },
        get: (key) => source.get(key),
        has: (key) => source.has(key),
        forEach: (callback, thisArg) => {
            source.forEach((value, key) => callback.call(thisArg, value, key, view));
        },
        entries: () => source.entries(),
        keys: () => source.keys(),
        values: () => source.values(),
        [Symbol.iterator]: () => source[Symbol.iterator](),
    };
    return Object.freeze(view);
}
