import { parseDocument, isMap, isSeq } from 'yaml';
import type { Document } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import { validateRegistryConfig, RegistryValidationError } from '@habit-categorizer/core';
import type { CategoryId, RegistryValidationResult } from '@habit-categorizer/core';

export interface KeywordInput {
    term: string;
    weight?: number;
}

/**
 * Adds a keyword to one category of a registry document, keeping comments
 * and layout. Bare strings are written when no weight is given.
 */
export function insertKeyword(content: string, categoryId: CategoryId, keyword: KeywordInput): Document {
    const doc = parseDocument(content);
    if (doc.errors.length > 0) {
        throw new Error(`Invalid YAML: ${doc.errors[0].message}`);
    }

    const categories = doc.get('categories');
    if (!isSeq(categories)) {
        throw new Error('Invalid registry structure: "categories" must be a list.');
    }

    const category = categories.items.find((item) => isMap(item) && item.get('id') === categoryId);
    if (!isMap(category)) {
        throw new Error(`Category "${categoryId}" is not defined in the registry.`);
    }

    const entry = keyword.weight === undefined ? keyword.term : { term: keyword.term, weight: keyword.weight };
    const keywords = category.get('keywords');

    if (keywords === undefined || keywords === null) {
        category.set('keywords', doc.createNode([entry]));
    } else if (isSeq(keywords)) {
        keywords.add(doc.createNode(entry));
    } else {
        throw new Error(`Invalid registry structure: "keywords" of "${categoryId}" must be a list.`);
    }

    return doc;
}

/**
 * Appends a keyword to a registry YAML file.
 *
 * The edited registry is validated before anything is written; the file is
 * left untouched when the keyword would make it invalid or is already listed.
 */
export async function appendKeywordToYaml(
    filePath: string,
    categoryId: CategoryId,
    keyword: KeywordInput
): Promise<RegistryValidationResult> {
    const content = await readFile(filePath, 'utf8');
    const before = validateRegistryConfig(parseDocument(content).toJS());

    const doc = insertKeyword(content, categoryId, keyword);
    const after = validateRegistryConfig(doc.toJS());

    if (!after.valid) {
        throw new RegistryValidationError(after.errors, after.warnings);
    }
    // The only warning a new keyword can add is a duplicate
    if (after.warnings.length > before.warnings.length) {
        throw new Error(`Keyword "${keyword.term}" is already listed under "${categoryId}".`);
    }

    await writeFile(filePath, doc.toString());
    return after;
}
