import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import { parse } from 'yaml';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { RegistryValidationError } from '@habit-categorizer/core';
import { appendKeywordToYaml, insertKeyword } from '../src/yaml/keywords.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const TEMP_REGISTRY_FILE = join(__dirname, 'temp-registry.yaml');

const INITIAL_CONTENT = `# Test registry
version: "test-1"
categories:
  - id: Fitness
    priority: 1
    keywords:
      - gym # strength
  - id: Other
    priority: 99
`;

describe('YAML keyword appending', () => {
    beforeEach(async () => {
        await fs.writeFile(TEMP_REGISTRY_FILE, INITIAL_CONTENT, 'utf8');
    });

    afterEach(async () => {
        await fs.rm(TEMP_REGISTRY_FILE, { force: true });
    });

    it('appends a keyword while preserving comments', async () => {
        await appendKeywordToYaml(TEMP_REGISTRY_FILE, 'Fitness', { term: 'workout' });

        const updated = await fs.readFile(TEMP_REGISTRY_FILE, 'utf8');
        expect(updated).toContain('# Test registry');
        expect(updated).toContain('# strength');
        expect(parse(updated).categories[0].keywords).toEqual(['gym', 'workout']);
    });

    it('creates the keyword list of a category that has none', async () => {
        await appendKeywordToYaml(TEMP_REGISTRY_FILE, 'Other', { term: 'misc', weight: 0.5 });

        const updated = parse(await fs.readFile(TEMP_REGISTRY_FILE, 'utf8'));
        expect(updated.categories[1].keywords).toEqual([{ term: 'misc', weight: 0.5 }]);
    });

    it('returns the validation of the edited registry', async () => {
        const result = await appendKeywordToYaml(TEMP_REGISTRY_FILE, 'Fitness', { term: 'run' });
        expect(result.valid).toBe(true);
        expect(result.errors).toEqual([]);
    });

    it('refuses a keyword that is not a single token and leaves the file untouched', async () => {
        const attempt = appendKeywordToYaml(TEMP_REGISTRY_FILE, 'Fitness', { term: 'push up' });

        await expect(attempt).rejects.toBeInstanceOf(RegistryValidationError);
        await expect(attempt).rejects.toMatchObject({
            issues: ['Category "Fitness": keyword "push up" must normalize to 1 token (got 2)'],
        });
        expect(await fs.readFile(TEMP_REGISTRY_FILE, 'utf8')).toBe(INITIAL_CONTENT);
    });

    it('refuses a keyword already listed in the category', async () => {
        await expect(appendKeywordToYaml(TEMP_REGISTRY_FILE, 'Fitness', { term: 'GYM' }))
            .rejects.toThrow('Keyword "GYM" is already listed under "Fitness".');
        expect(await fs.readFile(TEMP_REGISTRY_FILE, 'utf8')).toBe(INITIAL_CONTENT);
    });

    it('refuses a contradictory weight for an existing keyword', async () => {
        await expect(appendKeywordToYaml(TEMP_REGISTRY_FILE, 'Fitness', { term: 'gym', weight: 2 }))
            .rejects.toMatchObject({
                issues: ['Category "Fitness": keyword "gym" listed with contradictory weights 1 and 2'],
            });
    });
});

describe('insertKeyword', () => {
    it('rejects a category missing from the document', () => {
        expect(() => insertKeyword(INITIAL_CONTENT, 'Social', { term: 'call' }))
            .toThrow('Category "Social" is not defined in the registry.');
    });

    it('rejects a document without a category list', () => {
        expect(() => insertKeyword('version: "x"\n', 'Fitness', { term: 'gym' }))
            .toThrow('Invalid registry structure: "categories" must be a list.');
    });
});
