/**
 * Habit name normalization for matching.
 *
 * Every matcher works on the tokens produced here, and registry terms are
 * normalized the same way when the registry is built, so both sides of a
 * comparison always agree.
 */

import { DEFAULT_SETTINGS, DEFAULT_STOP_WORDS } from '../types/index.js';

export interface NormalizeOptions {
    /** Tokens dropped after normalization. */
    stopWords?: ReadonlySet<string>;
    /** Raw input is clamped to this many characters before any work. */
    maxLength?: number;
}

const DEFAULT_STOP_WORD_SET: ReadonlySet<string> = new Set(DEFAULT_STOP_WORDS);

/**
 * Normalize a habit name into matching tokens.
 *
 * Transformations:
 * - Clamp to the first `maxLength` characters
 * - Convert to lowercase
 * - Strip diacritics (NFD, drop combining marks, recompose with NFC so
 *   Hangul syllables come back as one character each)
 * - Drop apostrophes so "don't" stays one token
 * - Replace any other non-letter, non-digit character with a space
 * - Split on whitespace and drop stop words
 *
 * Idempotent: tokenizing `tokens.join(' ')` yields the same tokens.
 * Never throws; empty or non-string input yields [].
 */
export function tokenize(raw: string, options: NormalizeOptions = {}): string[] {
    if (typeof raw !== 'string') return [];

    const stopWords = options.stopWords ?? DEFAULT_STOP_WORD_SET;
    const maxLength = options.maxLength ?? DEFAULT_SETTINGS.MAX_INPUT_LENGTH;

    const cleaned = raw
        .slice(0, maxLength)
        .toLowerCase()
        .normalize('NFD')
        .replace(/\p{M}+/gu, '')
        .normalize('NFC')
        .replace(/['‘’`]/g, '')
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim();

    if (cleaned === '') return [];

    return cleaned.split(' ').filter((token) => !stopWords.has(token));
}

/**
 * Normalized habit name as a single space-separated string.
 * This is the text pattern rules are evaluated against.
 */
export function normalizeHabitName(raw: string, options: NormalizeOptions = {}): string {
    return tokenize(raw, options).join(' ');
}
