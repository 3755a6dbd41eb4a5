import { describe, it, expect } from 'vitest';
import { parseHabitList } from '../src/commands/batch.js';

describe('parseHabitList', () => {
    it('reads one habit per line', () => {
        expect(parseHabitList('Go to gym\nRead a book\r\nSave money')).toEqual([
            'Go to gym',
            'Read a book',
            'Save money',
        ]);
    });

    it('skips blank lines and comments', () => {
        expect(parseHabitList('# morning\n\n  Drink water  \n   \n#evening\nCall mom\n')).toEqual([
            'Drink water',
            'Call mom',
        ]);
    });
});
