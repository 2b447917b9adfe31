import { matchAnyFilter, sortCharacters } from './character-filters';
import { Character } from './interfaces';

describe('character filters', () => {
    const characters: Character[] = [
        { id: 1, name: 'John Placeholder', date_of_birth: '1990-05-01', occupation: 'Baker', is_suspect: false },
        { id: 2, name: 'Mary Sample', date_of_birth: '1985-02-10', occupation: 'Teacher', is_suspect: true },
        { id: 3, name: 'Johnny Test', date_of_birth: '2000-12-31', occupation: 'Driver', is_suspect: false },
        { id: 4, name: 'Mary Sample', date_of_birth: '1970-07-07', occupation: 'Baker', is_suspect: false },
    ];

    const ids = (list: Character[]) => list.map((character) => character.id);

    describe('matchAnyFilter', () => {
        it('should return undefined when no filter is set', () => {
            expect(matchAnyFilter({})).toBeUndefined();
        });

        it('should match names and occupations ignoring case', () => {
            const byName = matchAnyFilter({ name: 'JOHN' });
            const byOccupation = matchAnyFilter({ occupation: 'bak' });

            expect(ids(characters.filter((c) => byName?.(c) ?? true))).toEqual([1, 3]);
            expect(ids(characters.filter((c) => byOccupation?.(c) ?? true))).toEqual([1, 4]);
        });

        it('should combine filters with OR', () => {
            const predicate = matchAnyFilter({ name: 'johnny', suspect: true });

            expect(ids(characters.filter((c) => predicate?.(c) ?? true))).toEqual([2, 3]);
        });

        it('should match suspect status exactly', () => {
            const predicate = matchAnyFilter({ suspect: false });

            expect(ids(characters.filter((c) => predicate?.(c) ?? true))).toEqual([1, 3, 4]);
        });
    });

    describe('sortCharacters', () => {
        it('should sort by name and keep ties in order', () => {
            expect(ids(sortCharacters(characters, { field: 'name', ascending: true }))).toEqual([1, 3, 2, 4]);
        });

        it('should keep ties in order when descending', () => {
            expect(ids(sortCharacters(characters, { field: 'name', ascending: false }))).toEqual([2, 4, 3, 1]);
        });

        it('should sort by date of birth', () => {
            expect(ids(sortCharacters(characters, { field: 'date_of_birth', ascending: true }))).toEqual([4, 2, 1, 3]);
            expect(ids(sortCharacters(characters, { field: 'date_of_birth', ascending: false }))).toEqual([3, 1, 2, 4]);
        });

        it('should compare names by code unit', () => {
            const mixed: Character[] = [
                { ...characters[0], id: 10, name: 'ada' },
                { ...characters[0], id: 11, name: 'Zed' },
            ];

            expect(ids(sortCharacters(mixed, { field: 'name', ascending: true }))).toEqual([11, 10]);
        });

        it('should not modify the input', () => {
            sortCharacters(characters, { field: 'date_of_birth', ascending: true });

            expect(ids(characters)).toEqual([1, 2, 3, 4]);
        });
    });
});
