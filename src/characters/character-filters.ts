/**
 * @fileoverview Character List Filtering and Ordering
 */

import { anyOf, RecordPredicate } from '../shared/repository';
import { Character, CharacterFilters, CharacterOrdering } from './interfaces';

const containsIgnoringCase = (haystack: string, needle: string): boolean =>
    haystack.toLowerCase().includes(needle.toLowerCase());

/**
 * Union of the given filters, or `undefined` when none is set.
 */
export function matchAnyFilter(filters: CharacterFilters): RecordPredicate<Character> | undefined {
    const predicates: RecordPredicate<Character>[] = [];

    if (filters.name !== undefined) {
        const name = filters.name;
        predicates.push((character) => containsIgnoringCase(character.name, name));
    }
    if (filters.suspect !== undefined) {
        const suspect = filters.suspect;
        predicates.push((character) => character.is_suspect === suspect);
    }
    if (filters.occupation !== undefined) {
        const occupation = filters.occupation;
        predicates.push((character) => containsIgnoringCase(character.occupation, occupation));
    }

    return predicates.length > 0 ? anyOf(...predicates) : undefined;
}

function compareText(left: string, right: string): number {
    if (left === right) {
        return 0;
    }
    return left < right ? -1 : 1;
}

/**
 * Stable sort; equal keys keep the order they were given in.
 */
export function sortCharacters(characters: readonly Character[], ordering: CharacterOrdering): Character[] {
    const direction = ordering.ascending ? 1 : -1;
    // YYYY-MM-DD compares chronologically as text
    return [...characters].sort(
        (left, right) => direction * compareText(left[ordering.field], right[ordering.field]),
    );
}
