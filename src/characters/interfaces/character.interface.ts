/**
 * @fileoverview Character Interfaces
 */

/**
 * A person whose whereabouts are recorded.
 */
export interface Character {
    id: number;
    name: string;
    /** `YYYY-MM-DD` */
    date_of_birth: string;
    occupation: string;
    is_suspect: boolean;
}

export type CharacterDraft = Omit<Character, 'id'>;

export const CHARACTER_ORDER_FIELDS = ['name', 'date_of_birth'] as const;

export type CharacterOrderField = (typeof CHARACTER_ORDER_FIELDS)[number];

export interface CharacterOrdering {
    field: CharacterOrderField;
    ascending: boolean;
}

/**
 * Optional list filters; a record is kept when it matches any of them.
 */
export interface CharacterFilters {
    name?: string;
    suspect?: boolean;
    occupation?: string;
}

/**
 * Raw list query as received over HTTP.
 */
export interface CharacterListQuery {
    orderBy?: string;
    ascending?: string;
    name?: string;
    suspect?: string;
    occupation?: string;
}
