/**
 * @fileoverview Characters Service
 *
 * List filtering and ordering plus record operations for characters.
 */

import { Injectable, Logger } from '@nestjs/common';
import { Counter } from 'prom-client';
import { ORDERING_PARAMS_MESSAGE } from './characters.constants';
import { matchAnyFilter, sortCharacters } from './character-filters';
import { CharactersRepository } from './characters.repository';
import {
    characterCreateSchema,
    characterPatchSchema,
    characterReplaceSchema,
} from './dto/character-body.schema';
import {
    Character,
    CharacterFilters,
    CharacterListQuery,
    CharacterOrdering,
    CHARACTER_ORDER_FIELDS,
} from './interfaces';
import { invalidFields, recordNotFound, unprocessableQuery } from '../shared/http';
import { countWrite } from '../shared/metrics';
import { parseBinaryFlag, parseChoice, parseRecordId, parseTruthy, queryValue } from '../shared/parsing';
import { validateBody } from '../shared/validation';

const queryCounter = new Counter({
    name: 'characters_queries_total',
    help: 'Total number of character list requests',
    labelNames: ['status'],
});

@Injectable()
export class CharactersService {
    private readonly logger = new Logger(CharactersService.name);

    constructor(private readonly charactersRepository: CharactersRepository) { }

    /**
     * Lists characters matching any given filter, sorted by the mandatory ordering.
     */
    async list(query: CharacterListQuery): Promise<Character[]> {
        const ordering = this.parseOrdering(query);
        if (!ordering) {
            queryCounter.inc({ status: 'rejected' });
            throw unprocessableQuery(ORDERING_PARAMS_MESSAGE);
        }

        const filters = this.parseFilters(query);

        try {
            const characters = await this.charactersRepository.findAll(matchAnyFilter(filters));
            const sorted = sortCharacters(characters, ordering);

            queryCounter.inc({ status: 'success' });
            this.logger.log({ msg: 'Characters listed', filters, ordering, resultCount: sorted.length });

            return sorted;
        } catch (error) {
            queryCounter.inc({ status: 'error' });
            this.logger.error({ msg: 'Character listing failed', error, filters });
            throw error;
        }
    }

    async findOne(rawId: string): Promise<Character> {
        return this.require(rawId);
    }

    async create(body: unknown): Promise<Character> {
        const validation = validateBody(characterCreateSchema, body);
        if (!validation.success) {
            throw invalidFields(validation.errors);
        }

        const character = await this.charactersRepository.create(validation.data);
        countWrite('character', 'create');
        this.logger.log({ msg: 'Character created', id: character.id });

        return character;
    }

    /**
     * Full update: every required field must be present.
     */
    async replace(rawId: string, body: unknown): Promise<Character> {
        const existing = await this.require(rawId);

        const validation = validateBody(characterReplaceSchema, body);
        if (!validation.success) {
            throw invalidFields(validation.errors);
        }

        return this.write(existing.id, validation.data, 'replace');
    }

    async update(rawId: string, body: unknown): Promise<Character> {
        const existing = await this.require(rawId);

        const validation = validateBody(characterPatchSchema, body);
        if (!validation.success) {
            throw invalidFields(validation.errors);
        }

        return this.write(existing.id, validation.data, 'update');
    }

    async remove(rawId: string): Promise<void> {
        const id = parseRecordId(rawId);
        if (!id.ok || !(await this.charactersRepository.delete(id.value))) {
            throw recordNotFound();
        }

        countWrite('character', 'delete');
        this.logger.log({ msg: 'Character deleted', id: id.value });
    }

    private async write(
        id: number,
        changes: Partial<Omit<Character, 'id'>>,
        operation: 'replace' | 'update',
    ): Promise<Character> {
        const updated = await this.charactersRepository.update(id, changes);
        if (!updated) {
            throw recordNotFound();
        }

        countWrite('character', operation);
        this.logger.log({ msg: 'Character updated', id, fields: Object.keys(changes) });

        return updated;
    }

    private async require(rawId: string): Promise<Character> {
        const id = parseRecordId(rawId);
        const character = id.ok ? await this.charactersRepository.findById(id.value) : null;
        if (!character) {
            throw recordNotFound();
        }
        return character;
    }

    private parseOrdering(query: CharacterListQuery): CharacterOrdering | null {
        const field = parseChoice(query.orderBy, CHARACTER_ORDER_FIELDS);
        const ascending = parseBinaryFlag(query.ascending);
        if (!field.ok || !ascending.ok) {
            return null;
        }
        return { field: field.value, ascending: ascending.value };
    }

    private parseFilters(query: CharacterListQuery): CharacterFilters {
        const name = queryValue(query.name);
        const suspect = parseTruthy(query.suspect);
        const occupation = queryValue(query.occupation);

        return {
            name: name || undefined,
            suspect: suspect.ok ? suspect.value : undefined,
            occupation: occupation || undefined,
        };
    }
}
