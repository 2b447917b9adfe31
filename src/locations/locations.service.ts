/**
 * @fileoverview Locations Service
 *
 * Record operations for locations and the nearby query.
 */

import { Injectable, Logger } from '@nestjs/common';
import { Counter, Histogram } from 'prom-client';
import { CharactersRepository } from '../characters/characters.repository';
import { ReferencedRecordMissingError } from '../shared/errors';
import { badQuery, invalidFields, recordNotFound } from '../shared/http';
import { countWrite } from '../shared/metrics';
import {
    parseCoordinatePair,
    parseInstantRange,
    parseNonNegativeNumber,
    parseRecordId,
    queryValue,
} from '../shared/parsing';
import { allOf, RecordPredicate } from '../shared/repository';
import { FieldMessages, validateBody } from '../shared/validation';
import { locationPatchSchema, locationReplaceSchema } from './dto/location-body.schema';
import { byCharacter, rankByDistance, withinPeriod } from './location-filters';
import { LocationsRepository } from './locations.repository';
import { CHARACTER_PARAM_MESSAGE, DATE_RANGE_PARAM_MESSAGE, NEAR_PARAMS_MESSAGE } from './locations.constants';
import { Location, LocationDraft, LocationNearQuery, LocationWithDistance, NearbyCriteria } from './interfaces';

const nearCounter = new Counter({
    name: 'locations_near_queries_total',
    help: 'Total number of nearby location requests',
    labelNames: ['status'],
});

const nearDuration = new Histogram({
    name: 'locations_near_query_duration_seconds',
    help: 'Nearby location request duration',
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1],
});

@Injectable()
export class LocationsService {
    private readonly logger = new Logger(LocationsService.name);

    constructor(
        private readonly locationsRepository: LocationsRepository,
        private readonly charactersRepository: CharactersRepository,
    ) { }

    async list(): Promise<Location[]> {
        return this.locationsRepository.findAll();
    }

    async findOne(rawId: string): Promise<Location> {
        return this.require(rawId);
    }

    async create(body: unknown): Promise<Location> {
        const validation = validateBody(locationReplaceSchema, body);
        if (!validation.success) {
            throw invalidFields(validation.errors);
        }

        const draft = validation.data;
        await this.requireCharacter(draft.character);
        const location = await this.persist(() => this.locationsRepository.create(draft));

        countWrite('location', 'create');
        this.logger.log({ msg: 'Location created', id: location.id, character: location.character });

        return location;
    }

    async replace(rawId: string, body: unknown): Promise<Location> {
        const existing = await this.require(rawId);

        const validation = validateBody(locationReplaceSchema, body);
        if (!validation.success) {
            throw invalidFields(validation.errors);
        }

        return this.write(existing.id, validation.data, 'replace');
    }

    async update(rawId: string, body: unknown): Promise<Location> {
        const existing = await this.require(rawId);

        const validation = validateBody(locationPatchSchema, body);
        if (!validation.success) {
            throw invalidFields(validation.errors);
        }

        return this.write(existing.id, validation.data, 'update');
    }

    async remove(rawId: string): Promise<void> {
        const id = parseRecordId(rawId);
        if (!id.ok || !(await this.locationsRepository.delete(id.value))) {
            throw recordNotFound();
        }

        countWrite('location', 'delete');
        this.logger.log({ msg: 'Location deleted', id: id.value });
    }

    /**
     * Locations within `distance` meters of `coordinates`, optionally narrowed
     * to one character and a timestamp range, ordered by distance.
     */
    async near(query: LocationNearQuery): Promise<LocationWithDistance[]> {
        const criteria = this.parseNearQuery(query);
        const timer = nearDuration.startTimer();

        try {
            const predicates: RecordPredicate<Location>[] = [];
            if (criteria.character !== undefined) {
                predicates.push(byCharacter(criteria.character));
            }
            if (criteria.period) {
                predicates.push(withinPeriod(criteria.period));
            }

            const candidates = await this.locationsRepository.findAll(
                predicates.length > 0 ? allOf(...predicates) : undefined,
            );
            const results = rankByDistance(candidates, criteria.origin, criteria.maxDistance, criteria.ascending);

            nearCounter.inc({ status: 'success' });
            this.logger.log({
                msg: 'Nearby locations computed',
                origin: criteria.origin,
                maxDistance: criteria.maxDistance,
                candidateCount: candidates.length,
                resultCount: results.length,
            });

            return results;
        } catch (error) {
            nearCounter.inc({ status: 'error' });
            this.logger.error({ msg: 'Nearby location query failed', error, query });
            throw error;
        } finally {
            timer();
        }
    }

    private parseNearQuery(query: LocationNearQuery): NearbyCriteria {
        const origin = parseCoordinatePair(query.coordinates);
        const maxDistance = parseNonNegativeNumber(query.distance);
        if (!origin.ok || !maxDistance.ok) {
            nearCounter.inc({ status: 'rejected' });
            throw badQuery(NEAR_PARAMS_MESSAGE);
        }

        const criteria: NearbyCriteria = {
            origin: origin.value,
            maxDistance: maxDistance.value,
            ascending: this.isAscending(query.ascending),
        };

        const character = parseRecordId(query.character);
        if (!character.ok && character.error === 'malformed') {
            nearCounter.inc({ status: 'rejected' });
            throw badQuery(CHARACTER_PARAM_MESSAGE);
        }
        if (character.ok) {
            criteria.character = character.value;
        }

        const period = parseInstantRange(query.date_range);
        if (!period.ok && period.error === 'malformed') {
            nearCounter.inc({ status: 'rejected' });
            throw badQuery(DATE_RANGE_PARAM_MESSAGE);
        }
        if (period.ok) {
            criteria.period = period.value;
        }

        return criteria;
    }

    /**
     * Ascending unless `ascending` is given with anything other than `1`.
     */
    private isAscending(raw: unknown): boolean {
        const flag = queryValue(raw);
        return flag === undefined || flag === '1';
    }

    private async write(
        id: number,
        changes: Partial<LocationDraft>,
        operation: 'replace' | 'update',
    ): Promise<Location> {
        if (changes.character !== undefined) {
            await this.requireCharacter(changes.character);
        }

        const updated = await this.persist(() => this.locationsRepository.update(id, changes));
        if (!updated) {
            throw recordNotFound();
        }

        countWrite('location', operation);
        this.logger.log({ msg: 'Location updated', id, fields: Object.keys(changes) });

        return updated;
    }

    private async require(rawId: string): Promise<Location> {
        const id = parseRecordId(rawId);
        const location = id.ok ? await this.locationsRepository.findById(id.value) : null;
        if (!location) {
            throw recordNotFound();
        }
        return location;
    }

    private async requireCharacter(characterId: number): Promise<void> {
        if (!(await this.charactersRepository.findById(characterId))) {
            throw invalidFields({ character: [FieldMessages.pkMissing(characterId)] });
        }
    }

    private async persist<T>(operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (error) {
            if (error instanceof ReferencedRecordMissingError) {
                throw invalidFields({ [error.field]: [FieldMessages.pkMissing(error.referencedId)] });
            }
            throw error;
        }
    }
}
