/**
 * @fileoverview Locations Repository
 *
 * Data access for locations from PostgreSQL via TypeORM.
 */

import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { ReferencedRecordMissingError } from '../shared/errors';
import { joinInstant, splitInstant } from '../shared/parsing';
import { RecordPredicate, RecordRepository } from '../shared/repository';
import { LocationEntity } from './entities';
import { Location, LocationDraft } from './interfaces';

const FOREIGN_KEY_VIOLATION = '23503';

/**
 * Injection token and contract for location storage.
 */
export abstract class LocationsRepository implements RecordRepository<Location, LocationDraft> {
    abstract create(draft: LocationDraft): Promise<Location>;

    abstract findById(id: number): Promise<Location | null>;

    abstract findAll(predicate?: RecordPredicate<Location>): Promise<Location[]>;

    abstract update(id: number, changes: Partial<LocationDraft>): Promise<Location | null>;

    abstract delete(id: number): Promise<boolean>;
}

function toLocation(entity: LocationEntity): Location {
    return {
        id: entity.id,
        character: entity.character_id,
        timestamp: joinInstant(entity.timestamp, entity.timestamp_micros),
        lat: entity.lat,
        lon: entity.lon,
    };
}

function toColumns(changes: Partial<LocationDraft>): Partial<LocationEntity> {
    const { character, timestamp, ...columns } = changes;
    const row: Partial<LocationEntity> = { ...columns };
    if (character !== undefined) {
        row.character_id = character;
    }
    if (timestamp !== undefined) {
        const { at, micros } = splitInstant(timestamp);
        row.timestamp = at;
        row.timestamp_micros = micros;
    }
    return row;
}

function isForeignKeyViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) {
        return false;
    }
    const driverError: unknown = error.driverError;
    return (
        typeof driverError === 'object' &&
        driverError !== null &&
        'code' in driverError &&
        driverError.code === FOREIGN_KEY_VIOLATION
    );
}

@Injectable()
export class TypeOrmLocationsRepository extends LocationsRepository {
    private readonly logger = new Logger(TypeOrmLocationsRepository.name);

    constructor(
        @InjectRepository(LocationEntity)
        private readonly locationRepo: Repository<LocationEntity>,
    ) {
        super();
    }

    async create(draft: LocationDraft): Promise<Location> {
        const entity = this.locationRepo.create(toColumns(draft));
        return toLocation(await this.persist(entity, draft.character));
    }

    async findById(id: number): Promise<Location | null> {
        const entity = await this.locationRepo.findOne({ where: { id } });
        return entity ? toLocation(entity) : null;
    }

    async findAll(predicate?: RecordPredicate<Location>): Promise<Location[]> {
        const entities = await this.locationRepo.find({ order: { id: 'ASC' } });
        const locations = entities.map(toLocation);
        return predicate ? locations.filter(predicate) : locations;
    }

    async update(id: number, changes: Partial<LocationDraft>): Promise<Location | null> {
        const entity = await this.locationRepo.findOne({ where: { id } });
        if (!entity) {
            return null;
        }

        this.locationRepo.merge(entity, toColumns(changes));
        return toLocation(await this.persist(entity, entity.character_id));
    }

    async delete(id: number): Promise<boolean> {
        const result = await this.locationRepo.delete(id);
        return (result.affected ?? 0) > 0;
    }

    /**
     * Saves, translating a lost race against the owner's deletion into a domain error.
     */
    private async persist(entity: LocationEntity, characterId: number): Promise<LocationEntity> {
        try {
            return await this.locationRepo.save(entity);
        } catch (error) {
            if (isForeignKeyViolation(error)) {
                this.logger.warn({ msg: 'Location references a missing character', character: characterId });
                throw new ReferencedRecordMissingError('character', characterId);
            }
            throw error;
        }
    }
}
