/**
 * @fileoverview Characters Repository
 *
 * Data access for characters from PostgreSQL via TypeORM.
 */

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RecordPredicate, RecordRepository } from '../shared/repository';
import { CharacterEntity } from './entities';
import { Character, CharacterDraft } from './interfaces';

/**
 * Injection token and contract for character storage.
 */
export abstract class CharactersRepository implements RecordRepository<Character, CharacterDraft> {
    abstract create(draft: CharacterDraft): Promise<Character>;

    abstract findById(id: number): Promise<Character | null>;

    abstract findAll(predicate?: RecordPredicate<Character>): Promise<Character[]>;

    abstract update(id: number, changes: Partial<CharacterDraft>): Promise<Character | null>;

    abstract delete(id: number): Promise<boolean>;
}

function toCharacter(entity: CharacterEntity): Character {
    return {
        id: entity.id,
        name: entity.name,
        date_of_birth: entity.date_of_birth,
        occupation: entity.occupation,
        is_suspect: entity.is_suspect,
    };
}

@Injectable()
export class TypeOrmCharactersRepository extends CharactersRepository {
    constructor(
        @InjectRepository(CharacterEntity)
        private readonly characterRepo: Repository<CharacterEntity>,
    ) {
        super();
    }

    async create(draft: CharacterDraft): Promise<Character> {
        const saved = await this.characterRepo.save(this.characterRepo.create(draft));
        return toCharacter(saved);
    }

    async findById(id: number): Promise<Character | null> {
        const entity = await this.characterRepo.findOne({ where: { id } });
        return entity ? toCharacter(entity) : null;
    }

    async findAll(predicate?: RecordPredicate<Character>): Promise<Character[]> {
        const entities = await this.characterRepo.find({ order: { id: 'ASC' } });
        const characters = entities.map(toCharacter);
        return predicate ? characters.filter(predicate) : characters;
    }

    async update(id: number, changes: Partial<CharacterDraft>): Promise<Character | null> {
        const entity = await this.characterRepo.findOne({ where: { id } });
        if (!entity) {
            return null;
        }

        this.characterRepo.merge(entity, changes);
        return toCharacter(await this.characterRepo.save(entity));
    }

    /**
     * Locations go with the character through the foreign key's ON DELETE CASCADE.
     */
    async delete(id: number): Promise<boolean> {
        const result = await this.characterRepo.delete(id);
        return (result.affected ?? 0) > 0;
    }
}
