import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CharactersRepository, TypeOrmCharactersRepository } from './characters.repository';
import { CharacterEntity } from './entities';

describe('TypeOrmCharactersRepository', () => {
    let repository: CharactersRepository;

    const ormRepository = {
        create: jest.fn((columns: Partial<CharacterEntity>) => Object.assign(new CharacterEntity(), columns)),
        merge: jest.fn((entity: CharacterEntity, changes: Partial<CharacterEntity>) => Object.assign(entity, changes)),
        save: jest.fn(),
        find: jest.fn(),
        findOne: jest.fn(),
        delete: jest.fn(),
    };

    const entity = (id: number, name: string, isSuspect = false): CharacterEntity =>
        Object.assign(new CharacterEntity(), {
            id,
            name,
            date_of_birth: '1990-01-01',
            occupation: 'Tester',
            is_suspect: isSuspect,
        });

    beforeEach(async () => {
        jest.clearAllMocks();

        const moduleRef = await Test.createTestingModule({
            providers: [
                { provide: CharactersRepository, useClass: TypeOrmCharactersRepository },
                { provide: getRepositoryToken(CharacterEntity), useValue: ormRepository },
            ],
        }).compile();

        repository = moduleRef.get(CharactersRepository);
    });

    it('should map an entity to a plain character', async () => {
        ormRepository.findOne.mockResolvedValue(entity(1, 'Ann'));

        const found = await repository.findById(1);

        expect(ormRepository.findOne).toHaveBeenCalledWith({ where: { id: 1 } });
        expect(found).toEqual({
            id: 1,
            name: 'Ann',
            date_of_birth: '1990-01-01',
            occupation: 'Tester',
            is_suspect: false,
        });
        expect(found).not.toBeInstanceOf(CharacterEntity);
    });

    it('should return null for a missing id', async () => {
        ormRepository.findOne.mockResolvedValue(null);

        expect(await repository.findById(5)).toBeNull();
    });

    it('should load in id order and apply the predicate', async () => {
        ormRepository.find.mockResolvedValue([entity(1, 'Ann'), entity(2, 'Bob', true), entity(3, 'Cid')]);

        const found = await repository.findAll((character) => !character.is_suspect);

        expect(ormRepository.find).toHaveBeenCalledWith({ order: { id: 'ASC' } });
        expect(found.map((character) => character.id)).toEqual([1, 3]);
    });

    it('should return every row without a predicate', async () => {
        ormRepository.find.mockResolvedValue([entity(1, 'Ann'), entity(2, 'Bob')]);

        expect((await repository.findAll()).map((character) => character.name)).toEqual(['Ann', 'Bob']);
    });

    it('should create from the draft and return the saved row', async () => {
        ormRepository.save.mockImplementation(async (saved: CharacterEntity) => Object.assign(saved, { id: 7 }));
        const draft = { name: 'Dee', date_of_birth: '2000-02-29', occupation: 'Pilot', is_suspect: true };

        const created = await repository.create(draft);

        expect(ormRepository.create).toHaveBeenCalledWith(draft);
        expect(created).toEqual({ id: 7, ...draft });
    });

    it('should merge partial changes', async () => {
        ormRepository.findOne.mockResolvedValue(entity(1, 'Ann'));
        ormRepository.save.mockImplementation(async (saved: CharacterEntity) => saved);

        const updated = await repository.update(1, { occupation: 'Pilot' });

        expect(ormRepository.merge).toHaveBeenCalledWith(expect.any(CharacterEntity), { occupation: 'Pilot' });
        expect(updated).toEqual({
            id: 1,
            name: 'Ann',
            date_of_birth: '1990-01-01',
            occupation: 'Pilot',
            is_suspect: false,
        });
    });

    it('should return null when updating a missing character', async () => {
        ormRepository.findOne.mockResolvedValue(null);

        expect(await repository.update(5, { name: 'Eve' })).toBeNull();
        expect(ormRepository.save).not.toHaveBeenCalled();
    });

    it('should report whether a row was deleted', async () => {
        ormRepository.delete.mockResolvedValueOnce({ raw: [], affected: 1 });
        ormRepository.delete.mockResolvedValueOnce({ raw: [], affected: 0 });
        ormRepository.delete.mockResolvedValueOnce({ raw: [] });

        expect(await repository.delete(1)).toBe(true);
        expect(await repository.delete(1)).toBe(false);
        expect(await repository.delete(1)).toBe(false);
        expect(ormRepository.delete).toHaveBeenCalledWith(1);
    });
});
