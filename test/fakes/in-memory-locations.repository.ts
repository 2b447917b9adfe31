import { LocationsRepository } from '../../src/locations/locations.repository';
import { Location, LocationDraft } from '../../src/locations/interfaces';
import { ReferencedRecordMissingError } from '../../src/shared/errors';
import { RecordPredicate } from '../../src/shared/repository';
import { InMemoryCharactersRepository } from './in-memory-characters.repository';

const copy = (location: Location): Location => ({ ...location });

/**
 * Location store that enforces the character reference and drops a
 * character's locations when it is deleted, as the database would.
 */
export class InMemoryLocationsRepository extends LocationsRepository {
    private readonly records = new Map<number, Location>();
    private nextId = 1;

    constructor(private readonly characters: InMemoryCharactersRepository) {
        super();
        characters.onDelete((characterId) => {
            for (const [id, location] of this.records) {
                if (location.character === characterId) {
                    this.records.delete(id);
                }
            }
        });
    }

    async create(draft: LocationDraft): Promise<Location> {
        this.checkReference(draft.character);

        const location = copy({ id: this.nextId++, ...draft });
        this.records.set(location.id, location);
        return copy(location);
    }

    async findById(id: number): Promise<Location | null> {
        const location = this.records.get(id);
        return location ? copy(location) : null;
    }

    async findAll(predicate?: RecordPredicate<Location>): Promise<Location[]> {
        const locations = [...this.records.values()].map(copy);
        return predicate ? locations.filter(predicate) : locations;
    }

    async update(id: number, changes: Partial<LocationDraft>): Promise<Location | null> {
        const existing = this.records.get(id);
        if (!existing) {
            return null;
        }

        const updated = copy({ ...existing, ...changes });
        this.checkReference(updated.character);
        this.records.set(id, updated);
        return copy(updated);
    }

    async delete(id: number): Promise<boolean> {
        return this.records.delete(id);
    }

    private checkReference(characterId: number): void {
        if (!this.characters.has(characterId)) {
            throw new ReferencedRecordMissingError('character', characterId);
        }
    }
}
