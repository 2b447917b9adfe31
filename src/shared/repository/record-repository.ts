/**
 * @fileoverview Record Repository Contract
 *
 * The narrow storage surface the services depend on. TypeORM backs it in
 * the application; tests substitute in-memory stores.
 */

export type RecordPredicate<TRecord> = (record: TRecord) => boolean;

export interface RecordRepository<TRecord extends { id: number }, TDraft> {
    create(draft: TDraft): Promise<TRecord>;

    findById(id: number): Promise<TRecord | null>;

    /**
     * All records in insertion order, optionally narrowed by `predicate`.
     */
    findAll(predicate?: RecordPredicate<TRecord>): Promise<TRecord[]>;

    /**
     * Merges `changes` into the stored record; `null` when there is none.
     */
    update(id: number, changes: Partial<TDraft>): Promise<TRecord | null>;

    delete(id: number): Promise<boolean>;
}

export function allOf<TRecord>(...predicates: RecordPredicate<TRecord>[]): RecordPredicate<TRecord> {
    return (record) => predicates.every((predicate) => predicate(record));
}

export function anyOf<TRecord>(...predicates: RecordPredicate<TRecord>[]): RecordPredicate<TRecord> {
    return (record) => predicates.some((predicate) => predicate(record));
}
