/**
 * Raised by a repository when a write points at a record that no longer exists.
 */
export class ReferencedRecordMissingError extends Error {
    constructor(
        readonly field: string,
        readonly referencedId: number,
    ) {
        super(`${field} ${referencedId} does not exist`);
        this.name = 'ReferencedRecordMissingError';
    }
}
