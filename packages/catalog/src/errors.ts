/**
 * Raised when a tag or note names an entry the catalog does not hold.
 */
export class UnknownEntryError extends Error {
    readonly name = 'UnknownEntryError';

    constructor(public readonly entryId: number) {
        super(`No catalog entry with id ${entryId}`);
    }
}
