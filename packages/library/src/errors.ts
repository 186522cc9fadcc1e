/**
 * Raised when a zip file cannot be imported as a snapshot.
 */
export class InvalidArchiveError extends Error {
    readonly name = 'InvalidArchiveError';

    constructor(
        public readonly archivePath: string,
        public readonly reason: string,
    ) {
        super(`Invalid archive: ${reason}`);
    }
}
