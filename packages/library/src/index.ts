/**
 * @webkeep/library
 *
 * Catalogued snapshot collection: capture with registration, delete, zip
 * export and import, versioning with tag inheritance.
 */

export { WebsiteLibrary, type WebsiteLibraryOptions } from './library.js';
export { exportSnapshot, unpackSnapshot, type UnpackOptions } from './archive.js';
export { InvalidArchiveError } from './errors.js';
