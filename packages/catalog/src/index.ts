/**
 * @webkeep/catalog
 *
 * Relational catalog of snapshots, their tags and notes.
 */

export { SqliteCatalog, type SqliteCatalogOptions } from './sqlite-catalog.js';
export { MemoryCatalog, type MemoryCatalogOptions } from './memory-catalog.js';
export { UnknownEntryError } from './errors.js';
export type {
    Catalog,
    CatalogEntry,
    CatalogEntryUpdate,
    CatalogFilter,
    CatalogNote,
    CatalogTag,
    CatalogTagUsage,
} from '@webkeep/types';
