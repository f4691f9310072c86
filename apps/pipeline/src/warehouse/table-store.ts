import type { SourceName, SourceRowMap } from '../types/sources';
import type { ModelName, ModelRowMap } from '../pipeline/tables';

/**
 * Where a run reads its raw snapshot and publishes its derived tables.
 *
 * `publish` must replace the whole table atomically: readers see either the
 * previous rows or the new ones, never a mix.
 */
export interface TableStore {
    readSource<K extends SourceName>(name: K): Promise<SourceRowMap[K][]>;
    publish<K extends ModelName>(name: K, rows: readonly ModelRowMap[K][]): Promise<void>;
}
