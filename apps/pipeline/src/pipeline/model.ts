import type { PipelineConfig } from '../config';
import type { Logger } from '../lib/logger';
import type { ModelName, TableName, TableReader, TableRowMap } from './tables';

export type Materialization = 'table' | 'ephemeral';

export interface ModelContext {
    // Baseline for every recency window in the run
    now: Date;
    config: PipelineConfig;
    log: Logger;
}

/**
 * One node of the transformation graph. A model reads only the tables it
 * declares, writes exactly one table, and never touches the warehouse itself.
 */
export interface ModelDefinition<N extends ModelName, D extends TableName> {
    name: N;
    description: string;
    deps: readonly D[];
    // Ephemeral outputs feed downstream models but are never published
    materialized: Materialization;
    uniqueKey?(row: TableRowMap[N]): string;
    build(ctx: ModelContext, input: TableReader<D>): TableRowMap[N][];
}

export type AnyModel = ModelDefinition<ModelName, TableName>;

export function defineModel<N extends ModelName, D extends TableName>(
    definition: ModelDefinition<N, D>
): ModelDefinition<N, D> {
    return definition;
}
