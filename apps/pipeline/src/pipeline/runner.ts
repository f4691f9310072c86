import type { PipelineConfig } from '../config';
import {
    ModelExecutionError,
    PipelineAbortedError,
    UndeclaredDependencyError,
    UniqueKeyViolationError,
} from '../lib/errors';
import { pipelineLoggers } from '../lib/logger';
import type { Logger } from '../lib/logger';
import type { TableStore } from '../warehouse/table-store';
import { planRun, selectModels } from './dag';
import type { AnyModel, Materialization } from './model';
import { TableSet } from './tables';
import type { ModelName, TableName, TableReader, TableRowMap } from './tables';

export interface RunOptions {
    now: Date;
    config: PipelineConfig;
    models: readonly AnyModel[];
    // Only build these tables and what they depend on
    targets?: readonly ModelName[];
    signal?: AbortSignal;
    log?: Logger;
}

export interface ModelRunSummary {
    name: ModelName;
    materialized: Materialization;
    rows: number;
    durationMs: number;
    published: boolean;
}

export interface RunSummary {
    now: Date;
    startedAt: Date;
    finishedAt: Date;
    sources: Array<{ name: TableName; rows: number }>;
    models: ModelRunSummary[];
    published: ModelName[];
}

function scopedReader(model: AnyModel, tables: TableSet): TableReader<TableName> {
    const allowed = new Set<TableName>(model.deps);
    return {
        get<K extends TableName>(name: K): readonly TableRowMap[K][] {
            if (!allowed.has(name)) {
                throw new UndeclaredDependencyError(model.name, name);
            }
            return tables.get(name);
        },
    };
}

function checkUniqueKey(model: AnyModel, rows: readonly TableRowMap[ModelName][]): void {
    const keyOf = model.uniqueKey;
    if (!keyOf) return;
    const seen = new Set<string>();
    for (const row of rows) {
        const key = keyOf.call(model, row);
        if (seen.has(key)) throw new UniqueKeyViolationError(model.name, key);
        seen.add(key);
    }
}

/**
 * Runs the model graph once against a snapshot of the raw tables.
 *
 * Every model sees the same `now`. A model's table is published as soon as it
 * has been built and checked, so a failure or abort leaves earlier tables at
 * their new state and every later table at its previous one.
 */
export async function runPipeline(store: TableStore, options: RunOptions): Promise<RunSummary> {
    const log = options.log ?? pipelineLoggers.runner;
    const startedAt = new Date();
    const models = options.targets ? selectModels(options.models, options.targets) : options.models;
    const plan = planRun(models);

    log.info(
        { now: options.now.toISOString(), models: plan.order.length, levels: plan.levels.length },
        'Starting pipeline run'
    );

    const tables = new TableSet();
    const sources: RunSummary['sources'] = [];
    for (const name of plan.sources) {
        const rows = await store.readSource(name);
        tables.set(name, rows);
        sources.push({ name, rows: rows.length });
    }
    log.info({ sources: sources.length }, 'Loaded source tables');

    const summaries: ModelRunSummary[] = [];
    const published: ModelName[] = [];

    for (const [index, model] of plan.order.entries()) {
        if (options.signal?.aborted) {
            const pending = plan.order.slice(index).map((pendingModel) => pendingModel.name);
            log.warn({ completed: summaries.length, pending: pending.length }, 'Pipeline run aborted');
            throw new PipelineAbortedError(
                summaries.map((summary) => summary.name),
                pending
            );
        }

        const modelStartedAt = Date.now();
        const modelLog = log.child({ model: model.name });
        let rows: TableRowMap[ModelName][];
        try {
            rows = model.build(
                { now: options.now, config: options.config, log: modelLog },
                scopedReader(model, tables)
            );
            checkUniqueKey(model, rows);
        } catch (error) {
            log.error({ model: model.name, error }, 'Model failed');
            throw new ModelExecutionError(model.name, error);
        }

        tables.set(model.name, rows);

        const isTable = model.materialized === 'table';
        if (isTable) {
            await store.publish(model.name, rows);
            published.push(model.name);
        }

        const durationMs = Date.now() - modelStartedAt;
        summaries.push({
            name: model.name,
            materialized: model.materialized,
            rows: rows.length,
            durationMs,
            published: isTable,
        });
        modelLog.info({ rows: rows.length, durationMs }, 'Model built');
    }

    const finishedAt = new Date();
    log.info(
        { published: published.length, durationMs: finishedAt.getTime() - startedAt.getTime() },
        'Pipeline run finished'
    );

    return { now: options.now, startedAt, finishedAt, sources, models: summaries, published };
}
