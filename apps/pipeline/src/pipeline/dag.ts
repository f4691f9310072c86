import { SOURCE_NAMES } from '../types/sources';
import type { SourceName } from '../types/sources';
import { DagCycleError, DuplicateModelError, MissingDependencyError } from '../lib/errors';
import type { AnyModel } from './model';
import type { ModelName, TableName } from './tables';

export interface RunPlan {
    // Execution order; every model comes after all of its dependencies
    order: AnyModel[];
    // Models grouped by depth. Models in one level only read earlier levels,
    // so an external scheduler may run a level in parallel.
    levels: ModelName[][];
    // Sources some model actually reads
    sources: SourceName[];
}

const SOURCE_SET: ReadonlySet<string> = new Set(SOURCE_NAMES);

function isSource(name: TableName): name is SourceName {
    return SOURCE_SET.has(name);
}

/**
 * Validates the model graph and orders it. Ties are broken by model name so
 * the order is the same on every run.
 */
export function planRun(models: readonly AnyModel[]): RunPlan {
    const byName = new Map<ModelName, AnyModel>();
    for (const model of models) {
        if (byName.has(model.name)) throw new DuplicateModelError(model.name);
        byName.set(model.name, model);
    }

    const sources = new Set<SourceName>();
    const remaining = new Map<ModelName, number>();
    const dependents = new Map<ModelName, ModelName[]>();

    for (const model of models) {
        let upstream = 0;
        for (const dep of new Set(model.deps)) {
            if (isSource(dep)) {
                sources.add(dep);
                continue;
            }
            if (!byName.has(dep)) throw new MissingDependencyError(model.name, dep);
            upstream++;
            dependents.set(dep, [...(dependents.get(dep) ?? []), model.name]);
        }
        remaining.set(model.name, upstream);
    }

    const order: AnyModel[] = [];
    const levels: ModelName[][] = [];
    let frontier = [...remaining.entries()]
        .filter(([, count]) => count === 0)
        .map(([name]) => name)
        .sort();

    while (frontier.length > 0) {
        levels.push(frontier);
        const next: ModelName[] = [];
        for (const name of frontier) {
            const model = byName.get(name);
            if (model) order.push(model);
            for (const dependent of dependents.get(name) ?? []) {
                const count = (remaining.get(dependent) ?? 0) - 1;
                remaining.set(dependent, count);
                if (count === 0) next.push(dependent);
            }
        }
        frontier = next.sort();
    }

    if (order.length !== models.length) {
        const stuck = [...remaining.entries()]
            .filter(([, count]) => count > 0)
            .map(([name]) => name)
            .sort();
        throw new DagCycleError(stuck);
    }

    return { order, levels, sources: [...sources].sort() };
}

// Models that must run to produce the requested tables, with everything upstream
export function selectModels(models: readonly AnyModel[], targets: readonly ModelName[]): AnyModel[] {
    const byName = new Map(models.map((model): [ModelName, AnyModel] => [model.name, model]));
    const selected = new Set<ModelName>();
    const stack = [...targets];

    while (stack.length > 0) {
        const name = stack.pop();
        if (name === undefined || selected.has(name)) continue;
        const model = byName.get(name);
        if (!model) throw new MissingDependencyError('<selection>', name);
        selected.add(name);
        for (const dep of model.deps) {
            if (!isSource(dep)) stack.push(dep);
        }
    }

    return models.filter((model) => selected.has(model.name));
}
