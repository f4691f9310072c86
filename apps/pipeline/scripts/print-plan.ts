/**
 * Prints the model execution order and the levels an external scheduler
 * could run in parallel. Reads nothing from the warehouse.
 */
import { ALL_MODELS } from '../src/models';
import { planRun } from '../src/pipeline/dag';

function main() {
    const plan = planRun(ALL_MODELS);

    console.log(`=== Sources (${plan.sources.length}) ===`);
    for (const source of plan.sources) console.log(`  ${source}`);

    console.log(`\n=== Levels (${plan.levels.length}) ===`);
    plan.levels.forEach((level, index) => {
        console.log(`  ${index}: ${level.join(', ')}`);
    });

    console.log('\n=== Models ===');
    for (const model of plan.order) {
        console.log(`  ${model.name} [${model.materialized}] <- ${[...model.deps].sort().join(', ')}`);
    }
}

main();
