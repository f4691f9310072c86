import { env } from './env';
import { loadPipelineConfig } from './config';
import { closePool, getPool } from './lib/db';
import { isRestartable } from './lib/errors';
import { logger } from './lib/logger';
import { ALL_MODELS } from './models';
import { runPipeline } from './pipeline/runner';
import { PgTableStore } from './warehouse/pg-table-store';

// Exit code telling the scheduler a plain retry may succeed
const EXIT_RESTARTABLE = 75;

const controller = new AbortController();

const start = async (): Promise<number> => {
    const now = env.PIPELINE_NOW ?? new Date();
    const config = loadPipelineConfig(env.PIPELINE_CONFIG);
    const store = new PgTableStore(getPool(), {
        sourceSchema: env.WAREHOUSE_SOURCE_SCHEMA,
        targetSchema: env.WAREHOUSE_TARGET_SCHEMA,
    });

    try {
        const summary = await runPipeline(store, {
            now,
            config,
            models: ALL_MODELS,
            signal: controller.signal,
        });
        logger.info({ published: summary.published.length }, 'Pipeline run complete');
        return 0;
    } catch (error) {
        logger.error({ error }, 'Pipeline run failed');
        return isRestartable(error) ? EXIT_RESTARTABLE : 1;
    } finally {
        await closePool();
    }
};

// Stop after the model in progress; tables already published stay published
const shutdown = (signal: string) => {
    logger.warn({ signal }, 'Abort requested');
    controller.abort();
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

start()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
        logger.fatal({ error }, 'Pipeline crashed before running');
        process.exit(1);
    });
