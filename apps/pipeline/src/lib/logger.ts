import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../env';

export type { Logger };

export const logger = pino({
    level: env.LOG_LEVEL,
    base: { service: 'pipeline' },
});

// Named child loggers, one per area of the run
export const pipelineLoggers = {
    runner: logger.child({ module: 'runner' }),
    warehouse: logger.child({ module: 'warehouse' }),
    config: logger.child({ module: 'config' }),
};
