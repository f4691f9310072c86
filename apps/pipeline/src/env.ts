import { z } from 'zod';
import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env from repository root
config({ path: resolve(__dirname, '../../../.env') });

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    DATABASE_URL: z.string().url().optional(),
    WAREHOUSE_SOURCE_SCHEMA: z.string().regex(/^[a-z_][a-z0-9_]*$/).default('public'),
    WAREHOUSE_TARGET_SCHEMA: z.string().regex(/^[a-z_][a-z0-9_]*$/).default('analytics'),
    PIPELINE_CONFIG: z.string().min(1).optional(),
    PIPELINE_NOW: z.string().datetime({ offset: true }).transform((value) => new Date(value)).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
    const parsed = envSchema.safeParse(source);

    if (!parsed.success) {
        console.error('Invalid environment variables:');
        console.error(JSON.stringify(parsed.error.format(), null, 2));
        process.exit(1);
    }

    return parsed.data;
}

export const env = parseEnv(process.env);
