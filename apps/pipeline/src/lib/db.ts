import { Pool } from 'pg';
import { env } from '../env';

let pool: Pool | null = null;

// Lazily created so that in-memory runs and tests never need DATABASE_URL
export function getPool(): Pool {
    if (pool) return pool;

    if (!env.DATABASE_URL) {
        throw new Error('DATABASE_URL environment variable is required');
    }

    pool = new Pool({ connectionString: env.DATABASE_URL });
    return pool;
}

export async function closePool(): Promise<void> {
    if (!pool) return;
    const current = pool;
    pool = null;
    await current.end();
}
