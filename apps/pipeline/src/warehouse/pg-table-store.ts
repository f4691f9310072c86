import type { Pool, PoolClient } from 'pg';
import { InvalidSourceRowError } from '../lib/errors';
import { pipelineLoggers } from '../lib/logger';
import { toJSON } from '../lib/serialization';
import type { ModelName, ModelRowMap } from '../pipeline/tables';
import type { SourceName, SourceRowMap } from '../types/sources';
import { quoteIdent, selectSourceSql, sourceSchemas } from './source-schemas';
import type { TableStore } from './table-store';

const log = pipelineLoggers.warehouse;

export interface PgTableStoreOptions {
    sourceSchema: string;
    targetSchema: string;
    // Rows per INSERT statement
    batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 500;

/**
 * Postgres-backed store. Derived rows are stored as `(row_index, row jsonb)`;
 * each table is built under a `__next` name and swapped in with a drop and
 * rename inside one transaction.
 */
export class PgTableStore implements TableStore {
    private readonly batchSize: number;

    constructor(
        private readonly pool: Pool,
        private readonly options: PgTableStoreOptions
    ) {
        this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    }

    async readSource<K extends SourceName>(name: K): Promise<SourceRowMap[K][]> {
        const sql = selectSourceSql(name, this.options.sourceSchema);
        const result = await this.pool.query<Record<string, unknown>>(sql);
        const schema = sourceSchemas[name];

        const rows: SourceRowMap[K][] = [];
        result.rows.forEach((raw, index) => {
            const parsed = schema.safeParse(raw);
            if (!parsed.success) {
                const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
                throw new InvalidSourceRowError(name, index, issues);
            }
            rows.push(parsed.data);
        });

        log.debug({ source: name, rows: rows.length }, 'Read source table');
        return rows;
    }

    async publish<K extends ModelName>(name: K, rows: readonly ModelRowMap[K][]): Promise<void> {
        const schema = quoteIdent(this.options.targetSchema);
        const target = `${schema}.${quoteIdent(name)}`;
        const staging = `${schema}.${quoteIdent(`${name}__next`)}`;

        const client = await this.pool.connect();
        try {
            await client.query(`CREATE SCHEMA IF NOT EXISTS ${schema}`);
            await client.query(`DROP TABLE IF EXISTS ${staging}`);
            await client.query(`CREATE TABLE ${staging} (row_index integer PRIMARY KEY, row jsonb NOT NULL)`);
            await this.insertRows(client, staging, rows);

            await client.query('BEGIN');
            try {
                await client.query(`DROP TABLE IF EXISTS ${target}`);
                await client.query(`ALTER TABLE ${staging} RENAME TO ${quoteIdent(name)}`);
                await client.query('COMMIT');
            } catch (error) {
                await client.query('ROLLBACK');
                throw error;
            }

            log.info({ table: name, rows: rows.length }, 'Published table');
        } finally {
            client.release();
        }
    }

    private async insertRows(client: PoolClient, table: string, rows: readonly unknown[]): Promise<void> {
        for (let start = 0; start < rows.length; start += this.batchSize) {
            const batch = rows.slice(start, start + this.batchSize);
            const values: Array<number | string> = [];
            const tuples = batch.map((row, offset) => {
                values.push(start + offset, JSON.stringify(toJSON(row)));
                return `($${values.length - 1}, $${values.length}::jsonb)`;
            });
            await client.query(`INSERT INTO ${table} (row_index, row) VALUES ${tuples.join(', ')}`, values);
        }
    }
}
