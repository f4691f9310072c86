import { createMockPgPool, executedSql, resetMockPgPool } from '../../mocks/pg.mock';

const mockPool = createMockPgPool();

jest.mock('pg', () => ({
    Pool: jest.fn(() => mockPool),
}));

import { Pool } from 'pg';
import { InvalidSourceRowError } from '../../../src/lib/errors';
import type { FeedbackRow } from '../../../src/types/models';
import { PgTableStore } from '../../../src/warehouse/pg-table-store';

describe('PgTableStore', () => {
    let store: PgTableStore;

    beforeEach(() => {
        resetMockPgPool(mockPool);
        store = new PgTableStore(new Pool(), {
            sourceSchema: 'raw',
            targetSchema: 'analytics_test',
            batchSize: 2,
        });
    });

    describe('readSource', () => {
        it('should select mapped columns and coerce values', async () => {
            mockPool.query.mockResolvedValueOnce({
                rows: [
                    {
                        feedbackMd5: 'f1',
                        username: 'alice',
                        score: '1',
                        recordingMbid: null,
                        feedbackAt: '2024-05-01T00:00:00.000Z',
                        insertTsUtc: new Date('2024-05-02T00:00:00.000Z'),
                    },
                ],
            });

            const rows = await store.readSource('listenbrainz_user_feedback');

            expect(mockPool.query).toHaveBeenCalledWith(
                'SELECT "feedback_md5" AS "feedbackMd5", "username" AS "username", "score" AS "score", ' +
                    '"recording_mbid" AS "recordingMbid", "feedback_at" AS "feedbackAt", ' +
                    '"insert_ts_utc" AS "insertTsUtc" FROM "raw"."listenbrainz_user_feedback"'
            );
            expect(rows).toEqual([
                {
                    feedbackMd5: 'f1',
                    username: 'alice',
                    score: 1,
                    recordingMbid: null,
                    feedbackAt: new Date('2024-05-01T00:00:00.000Z'),
                    insertTsUtc: new Date('2024-05-02T00:00:00.000Z'),
                },
            ]);
        });

        it('should keep JSON payloads as they come back', async () => {
            const payload = { listened_at: 1700000000, track_metadata: { track_name: 'Blue' } };
            mockPool.query.mockResolvedValueOnce({
                rows: [{ listenMd5: 'l1', username: 'alice', jsonData: payload, insertTsUtc: '2024-05-01T00:00:00Z' }],
            });

            const rows = await store.readSource('listenbrainz_listens');

            expect(rows[0].jsonData).toEqual(payload);
        });

        it('should reject the first row that fails validation', async () => {
            mockPool.query.mockResolvedValue({
                rows: [
                    { collectionId: 'c1', collectionName: 'mixes', username: 'alice', createdAt: '2024-05-01' },
                    { collectionId: 'c2', collectionName: 'mixes', createdAt: '2024-05-01' },
                ],
            });

            await expect(store.readSource('playlist_collections')).rejects.toBeInstanceOf(InvalidSourceRowError);
            await expect(store.readSource('playlist_collections')).rejects.toMatchObject({
                source: 'playlist_collections',
                rowIndex: 1,
            });
        });
    });

    describe('publish', () => {
        const rows: FeedbackRow[] = ['f1', 'f2', 'f3'].map((feedbackMd5) => ({
            feedbackMd5,
            username: 'alice',
            score: 1,
            recordingMbid: null,
            feedbackAt: new Date('2024-05-01T00:00:00.000Z'),
        }));
        const serialized = (md5: string): string =>
            JSON.stringify({
                feedbackMd5: md5,
                username: 'alice',
                score: 1,
                recordingMbid: null,
                feedbackAt: '2024-05-01T00:00:00.000Z',
            });

        it('should fill a staging table in batches and swap it in inside a transaction', async () => {
            await store.publish('feedback', rows);

            expect(executedSql(mockPool.client)).toEqual([
                'CREATE SCHEMA IF NOT EXISTS "analytics_test"',
                'DROP TABLE IF EXISTS "analytics_test"."feedback__next"',
                'CREATE TABLE "analytics_test"."feedback__next" (row_index integer PRIMARY KEY, row jsonb NOT NULL)',
                'INSERT INTO "analytics_test"."feedback__next" (row_index, row) VALUES ($1, $2::jsonb), ($3, $4::jsonb)',
                'INSERT INTO "analytics_test"."feedback__next" (row_index, row) VALUES ($1, $2::jsonb)',
                'BEGIN',
                'DROP TABLE IF EXISTS "analytics_test"."feedback"',
                'ALTER TABLE "analytics_test"."feedback__next" RENAME TO "feedback"',
                'COMMIT',
            ]);
            expect(mockPool.client.query.mock.calls[3][1]).toEqual([0, serialized('f1'), 1, serialized('f2')]);
            expect(mockPool.client.query.mock.calls[4][1]).toEqual([2, serialized('f3')]);
            expect(mockPool.client.release).toHaveBeenCalledTimes(1);
        });

        it('should publish an empty table without inserts', async () => {
            await store.publish('feedback', []);

            expect(executedSql(mockPool.client).filter((sql) => sql.startsWith('INSERT'))).toEqual([]);
            expect(executedSql(mockPool.client)).toContain('COMMIT');
        });

        it('should roll back and keep the old table when the swap fails', async () => {
            mockPool.client.query.mockImplementation((sql: string) =>
                sql.startsWith('ALTER TABLE')
                    ? Promise.reject(new Error('lock timeout'))
                    : Promise.resolve({ rows: [], rowCount: 0 })
            );

            await expect(store.publish('feedback', rows)).rejects.toThrow('lock timeout');

            const statements = executedSql(mockPool.client);
            expect(statements[statements.length - 1]).toBe('ROLLBACK');
            expect(statements).not.toContain('COMMIT');
            expect(mockPool.client.release).toHaveBeenCalledTimes(1);
        });

        it('should release the client when staging fails', async () => {
            mockPool.client.query.mockRejectedValueOnce(new Error('permission denied for schema'));

            await expect(store.publish('feedback', rows)).rejects.toThrow('permission denied for schema');
            expect(executedSql(mockPool.client)).toEqual(['CREATE SCHEMA IF NOT EXISTS "analytics_test"']);
            expect(mockPool.client.release).toHaveBeenCalledTimes(1);
        });
    });
});
