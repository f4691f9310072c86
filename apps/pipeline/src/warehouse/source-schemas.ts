import { z } from 'zod';
import type { Json, SourceName, SourceRowMap } from '../types/sources';

// Row validation for the raw tables. pg hands back numeric and bigint
// columns as strings, so numbers are coerced.

const jsonSchema: z.ZodType<Json> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonSchema), z.record(jsonSchema)])
);

const text = z.string();
const nullableText = z.string().nullable();
const timestamp = z.coerce.date();
const nullableTimestamp = z.coerce.date().nullable();
const number = z.coerce.number();

type SourceSchemas = { [K in SourceName]: z.ZodType<SourceRowMap[K], z.ZodTypeDef, unknown> };

export const sourceSchemas: SourceSchemas = {
    listenbrainz_listens: z.object({
        listenMd5: text,
        username: text,
        jsonData: jsonSchema,
        insertTsUtc: timestamp,
    }),
    listenbrainz_user_feedback: z.object({
        feedbackMd5: text,
        username: text,
        score: number,
        recordingMbid: nullableText,
        feedbackAt: timestamp,
        insertTsUtc: timestamp,
    }),
    local_music_files: z.object({
        filepath: text,
        jsonData: jsonSchema,
        fileCreatedAt: nullableTimestamp,
        fileModifiedAt: nullableTimestamp,
        insertTsUtc: timestamp,
    }),
    local_music_embeddings: z.object({
        filepath: text,
        success: z.boolean(),
        durationSeconds: number.nullable(),
        insertTsUtc: timestamp,
    }),
    messybrainz_name_map: z.object({
        recordingMd5: text,
        recordingName: nullableText,
        artistName: nullableText,
        success: z.boolean(),
        payloadJson: jsonSchema,
        tsUtc: timestamp,
    }),
    musicbrainz_annotations: z.object({
        mbid: text,
        entity: z.enum(['artist', 'recording', 'release', 'release-group']),
        payloadJson: jsonSchema,
        tsUtc: timestamp,
    }),
    listenbrainz_artist_stats: z.object({
        mbid: text,
        payloadJson: jsonSchema,
        tsUtc: timestamp,
    }),
    listenbrainz_similar_user_activity: z.object({
        payloadId: text,
        fromUsername: text,
        toUsername: text,
        entity: text,
        timeRange: text,
        userSimilarity: number,
        jsonData: jsonSchema,
        insertTsUtc: timestamp,
    }),
    listenbrainz_collaborative_filtering_scores: z.object({
        artistMbidA: text,
        artistMbidB: text,
        scoreValue: number,
        insertTsUtc: timestamp,
    }),
    playlist_collections: z.object({
        collectionId: text,
        collectionName: text,
        username: text,
        createdAt: timestamp,
    }),
    playlist_collection_items: z.object({
        playlistId: text,
        collectionId: text,
        collectionOrderIndex: number,
        title: nullableText,
        playlist: jsonSchema,
        createdAt: timestamp,
    }),
};

interface SourceTable<K extends SourceName> {
    table: string;
    // Row field -> physical column
    columns: { [F in keyof SourceRowMap[K]]-?: string };
}

export const sourceTables: { [K in SourceName]: SourceTable<K> } = {
    listenbrainz_listens: {
        table: 'listenbrainz_listens',
        columns: {
            listenMd5: 'listen_md5',
            username: 'username',
            jsonData: 'json_data',
            insertTsUtc: 'insert_ts_utc',
        },
    },
    listenbrainz_user_feedback: {
        table: 'listenbrainz_user_feedback',
        columns: {
            feedbackMd5: 'feedback_md5',
            username: 'username',
            score: 'score',
            recordingMbid: 'recording_mbid',
            feedbackAt: 'feedback_at',
            insertTsUtc: 'insert_ts_utc',
        },
    },
    local_music_files: {
        table: 'local_music_files',
        columns: {
            filepath: 'filepath',
            jsonData: 'json_data',
            fileCreatedAt: 'file_created_at',
            fileModifiedAt: 'file_modified_at',
            insertTsUtc: 'insert_ts_utc',
        },
    },
    local_music_embeddings: {
        table: 'local_music_embeddings',
        columns: {
            filepath: 'filepath',
            success: 'success',
            durationSeconds: 'duration_seconds',
            insertTsUtc: 'insert_ts_utc',
        },
    },
    messybrainz_name_map: {
        table: 'messybrainz_name_map',
        columns: {
            recordingMd5: 'recording_md5',
            recordingName: 'recording_name',
            artistName: 'artist_name',
            success: 'success',
            payloadJson: 'payload_json',
            tsUtc: 'ts_utc',
        },
    },
    musicbrainz_annotations: {
        table: 'musicbrainz_annotations',
        columns: {
            mbid: 'mbid',
            entity: 'entity',
            payloadJson: 'payload_json',
            tsUtc: 'ts_utc',
        },
    },
    listenbrainz_artist_stats: {
        table: 'listenbrainz_artist_stats',
        columns: {
            mbid: 'mbid',
            payloadJson: 'payload_json',
            tsUtc: 'ts_utc',
        },
    },
    listenbrainz_similar_user_activity: {
        table: 'listenbrainz_similar_user_activity',
        columns: {
            payloadId: 'payload_id',
            fromUsername: 'from_username',
            toUsername: 'to_username',
            entity: 'entity',
            timeRange: 'time_range',
            userSimilarity: 'user_similarity',
            jsonData: 'json_data',
            insertTsUtc: 'insert_ts_utc',
        },
    },
    listenbrainz_collaborative_filtering_scores: {
        table: 'listenbrainz_collaborative_filtering_scores',
        columns: {
            artistMbidA: 'artist_mbid_a',
            artistMbidB: 'artist_mbid_b',
            scoreValue: 'score_value',
            insertTsUtc: 'insert_ts_utc',
        },
    },
    playlist_collections: {
        table: 'playlist_collections',
        columns: {
            collectionId: 'collection_id',
            collectionName: 'collection_name',
            username: 'username',
            createdAt: 'create_at_utc',
        },
    },
    playlist_collection_items: {
        table: 'playlist_collection_items',
        columns: {
            playlistId: 'playlist_id',
            collectionId: 'collection_id',
            collectionOrderIndex: 'collection_order_index',
            title: 'title',
            playlist: 'playlist',
            createdAt: 'create_at_utc',
        },
    },
};

export function quoteIdent(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

export function selectSourceSql(name: SourceName, schema: string): string {
    const { table, columns } = sourceTables[name];
    const list = Object.entries(columns)
        .map(([field, column]) => `${quoteIdent(column)} AS ${quoteIdent(field)}`)
        .join(', ');
    return `SELECT ${list} FROM ${quoteIdent(schema)}.${quoteIdent(table)}`;
}
