// Raw, append-only tables written by the ingestion collaborators.
// JSON payload columns stay opaque here; staging models unpack them.

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

export interface RawListen {
    listenMd5: string;
    username: string;
    jsonData: Json;
    insertTsUtc: Date;
}

export interface RawFeedback {
    feedbackMd5: string;
    username: string;
    score: number;
    recordingMbid: string | null;
    feedbackAt: Date;
    insertTsUtc: Date;
}

export interface RawLocalFile {
    filepath: string;
    jsonData: Json;
    fileCreatedAt: Date | null;
    fileModifiedAt: Date | null;
    insertTsUtc: Date;
}

// The vector itself belongs to the audio job and is never read here
export interface RawEmbedding {
    filepath: string;
    success: boolean;
    durationSeconds: number | null;
    insertTsUtc: Date;
}

export interface RawNameMap {
    recordingMd5: string;
    recordingName: string | null;
    artistName: string | null;
    success: boolean;
    payloadJson: Json;
    tsUtc: Date;
}

export type AnnotationEntity = 'artist' | 'recording' | 'release' | 'release-group';

export interface RawAnnotation {
    mbid: string;
    entity: AnnotationEntity;
    payloadJson: Json;
    tsUtc: Date;
}

export interface RawArtistStats {
    mbid: string;
    payloadJson: Json;
    tsUtc: Date;
}

export type SimilarActivityEntity = 'artists' | 'releases' | 'recordings';

export interface RawSimilarUserActivity {
    payloadId: string;
    fromUsername: string;
    toUsername: string;
    // Payloads of other kinds may land here; staging keeps the three above
    entity: string;
    timeRange: string;
    userSimilarity: number;
    jsonData: Json;
    insertTsUtc: Date;
}

export interface RawCollaborativeScore {
    artistMbidA: string;
    artistMbidB: string;
    scoreValue: number;
    insertTsUtc: Date;
}

export interface RawPlaylistCollection {
    collectionId: string;
    collectionName: string;
    username: string;
    createdAt: Date;
}

export interface RawPlaylistItem {
    playlistId: string;
    collectionId: string;
    collectionOrderIndex: number;
    title: string | null;
    playlist: Json;
    createdAt: Date;
}

export interface SourceRowMap {
    listenbrainz_listens: RawListen;
    listenbrainz_user_feedback: RawFeedback;
    local_music_files: RawLocalFile;
    local_music_embeddings: RawEmbedding;
    messybrainz_name_map: RawNameMap;
    musicbrainz_annotations: RawAnnotation;
    listenbrainz_artist_stats: RawArtistStats;
    listenbrainz_similar_user_activity: RawSimilarUserActivity;
    listenbrainz_collaborative_filtering_scores: RawCollaborativeScore;
    playlist_collections: RawPlaylistCollection;
    playlist_collection_items: RawPlaylistItem;
}

export type SourceName = keyof SourceRowMap;

export const SOURCE_NAMES: readonly SourceName[] = [
    'listenbrainz_listens',
    'listenbrainz_user_feedback',
    'local_music_files',
    'local_music_embeddings',
    'messybrainz_name_map',
    'musicbrainz_annotations',
    'listenbrainz_artist_stats',
    'listenbrainz_similar_user_activity',
    'listenbrainz_collaborative_filtering_scores',
    'playlist_collections',
    'playlist_collection_items',
];
