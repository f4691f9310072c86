// Row contracts of the derived tables, grouped the way the models are

export type CatalogEntity = 'artist' | 'recording' | 'release' | 'release-group';
export type ActivityEntity = 'artist' | 'recording' | 'release';
export type MappingPath = 'direct' | 'indirect' | 'transitive';

// --- staging ---------------------------------------------------------------

export interface ListenRow {
    listenMd5: string;
    username: string;
    listenedAt: Date;
    recordingMsid: string | null;
    trackName: string | null;
    artistName: string | null;
    releaseName: string | null;
    recordingMbid: string | null;
    releaseMbid: string | null;
    artistMbids: string[];
    durationMs: number | null;
    trackNumber: number | null;
    recordingKey: string | null;
    trackKey: string | null;
    albumKey: string | null;
    artistKey: string | null;
}

export interface FeedbackRow {
    feedbackMd5: string;
    username: string;
    score: number;
    recordingMbid: string | null;
    feedbackAt: Date;
}

export interface LocalFileRow {
    filepath: string;
    fileCreatedAt: Date | null;
    trackName: string | null;
    albumName: string | null;
    artistName: string | null;
    albumArtistName: string | null;
    trackDate: string | null;
    trackYear: number | null;
    trackLengthSeconds: number | null;
    recordingMbid: string | null;
    releaseMbid: string | null;
    releaseGroupMbid: string | null;
    artistMbid: string | null;
    albumArtistMbid: string | null;
    recordingKey: string | null;
    trackKey: string | null;
    albumKey: string | null;
    artistKey: string | null;
    embeddingSuccess: boolean | null;
    embeddingDurationSeconds: number | null;
}

export interface NameMapRow {
    recordingKey: string;
    recordingName: string | null;
    artistName: string | null;
    recordingMbid: string | null;
    releaseMbid: string | null;
    releaseGroupMbid: string | null;
    artistMbids: string[];
    mappedRecordingName: string | null;
    mappedReleaseName: string | null;
    mappedArtistName: string | null;
    insertedAt: Date;
}

export interface CatalogArtistRow {
    artistMbid: string;
    artistName: string | null;
    artistType: string | null;
    releaseMbids: string[];
    annotatedAt: Date;
}

export interface CatalogRecordingRow {
    recordingMbid: string;
    recordingTitle: string | null;
    recordingLengthMs: number | null;
    artistCreditPhrase: string | null;
    artistMbid: string | null;
    releaseMbids: string[];
    releaseYear: number | null;
    annotatedAt: Date;
}

export interface CatalogReleaseRow {
    releaseMbid: string;
    releaseTitle: string | null;
    releaseGroupMbid: string | null;
    releaseDate: string | null;
    releaseYear: number | null;
    releaseStatus: string | null;
    artistCreditPhrase: string | null;
    artistMbids: string[];
    annotatedAt: Date;
}

export interface CatalogReleaseGroupRow {
    releaseGroupMbid: string;
    releaseGroupTitle: string | null;
    firstReleaseDate: string | null;
    releaseGroupYear: number | null;
    primaryType: string | null;
    artistCreditPhrase: string | null;
    artistMbids: string[];
    annotatedAt: Date;
}

export interface SimilarUserActivityRow {
    activityId: string;
    payloadId: string;
    entity: ActivityEntity;
    mbid: string;
    listenCount: number;
    fromUsername: string;
    toUsername: string;
    userSimilarity: number;
    timeRange: string;
    activityFrom: Date | null;
    activityTo: Date | null;
}

export interface ArtistStatsRow {
    artistMbid: string;
    artistName: string | null;
    statsRange: string | null;
    totalListenCount: number;
    totalUserCount: number | null;
    lastUpdated: Date | null;
}

export interface CollaborativeScoreRow {
    artistMbidA: string;
    artistMbidB: string;
    score: number;
}

export interface PlaylistTrackRow {
    username: string;
    collectionId: string;
    collectionName: string;
    playlistId: string;
    playlistTitle: string | null;
    position: number;
    filepath: string;
}

// --- identity --------------------------------------------------------------

export interface ContentKeyRow {
    kind: 'track' | 'album' | 'artist';
    key: string;
    trackName: string | null;
    albumName: string | null;
    artistName: string;
    firstSeenAt: Date | null;
    observedIn: Array<'listen' | 'local_file'>;
}

export interface MbidRow {
    entity: CatalogEntity;
    mbid: string;
}

export interface FileMappingRow {
    filepath: string;
    mbid: string;
    paths: MappingPath[];
}

export interface RecordingReleaseRow {
    recordingMbid: string;
    releaseMbid: string;
    releaseGroupMbid: string | null;
}

export interface ReleaseGroupArtistRow {
    releaseGroupMbid: string;
    artistMbid: string;
}

// --- scoring ---------------------------------------------------------------

export interface ListenRecencyRow {
    listenMd5: string;
    username: string;
    listenedAt: Date;
    recordingMbid: string;
    releaseMbid: string;
    releaseGroupMbid: string | null;
    artistMbids: string[];
    trackName: string | null;
    releaseName: string | null;
    artistName: string | null;
    recencyDays: number;
    recencyPct: number;
    invRecencyPct: number;
}

export interface WindowCounts {
    days: number;
    listenCount: number;
    recordingCount: number;
    releaseCount: number;
}

export interface ListenStats {
    username: string;
    recencyDays: number;
    avgRecencyDays: number;
    recencyScore: number;
    revisitScore: number;
    lifetimeListenCount: number;
    lifetimeRecordingCount: number;
    lifetimeReleaseCount: number;
    lifetimeReleaseGroupCount: number;
    windows: WindowCounts[];
}

export interface RecordingListenCountRow extends ListenStats {
    userRecordingKey: string;
    recordingMbid: string;
    recordingTitle: string | null;
    artistCreditPhrase: string | null;
}

export interface ReleaseListenCountRow extends ListenStats {
    userReleaseKey: string;
    releaseMbid: string;
    releaseTitle: string | null;
    artistCreditPhrase: string | null;
}

export interface ReleaseGroupListenCountRow extends ListenStats {
    userReleaseGroupKey: string;
    releaseGroupMbid: string;
    releaseGroupTitle: string | null;
    artistCreditPhrase: string | null;
}

export interface ArtistListenCountRow extends ListenStats {
    userArtistKey: string;
    artistMbid: string;
    artistName: string | null;
}

export interface RevisitReleaseRow {
    username: string;
    rank: number;
    releaseGroupMbid: string;
    releaseGroupTitle: string | null;
    artistName: string | null;
    revisitScore: number;
    numRecordings: number;
    listensOld: number;
    listensRecent: number;
}

export interface RevisitTrackRow {
    username: string;
    rank: number;
    recordingMbid: string;
    filepath: string;
    recordingTitle: string | null;
    artistName: string | null;
    artistMbid: string | null;
    albumArtistMbid: string | null;
    revisitScore: number;
    listensOld: number;
    listensRecent: number;
}

export interface FileListenCountRow {
    filepathUsernameId: string;
    filepath: string;
    username: string;
    trackName: string | null;
    albumName: string | null;
    artistName: string | null;
    albumArtistName: string | null;
    lifetimeListenCount: number;
    windows: Array<{ days: number; listenCount: number }>;
}

// --- recommendations -------------------------------------------------------

export interface SimilarUserRecommendRow {
    username: string;
    timeRange: string;
    entity: ActivityEntity;
    mbid: string;
    score: number;
    rank: number;
}

export interface FreshReleaseRow {
    username: string;
    timeRange: string;
    rank: number;
    releaseMbid: string;
    releaseGroupMbid: string | null;
    releaseTitle: string | null;
    artistCreditPhrase: string | null;
    score: number;
}

export interface ArtistRecommendRow {
    username: string;
    timeRange: string;
    rank: number;
    artistMbid: string;
    artistName: string | null;
    similarity: number;
    novelty: number;
    score: number;
}

export interface LibraryReleaseAdditionRow {
    username: string;
    timeRange: string;
    rank: number;
    releaseGroupMbid: string;
    releaseGroupTitle: string | null;
    artistCreditPhrase: string | null;
    score: number;
}

// --- collections and listen analytics ---------------------------------------

export interface PlaylistFileCountRow {
    username: string;
    filepath: string;
    trackName: string | null;
    albumName: string | null;
    artistName: string | null;
    albumArtistName: string | null;
    playlistCount: number;
    collectionNames: string[];
}

export interface TrackPlaySpikeRow {
    startListenMd5: string;
    username: string;
    recordingMbid: string;
    periodStartAt: Date;
    nextPeriodListenCount: number;
    trackName: string | null;
    releaseName: string | null;
    artistName: string | null;
}

export interface LovedTrackRow {
    username: string;
    recordingMbid: string;
    filepath: string;
    lovedAt: Date;
}

export interface UnmappedListenRow {
    listenMd5: string;
    username: string;
    listenedAt: Date;
    recordingMbid: string;
    trackName: string | null;
    artistName: string | null;
    releaseName: string | null;
}

export interface DailyListenStatsRow {
    userDateKey: string;
    username: string;
    date: string;
    listenCount: number;
    pctListensMappedToFile: number;
    recordingCount: number;
    releaseCount: number;
    listenHours: number;
}
