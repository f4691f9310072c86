import type { SourceName, SourceRowMap } from '../types/sources';
import type * as M from '../types/models';
import { MissingDependencyError } from '../lib/errors';

export interface ModelRowMap {
    // staging
    listens: M.ListenRow;
    feedback: M.FeedbackRow;
    local_files: M.LocalFileRow;
    name_map: M.NameMapRow;
    catalog_artists: M.CatalogArtistRow;
    catalog_recordings: M.CatalogRecordingRow;
    catalog_releases: M.CatalogReleaseRow;
    catalog_release_groups: M.CatalogReleaseGroupRow;
    similar_user_activity: M.SimilarUserActivityRow;
    artist_stats: M.ArtistStatsRow;
    cf_scores: M.CollaborativeScoreRow;
    playlist_tracks: M.PlaylistTrackRow;
    // identity
    content_keys: M.ContentKeyRow;
    mbids: M.MbidRow;
    map_file_recording: M.FileMappingRow;
    map_file_release: M.FileMappingRow;
    map_file_release_group: M.FileMappingRow;
    map_file_artist: M.FileMappingRow;
    map_recording_release: M.RecordingReleaseRow;
    map_release_group_artist: M.ReleaseGroupArtistRow;
    // scoring
    listen_recency: M.ListenRecencyRow;
    recording_listen_counts: M.RecordingListenCountRow;
    release_listen_counts: M.ReleaseListenCountRow;
    release_group_listen_counts: M.ReleaseGroupListenCountRow;
    artist_listen_counts: M.ArtistListenCountRow;
    revisit_releases: M.RevisitReleaseRow;
    revisit_tracks: M.RevisitTrackRow;
    file_listen_counts: M.FileListenCountRow;
    // recommendations
    similar_user_recommends: M.SimilarUserRecommendRow;
    fresh_releases: M.FreshReleaseRow;
    artist_recommends: M.ArtistRecommendRow;
    library_release_additions: M.LibraryReleaseAdditionRow;
    // collections and listen analytics
    playlist_file_counts: M.PlaylistFileCountRow;
    track_play_spikes: M.TrackPlaySpikeRow;
    loved_tracks: M.LovedTrackRow;
    unmapped_listens: M.UnmappedListenRow;
    daily_listen_stats: M.DailyListenStatsRow;
}

export type ModelName = keyof ModelRowMap;
export type TableRowMap = SourceRowMap & ModelRowMap;
export type TableName = SourceName | ModelName;

type Tables = { [K in TableName]?: readonly TableRowMap[K][] };

// Read access restricted to a set of table names
export interface TableReader<D extends TableName> {
    get<K extends D>(name: K): readonly TableRowMap[K][];
}

/**
 * Every table materialized so far in a run, sources included. Rows are
 * handed out read-only; models always build new arrays.
 */
export class TableSet implements TableReader<TableName> {
    private readonly tables: Tables = {};
    private readonly loaded = new Set<TableName>();

    set<K extends TableName>(name: K, rows: readonly TableRowMap[K][]): this {
        const slot: { [P in K]?: readonly TableRowMap[P][] } = this.tables;
        slot[name] = rows;
        this.loaded.add(name);
        return this;
    }

    has(name: TableName): boolean {
        return this.tables[name] !== undefined;
    }

    get<K extends TableName>(name: K): readonly TableRowMap[K][] {
        const rows: readonly TableRowMap[K][] | undefined = this.tables[name];
        if (rows === undefined) {
            throw new MissingDependencyError('<run>', name);
        }
        return rows;
    }

    names(): TableName[] {
        return [...this.loaded].sort();
    }
}
