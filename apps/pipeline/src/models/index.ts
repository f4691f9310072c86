import type { AnyModel } from '../pipeline/model';
import { dailyListenStatsModel } from './analytics/daily-listen-stats';
import { unmappedListensModel } from './analytics/unmapped-listens';
import { lovedTracksModel } from './collections/loved-tracks';
import { playlistFileCountsModel } from './collections/playlist-file-counts';
import { trackPlaySpikesModel } from './collections/track-play-spikes';
import { contentKeysModel } from './identity/content-keys';
import {
    mapFileArtistModel,
    mapFileRecordingModel,
    mapFileReleaseGroupModel,
    mapFileReleaseModel,
    mapRecordingReleaseModel,
    mapReleaseGroupArtistModel,
} from './identity/maps';
import { mbidsModel } from './identity/mbids';
import { artistRecommendsModel } from './recommend/artist-recommends';
import { freshReleasesModel } from './recommend/fresh-releases';
import { libraryReleaseAdditionsModel } from './recommend/library-release-additions';
import { similarUserRecommendsModel } from './recommend/similar-user-recommends';
import { fileListenCountsModel } from './scoring/file-listen-counts';
import {
    artistListenCountsModel,
    recordingListenCountsModel,
    releaseGroupListenCountsModel,
    releaseListenCountsModel,
} from './scoring/listen-counts';
import { listenRecencyModel } from './scoring/listen-recency';
import { revisitReleasesModel, revisitTracksModel } from './scoring/revisit';
import { artistStatsModel, cfScoresModel, similarUserActivityModel } from './staging/activity';
import {
    catalogArtistsModel,
    catalogRecordingsModel,
    catalogReleaseGroupsModel,
    catalogReleasesModel,
} from './staging/catalog';
import { feedbackModel } from './staging/feedback';
import { listensModel } from './staging/listens';
import { localFilesModel } from './staging/local-files';
import { nameMapModel } from './staging/name-map';
import { playlistTracksModel } from './staging/playlists';

export const STAGING_MODELS: readonly AnyModel[] = [
    listensModel,
    feedbackModel,
    localFilesModel,
    nameMapModel,
    catalogArtistsModel,
    catalogRecordingsModel,
    catalogReleasesModel,
    catalogReleaseGroupsModel,
    similarUserActivityModel,
    artistStatsModel,
    cfScoresModel,
    playlistTracksModel,
];

export const IDENTITY_MODELS: readonly AnyModel[] = [
    contentKeysModel,
    mbidsModel,
    mapFileRecordingModel,
    mapFileReleaseModel,
    mapFileReleaseGroupModel,
    mapFileArtistModel,
    mapRecordingReleaseModel,
    mapReleaseGroupArtistModel,
];

export const SCORING_MODELS: readonly AnyModel[] = [
    listenRecencyModel,
    recordingListenCountsModel,
    releaseListenCountsModel,
    releaseGroupListenCountsModel,
    artistListenCountsModel,
    revisitReleasesModel,
    revisitTracksModel,
    fileListenCountsModel,
];

export const RECOMMEND_MODELS: readonly AnyModel[] = [
    similarUserRecommendsModel,
    freshReleasesModel,
    artistRecommendsModel,
    libraryReleaseAdditionsModel,
];

export const COLLECTION_MODELS: readonly AnyModel[] = [
    playlistFileCountsModel,
    trackPlaySpikesModel,
    lovedTracksModel,
    unmappedListensModel,
    dailyListenStatsModel,
];

export const ALL_MODELS: readonly AnyModel[] = [
    ...STAGING_MODELS,
    ...IDENTITY_MODELS,
    ...SCORING_MODELS,
    ...RECOMMEND_MODELS,
    ...COLLECTION_MODELS,
];
