import { jsonArray, jsonText } from '../../lib/payload';
import { asc, indexBy, latestBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { PlaylistTrackRow } from '../../types/models';

export const playlistTracksModel = defineModel({
    name: 'playlist_tracks',
    description: 'One row per file reference in each stored playlist',
    deps: ['playlist_collections', 'playlist_collection_items'],
    materialized: 'table',
    uniqueKey: (row) => `${row.playlistId}:${row.position}`,
    build(_ctx, input) {
        const collections = indexBy(
            latestBy(
                input.get('playlist_collections'),
                (row) => row.collectionId,
                (row) => row.createdAt
            ),
            (row) => row.collectionId
        );
        const playlists = latestBy(
            input.get('playlist_collection_items'),
            (row) => row.playlistId,
            (row) => row.createdAt
        );

        const rows: PlaylistTrackRow[] = [];
        for (const playlist of playlists) {
            const collection = collections.get(playlist.collectionId);
            if (!collection) continue;

            jsonArray(playlist.playlist, []).forEach((track, position) => {
                const filepath = jsonText(track, ['filepath']);
                if (filepath === null) return;
                rows.push({
                    username: collection.username,
                    collectionId: collection.collectionId,
                    collectionName: collection.collectionName,
                    playlistId: playlist.playlistId,
                    playlistTitle: playlist.title,
                    position,
                    filepath,
                });
            });
        }

        return sortRows(
            rows,
            asc((row) => row.playlistId),
            asc((row) => row.position)
        );
    },
});
