import { albumKey, artistKey, recordingKey, trackKey } from '../../lib/content-key';
import { extractYear, jsonNumber, jsonText, tryCastUuid } from '../../lib/payload';
import { asc, indexBy, latestBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { LocalFileRow } from '../../types/models';

function earliest(a: Date | null, b: Date | null): Date | null {
    if (a === null) return b;
    if (b === null) return a;
    return a.getTime() <= b.getTime() ? a : b;
}

export const localFilesModel = defineModel({
    name: 'local_files',
    description: 'Latest tag snapshot per library file, with embedding status',
    deps: ['local_music_files', 'local_music_embeddings'],
    materialized: 'table',
    uniqueKey: (row) => row.filepath,
    build(_ctx, input) {
        const files = latestBy(
            input.get('local_music_files'),
            (row) => row.filepath,
            (row) => row.insertTsUtc
        );
        const embeddings = indexBy(
            latestBy(
                input.get('local_music_embeddings'),
                (row) => row.filepath,
                (row) => row.insertTsUtc
            ),
            (row) => row.filepath
        );

        const rows = files.map((file): LocalFileRow => {
            const tags = file.jsonData;
            const trackName = jsonText(tags, ['title']);
            const albumName = jsonText(tags, ['album']);
            const artistName = jsonText(tags, ['artist']);
            const trackDate = jsonText(tags, ['date']);
            const embedding = embeddings.get(file.filepath);

            return {
                filepath: file.filepath,
                fileCreatedAt: earliest(file.fileCreatedAt, file.fileModifiedAt),
                trackName,
                albumName,
                artistName,
                albumArtistName: jsonText(tags, ['album_artist']),
                trackDate,
                trackYear: extractYear(trackDate),
                trackLengthSeconds: jsonNumber(tags, ['length']),
                recordingMbid: tryCastUuid(jsonText(tags, ['musicbrainz_trackid'])),
                releaseMbid: tryCastUuid(jsonText(tags, ['musicbrainz_albumid'])),
                releaseGroupMbid: tryCastUuid(jsonText(tags, ['musicbrainz_releasegroupid'])),
                artistMbid: tryCastUuid(jsonText(tags, ['musicbrainz_artistid'])),
                albumArtistMbid: tryCastUuid(jsonText(tags, ['musicbrainz_albumartistid'])),
                recordingKey: recordingKey(trackName, artistName, albumName),
                trackKey: trackKey(trackName, artistName),
                albumKey: albumKey(albumName, artistName),
                artistKey: artistKey(artistName),
                embeddingSuccess: embedding ? embedding.success : null,
                embeddingDurationSeconds: embedding ? embedding.durationSeconds : null,
            };
        });

        return sortRows(rows, asc((row) => row.filepath));
    },
});
