import { extractYear, jsonArray, jsonBool, jsonInt, jsonText, tryCastUuid, uuidList } from '../../lib/payload';
import type { JsonPath } from '../../lib/payload';
import { asc, latestBy, sortRows } from '../../lib/rows';
import { defineModel } from '../../pipeline/model';
import type { Json, RawAnnotation } from '../../types/sources';
import type { CatalogEntity } from '../../types/models';

interface Annotation {
    mbid: string;
    data: Json;
    annotatedAt: Date;
}

// Latest successful annotation per id of one entity kind
function annotations(rows: readonly RawAnnotation[], entity: CatalogEntity): Annotation[] {
    const successful = rows.filter(
        (row) => row.entity === entity && jsonBool(row.payloadJson, ['_success'])
    );
    const found: Annotation[] = [];
    for (const row of latestBy(successful, (r) => r.mbid, (r) => r.tsUtc)) {
        const mbid = tryCastUuid(row.mbid);
        const data = row.payloadJson;
        if (mbid !== null) found.push({ mbid, data, annotatedAt: row.tsUtc });
    }
    return found;
}

// Credit lists mix credit objects with join phrases such as " & "
function creditedArtists(data: Json, path: JsonPath): string[] {
    return uuidList(jsonArray(data, path).map((credit) => jsonText(credit, ['artist', 'id'])));
}

function listedIds(data: Json, path: JsonPath): string[] {
    return uuidList(jsonArray(data, path).map((item) => jsonText(item, ['id'])));
}

export const catalogArtistsModel = defineModel({
    name: 'catalog_artists',
    description: 'Annotated artists with their known releases',
    deps: ['musicbrainz_annotations'],
    materialized: 'table',
    uniqueKey: (row) => row.artistMbid,
    build(_ctx, input) {
        const rows = annotations(input.get('musicbrainz_annotations'), 'artist').map(
            ({ mbid, data, annotatedAt }) => ({
                artistMbid: mbid,
                artistName: jsonText(data, ['data', 'artist', 'name']),
                artistType: jsonText(data, ['data', 'artist', 'type']),
                releaseMbids: listedIds(data, ['data', 'artist', 'release-list']),
                annotatedAt,
            })
        );
        return sortRows(rows, asc((row) => row.artistMbid));
    },
});

export const catalogRecordingsModel = defineModel({
    name: 'catalog_recordings',
    description: 'Annotated recordings with the releases they appear on',
    deps: ['musicbrainz_annotations'],
    materialized: 'table',
    uniqueKey: (row) => row.recordingMbid,
    build(_ctx, input) {
        const rows = annotations(input.get('musicbrainz_annotations'), 'recording').map(
            ({ mbid, data, annotatedAt }) => {
                const releases = jsonArray(data, ['data', 'recording', 'release-list']);
                const years = releases
                    .map((release) => extractYear(jsonText(release, ['date'])))
                    .filter((year): year is number => year !== null);
                const artists = creditedArtists(data, ['data', 'recording', 'artist-credit']);

                return {
                    recordingMbid: mbid,
                    recordingTitle: jsonText(data, ['data', 'recording', 'title']),
                    recordingLengthMs: jsonInt(data, ['data', 'recording', 'length']),
                    artistCreditPhrase: jsonText(data, ['data', 'recording', 'artist-credit-phrase']),
                    artistMbid: artists.length > 0 ? artists[0] : null,
                    releaseMbids: listedIds(data, ['data', 'recording', 'release-list']),
                    releaseYear: years.length > 0 ? Math.min(...years) : null,
                    annotatedAt,
                };
            }
        );
        return sortRows(rows, asc((row) => row.recordingMbid));
    },
});

export const catalogReleasesModel = defineModel({
    name: 'catalog_releases',
    description: 'Annotated releases with their release group and credited artists',
    deps: ['musicbrainz_annotations'],
    materialized: 'table',
    uniqueKey: (row) => row.releaseMbid,
    build(_ctx, input) {
        const rows = annotations(input.get('musicbrainz_annotations'), 'release').map(
            ({ mbid, data, annotatedAt }) => {
                const releaseDate = jsonText(data, ['data', 'release', 'date']);
                return {
                    releaseMbid: mbid,
                    releaseTitle: jsonText(data, ['data', 'release', 'title']),
                    releaseGroupMbid: tryCastUuid(jsonText(data, ['data', 'release', 'release-group', 'id'])),
                    releaseDate,
                    releaseYear: extractYear(releaseDate),
                    releaseStatus: jsonText(data, ['data', 'release', 'status']),
                    artistCreditPhrase: jsonText(data, ['data', 'release', 'artist-credit-phrase']),
                    artistMbids: creditedArtists(data, ['data', 'release', 'artist-credit']),
                    annotatedAt,
                };
            }
        );
        return sortRows(rows, asc((row) => row.releaseMbid));
    },
});

export const catalogReleaseGroupsModel = defineModel({
    name: 'catalog_release_groups',
    description: 'Annotated release groups with their credited artists',
    deps: ['musicbrainz_annotations'],
    materialized: 'table',
    uniqueKey: (row) => row.releaseGroupMbid,
    build(_ctx, input) {
        const rows = annotations(input.get('musicbrainz_annotations'), 'release-group').map(
            ({ mbid, data, annotatedAt }) => {
                const firstReleaseDate = jsonText(data, ['data', 'release-group', 'first-release-date']);
                return {
                    releaseGroupMbid: mbid,
                    releaseGroupTitle: jsonText(data, ['data', 'release-group', 'title']),
                    firstReleaseDate,
                    releaseGroupYear: extractYear(firstReleaseDate),
                    primaryType: jsonText(data, ['data', 'release-group', 'primary-type']),
                    artistCreditPhrase: jsonText(data, ['data', 'release-group', 'artist-credit-phrase']),
                    artistMbids: creditedArtists(data, ['data', 'release-group', 'artist-credit']),
                    annotatedAt,
                };
            }
        );
        return sortRows(rows, asc((row) => row.releaseGroupMbid));
    },
});
