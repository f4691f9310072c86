import { MultiMap } from '../../lib/multimap';
import { defineModel } from '../../pipeline/model';
import type { CatalogEntity, MbidRow } from '../../types/models';

const ENTITY_ORDER: readonly CatalogEntity[] = ['artist', 'recording', 'release', 'release-group'];

function present(values: ReadonlyArray<string | null>): string[] {
    return values.filter((value): value is string => value !== null);
}

/**
 * Every catalog id known from any source, one row per (entity, id). This is
 * the work list for the external annotator; ids it has not annotated yet
 * still belong here.
 */
export const mbidsModel = defineModel({
    name: 'mbids',
    description: 'All known catalog ids per entity kind',
    deps: [
        'listens',
        'feedback',
        'local_files',
        'name_map',
        'similar_user_activity',
        'catalog_artists',
        'catalog_releases',
    ],
    materialized: 'table',
    uniqueKey: (row) => `${row.entity}:${row.mbid}`,
    build(_ctx, input) {
        const ids = new MultiMap<string>();
        const listens = input.get('listens');
        const files = input.get('local_files');
        const nameMap = input.get('name_map');

        ids.addAll('recording', present(listens.map((row) => row.recordingMbid)));
        ids.addAll('recording', present(input.get('feedback').map((row) => row.recordingMbid)));
        ids.addAll('recording', present(files.map((row) => row.recordingMbid)));
        ids.addAll('recording', present(nameMap.map((row) => row.recordingMbid)));

        ids.addAll('release', present(listens.map((row) => row.releaseMbid)));
        ids.addAll('release', present(files.map((row) => row.releaseMbid)));
        ids.addAll('release', present(nameMap.map((row) => row.releaseMbid)));
        // Known only once an artist is annotated; lets new releases of library artists surface
        ids.addAll('release', input.get('catalog_artists').flatMap((row) => row.releaseMbids));

        ids.addAll('release-group', present(files.map((row) => row.releaseGroupMbid)));
        ids.addAll('release-group', present(nameMap.map((row) => row.releaseGroupMbid)));
        ids.addAll('release-group', present(input.get('catalog_releases').map((row) => row.releaseGroupMbid)));

        ids.addAll('artist', listens.flatMap((row) => row.artistMbids));
        ids.addAll('artist', present(files.map((row) => row.artistMbid)));
        ids.addAll('artist', present(files.map((row) => row.albumArtistMbid)));
        ids.addAll('artist', nameMap.flatMap((row) => row.artistMbids));

        for (const activity of input.get('similar_user_activity')) {
            ids.add(activity.entity, activity.mbid);
        }

        return ENTITY_ORDER.flatMap((entity) =>
            ids.get(entity).map((mbid): MbidRow => ({ entity, mbid }))
        );
    },
});
