import { createHash } from 'crypto';

export type ContentKeyKind = 'track' | 'album' | 'artist' | 'recording';

// Separates tuple members so ("ab", "c") and ("a", "bc") never collide
const FIELD_SEPARATOR = '\u001f';

export function normalizeName(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const normalized = value.trim().toLowerCase();
    return normalized.length > 0 ? normalized : null;
}

export function md5(...parts: string[]): string {
    return createHash('md5').update(parts.join(FIELD_SEPARATOR)).digest('hex');
}

/**
 * Hash of a normalized name tuple, tagged with the tuple kind.
 *
 * Returns null as soon as one component is missing: a track cannot be keyed
 * without both its title and its artist.
 */
export function contentKey(
    kind: ContentKeyKind,
    parts: ReadonlyArray<string | null | undefined>
): string | null {
    const normalized: string[] = [];
    for (const part of parts) {
        const value = normalizeName(part);
        if (value === null) return null;
        normalized.push(value);
    }
    return md5(kind, ...normalized);
}

export function trackKey(track: string | null, artist: string | null): string | null {
    return contentKey('track', [track, artist]);
}

export function albumKey(album: string | null, artist: string | null): string | null {
    return contentKey('album', [album, artist]);
}

export function artistKey(artist: string | null): string | null {
    return contentKey('artist', [artist]);
}

// Key shared with the external name-matching job; album is part of it because
// the same title and artist on two releases can resolve to different recordings.
export function recordingKey(
    track: string | null,
    artist: string | null,
    album: string | null
): string | null {
    return contentKey('recording', [track, artist, album]);
}
