import type { LyricsQuery } from "../interfaces/LyricsProvider";
import type { NormalizedTitle } from "../interfaces/NormalizedTitle";
import { isSameName } from "./Levenshtein";
import { splitOnLastSeparator } from "../services/TitleNormalizer";

export type LookupStepKind = 'artist-title-album' | 'artist-title' | 'swapped' | 'title';

/**
 * One query of the degradation path.
 */
export interface LookupStep {
    kind: LookupStepKind;
    query: LyricsQuery;

    /**
     * Artist used to break ranking ties. Title-only lookups keep the
     * known artist here even though the query drops it.
     */
    rankingArtist?: string;
}

export class SearchQueryResolver {
    /**
     * Builds the ordered list of lookups for a track, most specific first:
     * 1. artist + title + album
     * 2. artist + title
     * 3. title and artist swapped, when the artist was only guessed from "X - Y"
     * 4. title alone
     * When the session reports an artist but the title still reads "X - Y"
     * (a re-upload tagged with the uploader's channel), the pair parsed from
     * the title is tried too, before the reported artist for modified titles.
     * Steps that need a missing field are skipped and duplicates removed.
     */
    public plan(title: NormalizedTitle, album?: string): LookupStep[] {
        const artist = title.artist?.trim() || undefined;
        const cleanAlbum = album?.trim() || undefined;

        const reported: LookupStep[] = [];
        if (artist && cleanAlbum) {
            reported.push({
                kind: 'artist-title-album',
                query: { title: title.cleanTitle, artist, album: cleanAlbum },
                rankingArtist: artist
            });
        }
        if (artist) {
            reported.push({ kind: 'artist-title', query: { title: title.cleanTitle, artist }, rankingArtist: artist });
        }

        // "Song - Artist" uploads are as common as "Artist - Song"
        if (artist && title.artistSource === 'title') {
            reported.push(...swapped(artist, title.cleanTitle));
        }

        const split = title.artistSource === 'metadata' ? splitOnLastSeparator(title.cleanTitle) : null;
        const parsed: LookupStep[] = split
            ? [
                { kind: 'artist-title', query: { title: split.title, artist: split.artist }, rankingArtist: split.artist },
                ...swapped(split.artist, split.title)
            ]
            : [];

        // Slowed uploads are mostly re-uploads, so their reported artist is the least trustworthy
        const steps = title.isModified ? [...parsed, ...reported] : [...reported, ...parsed];

        if (!artist && cleanAlbum) {
            steps.push({ kind: 'title', query: { title: title.cleanTitle, album: cleanAlbum } });
        }
        steps.push({ kind: 'title', query: { title: title.cleanTitle }, rankingArtist: artist });
        if (split) {
            steps.push({ kind: 'title', query: { title: split.title }, rankingArtist: split.artist });
        }

        return dedupe(steps);
    }
}

function swapped(artist: string, title: string): LookupStep[] {
    if (isSameName(artist, title)) return [];
    return [{ kind: 'swapped', query: { title: artist, artist: title }, rankingArtist: title }];
}

function dedupe(steps: LookupStep[]): LookupStep[] {
    const seen = new Set<string>();
    return steps.filter(step => {
        const key = [step.query.title, step.query.artist ?? '', step.query.album ?? ''].join('\u0000');
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}
