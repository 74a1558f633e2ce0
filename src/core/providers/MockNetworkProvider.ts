import type { LyricsProvider, LyricsQuery } from "../interfaces/LyricsProvider";
import type { LyricsCandidate } from "../interfaces/LyricsCandidate";
import { isSameName } from "../utils/Levenshtein";
import { ServiceUnavailableError } from "../utils/Errors";

/**
 * In-process stand-in for a lyrics service. Answers from a fixed catalog the
 * way LRCLIB filters: title always, artist and album when given.
 */
export class MockNetworkProvider implements LyricsProvider {
    public name = "MockNetwork";

    /** Every query received, in order. */
    public readonly queries: LyricsQuery[] = [];

    private unavailable = false;

    constructor(private readonly catalog: LyricsCandidate[] = [], private readonly delayMs: number = 0) { }

    public setUnavailable(unavailable: boolean) {
        this.unavailable = unavailable;
    }

    public async lookup(query: LyricsQuery): Promise<LyricsCandidate[]> {
        this.queries.push(query);

        if (this.delayMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.delayMs));
        }
        if (this.unavailable) {
            throw new ServiceUnavailableError(`${this.name} is offline`, 503);
        }

        return this.catalog.filter(entry =>
            isSameName(entry.sourceTitle, query.title)
            && (!query.artist || isSameName(entry.sourceArtist, query.artist))
            && (!query.album || (entry.sourceAlbum !== undefined && isSameName(entry.sourceAlbum, query.album)))
        );
    }
}
