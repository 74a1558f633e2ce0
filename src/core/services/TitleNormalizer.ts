import type { DecorationRule, NormalizedTitle } from "../interfaces/NormalizedTitle";
import { DEFAULT_DECORATION_RULES } from "../config/decorationRules";
import { ErrorCode } from "../utils/Errors";
import { Logger } from "../utils/Logger";

const MAX_PASSES = 8;

// " - ", "–", "—"
const SEPARATOR_REGEX = /\s+-\s+|\s*[–—]\s*/g;
const EMPTY_BRACKETS = /[(\[{]\s*[)\]}]/g;
const LEADING_JUNK = /^[\s"“”«»~|/:\-–—)\]}]+/;
const TRAILING_JUNK = /[\s"“”«»~|/:\-–—([{]+$/;

interface CompiledRule {
    rule: DecorationRule;
    regex: RegExp;
}

/**
 * Recovers the original song identity from a decorated title such as
 * "Artist - Song (Slowed + Reverb)". Pure: same input, same output.
 */
export class TitleNormalizer {
    private readonly rules: CompiledRule[];

    constructor(rules: readonly DecorationRule[] = DEFAULT_DECORATION_RULES) {
        this.rules = rules.map(rule => ({ rule, regex: new RegExp(rule.pattern, 'gi') }));
    }

    public normalize(rawTitle: string, rawArtist?: string): NormalizedTitle {
        // Fullwidth forms (ｓｌｏｗｅｄ) fold to ASCII here
        let title = rawTitle.normalize('NFKC');
        let isModified = false;
        let tempoRatio: number | undefined;

        for (let pass = 0; pass < MAX_PASSES; pass++) {
            const before = title;
            for (const { rule, regex } of this.rules) {
                const stripped = title.replace(regex, ' ');
                if (stripped === title) continue;

                title = stripped;
                if (rule.modifiesTempo) {
                    isModified = true;
                    if (tempoRatio === undefined) tempoRatio = rule.tempoRatio;
                }
            }
            title = tidy(title);
            if (title === before) break;
        }

        if (!title) {
            Logger.warn(`[Normalizer] ${ErrorCode.TITLE_UNPARSEABLE}: nothing left of "${rawTitle}", using it as-is`);
            title = tidy(rawTitle.normalize('NFKC')) || rawTitle;
            // Searching for the raw string, so nothing was taken off it
            isModified = false;
            tempoRatio = undefined;
        }

        const artist = rawArtist?.trim();
        if (artist) {
            return { cleanTitle: title, artist, artistSource: 'metadata', isModified, tempoRatio };
        }

        const split = splitOnLastSeparator(title);
        if (split) {
            return { cleanTitle: split.title, artist: split.artist, artistSource: 'title', isModified, tempoRatio };
        }

        return { cleanTitle: title, artistSource: 'none', isModified, tempoRatio };
    }
}

function tidy(value: string): string {
    let current = value;
    let previous: string;
    do {
        previous = current;
        current = current
            .replace(EMPTY_BRACKETS, ' ')
            .replace(LEADING_JUNK, '')
            .replace(TRAILING_JUNK, '')
            .replace(/\s+/g, ' ')
            .trim();
    } while (current !== previous);
    return current;
}

/**
 * "Artist - Song" -> { artist, title }. Splitting on the last separator keeps
 * the resulting title free of separators, so normalizing it again is a no-op.
 */
export function splitOnLastSeparator(value: string): { artist: string; title: string } | null {
    const matches = [...value.matchAll(SEPARATOR_REGEX)];
    const last = matches[matches.length - 1];
    if (!last || last.index === undefined) return null;

    const artist = tidy(value.slice(0, last.index));
    const title = tidy(value.slice(last.index + last[0].length));
    if (!artist || !title) return null;

    return { artist, title };
}
