/**
 * Folds a string for comparison: compatibility forms (fullwidth letters),
 * diacritics and case are all flattened.
 */
export function foldForComparison(str: string): string {
    return str.normalize("NFKD").replace(/[\u0300-\u036f]/g, "").toLowerCase().trim();
}

/**
 * Computes Levenshtein Distance between two strings.
 * Keeps a single row of the matrix.
 */
export function levenshteinDistance(s: string, t: string): number {
    const n = s.length;
    const m = t.length;

    if (n === 0) return m;
    if (m === 0) return n;

    let previous = Array.from({ length: m + 1 }, (_, j) => j);
    for (let i = 1; i <= n; i++) {
        const current = [i];
        for (let j = 1; j <= m; j++) {
            const cost = (t[j - 1] === s[i - 1]) ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,        // deletion
                current[j - 1] + 1,     // insertion
                previous[j - 1] + cost  // substitution
            );
        }
        previous = current;
    }

    return previous[m];
}

/**
 * Similarity ratio (0.0 to 1.0) of two folded strings. 1.0 = exact match.
 */
export function calculateSimilarity(s: string, t: string): number {
    const sNorm = foldForComparison(s);
    const tNorm = foldForComparison(t);

    const maxLen = Math.max(sNorm.length, tNorm.length);
    if (maxLen === 0) return 1.0;

    return 1.0 - (levenshteinDistance(sNorm, tNorm) / maxLen);
}

/**
 * Compares two names ignoring case, accents and spacing ("Beyoncé" = "beyonce", "AC DC" = "ACDC").
 */
export function isSameName(a: string, b: string): boolean {
    const squash = (str: string) => foldForComparison(str).replace(/\s+/g, "");
    return squash(a) === squash(b);
}
