/**
 * Edit distance for typo tolerance.
 *
 * Optimal string alignment: insertions, deletions, substitutions and
 * transpositions of two adjacent characters each cost 1, so "workuot" is a
 * single edit away from "workout". No substring is edited more than once.
 */

/**
 * Compute the optimal-string-alignment distance between two strings.
 * Runs in O(|a| × |b|) time with three rolling rows.
 */
export function editDistance(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let beforePrevious: number[] = new Array<number>(b.length + 1).fill(0);
    let previous: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);
    let current: number[] = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
        current[0] = i;

        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            let value = Math.min(
                previous[j] + 1, // deletion
                current[j - 1] + 1, // insertion
                previous[j - 1] + cost // substitution
            );

            if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
                value = Math.min(value, beforePrevious[j - 2] + 1);
            }

            current[j] = value;
        }

        [beforePrevious, previous, current] = [previous, current, beforePrevious];
    }

    return previous[b.length];
}

/**
 * Normalized similarity in [0, 1]: 1 − distance / max(|a|, |b|).
 * Two empty strings are identical (1).
 */
export function similarity(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) return 1;
    return 1 - editDistance(a, b) / longest;
}

/**
 * Best similarity the length difference alone still allows.
 * Lets callers skip pairs that cannot reach a threshold.
 */
export function similarityUpperBound(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) return 1;
    return 1 - Math.abs(a.length - b.length) / longest;
}
