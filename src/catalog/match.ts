/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * match.ts: Fuzzy matching of user-entered channel names.
 */

/* Users type channel names from memory: "groove", "drone zone", "secretagent". Matching is case-insensitive and runs in two rounds. First, candidates that start
 * with or contain the query win, preferring prefixes and then the shortest candidate ("groove" picks "Groove Salad" over "Groove Salad Classic"). Failing that, the
 * candidate with the smallest edit distance wins when the distance is at most a third of the query length, rounded up, which forgives a typo or two without
 * matching unrelated names.
 */

/**
 * Computes the Levenshtein edit distance between two strings.
 * @param a - First string.
 * @param b - Second string.
 * @returns The minimum number of single-character insertions, deletions and substitutions turning a into b.
 */
export function levenshtein(a: string, b: string): number {

  if(a === b) {

    return 0;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);

  for(let i = 1; i <= a.length; i++) {

    const current = [i];

    for(let j = 1; j <= b.length; j++) {

      const cost = (a[i - 1] === b[j - 1]) ? 0 : 1;

      current[j] = Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, (previous[j - 1] ?? 0) + cost);
    }

    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * Finds the candidate that best matches a query.
 * @param query - What the user typed.
 * @param candidates - The names to choose from.
 * @returns The best candidate, or undefined when none is close enough.
 */
export function fuzzyMatch(query: string, candidates: readonly string[]): string | undefined {

  const needle = query.trim().toLowerCase();

  if(needle.length === 0) {

    return undefined;
  }

  const substringMatches = candidates.filter((candidate) => candidate.toLowerCase().includes(needle)).sort((a, b) => {

    const aPrefix = a.toLowerCase().startsWith(needle) ? 0 : 1;
    const bPrefix = b.toLowerCase().startsWith(needle) ? 0 : 1;

    return (aPrefix - bPrefix) || (a.length - b.length);
  });

  if(substringMatches.length > 0) {

    return substringMatches[0];
  }

  const limit = Math.ceil(needle.length / 3);
  let best: string | undefined;
  let bestDistance = Infinity;

  for(const candidate of candidates) {

    const distance = levenshtein(needle, candidate.toLowerCase());

    if(distance < bestDistance) {

      best = candidate;
      bestDistance = distance;
    }
  }

  return (bestDistance <= limit) ? best : undefined;
}

/**
 * Ranks candidates by edit distance to a query, for "did you mean" suggestions.
 * @param query - What the user typed.
 * @param candidates - The names to choose from.
 * @param limit - Maximum number of suggestions.
 * @returns Up to limit candidates, closest first.
 */
export function rankByDistance(query: string, candidates: readonly string[], limit = 3): string[] {

  const needle = query.trim().toLowerCase();

  return candidates.map((candidate) => ({ candidate, distance: levenshtein(needle, candidate.toLowerCase()) }))
    .sort((a, b) => a.distance - b.distance).slice(0, limit).map((entry) => entry.candidate);
}
