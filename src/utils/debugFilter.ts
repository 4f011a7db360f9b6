/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for icytune.
 */

/* Debug messages carry a category ("session", "player", "catalog", ...). ICYTUNE_DEBUG takes a comma-separated list of patterns:
 *
 *   - "*" enables every category.
 *   - "category" enables that category and its sub-categories ("player" also enables "player:spawn").
 *   - "-category" excludes a category, even under "*".
 *
 * Examples:
 *   ICYTUNE_DEBUG=session           Only session messages.
 *   ICYTUNE_DEBUG=*,-catalog        Everything except catalog messages.
 */

interface FilterState {

  excludes: Set<string>;
  includes: Set<string>;
  wildcard: boolean;
}

// Null when debug output is off, which keeps the disabled path to a single check.
let filter: FilterState | null = null;

/**
 * Checks whether a category equals a pattern or is a sub-category of it.
 * @param category - The category to check.
 * @param patterns - The patterns to match against.
 * @returns True if any pattern matches.
 */
function matchesAny(category: string, patterns: Set<string>): boolean {

  if(patterns.has(category)) {

    return true;
  }

  for(const pattern of patterns) {

    if(category.startsWith(pattern + ":")) {

      return true;
    }
  }

  return false;
}

/**
 * Replaces the filter configuration with the given pattern list. An empty string turns debug output off.
 * @param pattern - Comma-separated list of category patterns.
 */
export function initDebugFilter(pattern: string): void {

  const parts = pattern.split(",").map((p) => p.trim()).filter((p) => p.length > 0);

  if(parts.length === 0) {

    filter = null;

    return;
  }

  const next: FilterState = { excludes: new Set(), includes: new Set(), wildcard: false };

  for(const part of parts) {

    if(part === "*") {

      next.wildcard = true;
    } else if(part.startsWith("-")) {

      next.excludes.add(part.substring(1));
    } else {

      next.includes.add(part);
    }
  }

  filter = next;
}

/**
 * Checks whether debug output is enabled for a category.
 * @param category - The category to check.
 * @returns True if debug messages in this category should be logged.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!filter || matchesAny(category, filter.excludes)) {

    return false;
  }

  return filter.wildcard || matchesAny(category, filter.includes);
}

/**
 * Fast-path check for whether any debug output is configured.
 * @returns True if at least one pattern is active.
 */
export function isAnyDebugEnabled(): boolean {

  return filter !== null;
}

/**
 * Known debug categories, listed by --help.
 */
export const DEBUG_CATEGORIES: ReadonlyArray<{ category: string; description: string }> = [

  { category: "catalog", description: "Channel list fetches, cache use, icon downloads." },
  { category: "notify", description: "Desktop notifications and the custom track command." },
  { category: "player", description: "Player detection, spawn arguments, exit status." },
  { category: "session", description: "Header parsing, title handling, station IDs, session end." },
  { category: "status", description: "Now-playing HTTP mirror." },
  { category: "tracks", description: "Track log reads and writes." }
];
