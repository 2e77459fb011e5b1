/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for chanledger.
 */

/* The debug filter provides category-based control over debug log output, inspired by the `debug` npm package. Categories use colon-separated namespaces
 * (e.g., "store", "http:assign") and the CHANLEDGER_DEBUG environment variable accepts comma-separated patterns with wildcard and exclusion support.
 *
 * Pattern syntax:
 *   - "*" enables all categories.
 *   - "category" enables an exact category or any sub-category (prefix match).
 *   - "-category" excludes a category or its sub-categories, even when wildcard is active.
 *
 * Examples:
 *   CHANLEDGER_DEBUG=store               Only channel map load and save messages.
 *   CHANLEDGER_DEBUG=*,-http             Everything except HTTP request handling.
 */

// Whether any debug output is configured at all. Fast-path check avoids category string work when debug is off.
let anyEnabled = false;

// Whether wildcard (*) was specified. All categories pass unless explicitly excluded.
let wildcardEnabled = false;

// Categories to include (exact or prefix match).
const includeSet = new Set<string>();

// Categories to exclude (exact or prefix match). Takes priority over includes and wildcard.
const excludeSet = new Set<string>();

/**
 * Checks whether a category matches any pattern in the given set. A pattern matches if it equals the category exactly or if the category starts with the pattern
 * followed by a colon.
 * @param category - The category to check.
 * @param patterns - The set of patterns to match against.
 * @returns True if the category matches any pattern.
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
 * Parses a comma-separated pattern string and configures the debug filter. Calling this function replaces any previous filter configuration.
 * @param pattern - Comma-separated list of category patterns (e.g., "store,allocator,-http").
 */
export function initDebugFilter(pattern: string): void {

  includeSet.clear();
  excludeSet.clear();
  wildcardEnabled = false;
  anyEnabled = false;

  const parts = pattern.split(",").map((p) => p.trim()).filter((p) => p.length > 0);

  if(parts.length === 0) {

    return;
  }

  for(const part of parts) {

    if(part === "*") {

      wildcardEnabled = true;
    } else if(part.startsWith("-")) {

      excludeSet.add(part.substring(1));
    } else {

      includeSet.add(part);
    }
  }

  anyEnabled = true;
}

/**
 * Checks whether a specific debug category is enabled under the current filter configuration.
 * @param category - The category to check.
 * @returns True if debug output should be produced for this category.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!anyEnabled) {

    return false;
  }

  // Excludes always win, even over wildcard.
  if(matchesAny(category, excludeSet)) {

    return false;
  }

  if(wildcardEnabled) {

    return true;
  }

  return matchesAny(category, includeSet);
}

/**
 * Fast-path check for whether any debug categories are configured.
 * @returns True if at least one debug category is enabled.
 */
export function isAnyDebugEnabled(): boolean {

  return anyEnabled;
}

/**
 * Metadata for a known debug category, listed by --list-env.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

/**
 * All known debug categories, sorted alphabetically.
 */
export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "allocator", description: "Number allocation: starting number, per-path assignments." },
  { category: "assign", description: "Assignment runs: known/new partition, skipped duplicates." },
  { category: "config", description: "Configuration loading and merging." },
  { category: "discovery", description: "Discovery file parsing: format detection, skipped entries." },
  { category: "http", description: "HTTP handlers: queued runs, event subscribers." },
  { category: "playlist", description: "Playlist generation: record counts, output paths." },
  { category: "store", description: "Channel map load and save: file paths, entry counts." }
];
