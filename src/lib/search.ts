import Fuse from 'fuse.js';

// ============================================================================
// SEARCH CONFIGURATION
// ============================================================================

export interface SearchOptions {
  keys: (string | { name: string; weight: number })[];
  threshold?: number;
  minMatchCharLength?: number;
  shouldSort?: boolean;
  includeScore?: boolean;
  ignoreLocation?: boolean;
  distance?: number;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  keys: [],
  threshold: 0.4,
  minMatchCharLength: 1,
  shouldSort: true,
  includeScore: true,
  ignoreLocation: true,
  distance: 100,
};

// ============================================================================
// SEARCH CACHE
// ============================================================================

interface CachedSearch<T> {
  fuse: Fuse<T>;
  timestamp: number;
}

// Keyed by the data array itself, so callers must pass a fresh array whenever
// the underlying records change.
let searchCache = new WeakMap<object, Map<string, CachedSearch<any>>>();
const CACHE_TTL = 5 * 60 * 1000; // 5 minutes

export function clearSearchCache(): void {
  searchCache = new WeakMap();
}

// ============================================================================
// FUZZY SEARCH FACTORY
// ============================================================================

/**
 * Creates a cached Fuse instance for fuzzy searching
 */
export function createFuzzySearch<T>(
  data: readonly T[],
  options: SearchOptions
): Fuse<T> {
  const optionsKey = JSON.stringify(options);
  let byOptions = searchCache.get(data);
  if (!byOptions) {
    byOptions = new Map();
    searchCache.set(data, byOptions);
  }

  const cached = byOptions.get(optionsKey);
  if (cached && Date.now() - cached.timestamp <= CACHE_TTL) {
    return cached.fuse as Fuse<T>;
  }

  const fuse = new Fuse(data, {
    ...DEFAULT_SEARCH_OPTIONS,
    ...options,
  });

  byOptions.set(optionsKey, { fuse, timestamp: Date.now() });

  return fuse;
}

/**
 * Performs a fuzzy search with automatic caching
 */
export function fuzzySearch<T>(
  data: readonly T[],
  query: string,
  options: SearchOptions
): T[] {
  if (!query || query.trim().length === 0) {
    return [...data];
  }

  const trimmedQuery = query.trim();
  if (trimmedQuery.length < (options.minMatchCharLength || 1)) {
    return [];
  }

  const fuse = createFuzzySearch(data, options);
  return fuse.search(trimmedQuery).map((r) => r.item);
}

// ============================================================================
// HYBRID SEARCH (Exact + Fuzzy)
// ============================================================================

/**
 * Performs a hybrid search that puts exact and prefix matches on `textOf`
 * first, then falls back to fuzzy matches for everything else
 */
export function hybridSearch<T>(
  data: readonly T[],
  query: string,
  options: SearchOptions,
  textOf: (item: T) => string
): T[] {
  if (!query || query.trim().length === 0) {
    return [...data];
  }

  const trimmedQuery = query.trim().toLowerCase();
  const exactMatches: T[] = [];
  const prefixMatches: T[] = [];
  const remaining: T[] = [];

  for (const item of data) {
    const value = textOf(item).toLowerCase();
    if (value === trimmedQuery) {
      exactMatches.push(item);
    } else if (value.startsWith(trimmedQuery)) {
      prefixMatches.push(item);
    } else {
      remaining.push(item);
    }
  }

  // If nothing matched directly, search the whole set fuzzily
  if (exactMatches.length === 0 && prefixMatches.length === 0) {
    return fuzzySearch(data, query, options);
  }

  const fuzzyResults = fuzzySearch(remaining, query, options);

  return [...exactMatches, ...prefixMatches, ...fuzzyResults];
}

// ============================================================================
// SORTED LOOKUP
// ============================================================================

/**
 * Binary search over `sorted`, which must be ordered ascending by `keyOf`
 */
export function binarySearch<T>(
  sorted: readonly T[],
  target: number,
  keyOf: (item: T) => number
): T | undefined {
  let low = 0;
  let high = sorted.length - 1;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const item = sorted[mid];
    const key = keyOf(item);

    if (key === target) {
      return item;
    }
    if (key < target) {
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return undefined;
}
