/**
 * Location lookups at a point in time.
 *
 * Traceroute distances use where each node was when the packet was heard, not
 * where it is now. Two resolvers implement the same interface: one queries the
 * store for every lookup, the other preloads recent history for a batch of
 * nodes and answers from memory.
 */
import type { LocationFix, ResolvedLocation, TracerouteStore } from '../../types/traceroute.js';
import { logger } from '../../utils/logger.js';

export interface LocationResolver {
  lookup(nodeNum: number, targetTimestamp: number): ResolvedLocation | null;
}

const SECONDS_PER_HOUR = 3600;

/**
 * Human readable distance in time between a fix and the moment it is used for.
 * Positive ages are fixes taken before the target, negative ones after it.
 */
export function formatAgeWarning(ageSeconds: number): string | null {
  if (ageSeconds === 0) {
    return null;
  }

  const ageHours = Math.abs(ageSeconds) / SECONDS_PER_HOUR;
  const suffix = ageSeconds > 0 ? 'ago' : 'later';

  if (ageHours <= 24) {
    return `from ${ageHours.toFixed(1)}h ${suffix}`;
  }
  if (ageHours <= 168) {
    return `from ${(ageHours / 24).toFixed(1)}d ${suffix}`;
  }
  return `from ${(ageHours / 168).toFixed(1)}w ${suffix}`;
}

/**
 * Pick the fix to use at `target` from a newest-first history: the latest fix
 * at or before the target, otherwise the earliest one after it.
 */
export function selectFixAt(historyDesc: readonly LocationFix[], target: number): LocationFix | null {
  if (historyDesc.length === 0) {
    return null;
  }

  for (const fix of historyDesc) {
    if (fix.timestamp <= target) {
      return fix;
    }
  }

  let earliest = historyDesc[0];
  for (const fix of historyDesc) {
    if (fix.timestamp < earliest.timestamp) {
      earliest = fix;
    }
  }
  return earliest;
}

function toResolved(fix: LocationFix, target: number): ResolvedLocation {
  return {
    ...fix,
    ageWarning: formatAgeWarning(target - fix.timestamp)
  };
}

/**
 * Answers every lookup with a query against the store.
 */
export class DatabaseLocationResolver implements LocationResolver {
  constructor(private readonly store: TracerouteStore) {}

  lookup(nodeNum: number, targetTimestamp: number): ResolvedLocation | null {
    const fix =
      this.store.fetchLocationAtOrBefore(nodeNum, targetTimestamp) ??
      this.store.fetchLocationAfter(nodeNum, targetTimestamp);
    return fix ? toResolved(fix, targetTimestamp) : null;
  }
}

/**
 * Answers lookups from history loaded up front, memoized per node and hour.
 *
 * The memo key drops sub-hour precision, so two lookups for the same node in
 * the same clock hour share a result.
 */
export class PreloadedLocationResolver implements LocationResolver {
  private readonly memo = new Map<string, ResolvedLocation | null>();

  constructor(
    private readonly histories: ReadonlyMap<number, readonly LocationFix[]>,
    private readonly fallback?: LocationResolver
  ) {}

  static preload(
    store: TracerouteStore,
    nodeNums: Iterable<number>,
    limit: number = 50,
    fallback?: LocationResolver
  ): PreloadedLocationResolver {
    const histories = new Map<number, LocationFix[]>();
    let fixCount = 0;

    for (const nodeNum of new Set(nodeNums)) {
      const history = store.fetchLocationHistory(nodeNum, limit);
      if (history.length > 0) {
        histories.set(nodeNum, history);
        fixCount += history.length;
      }
    }

    logger.debug(`Preloaded ${fixCount} location fixes for ${histories.size} nodes`);
    return new PreloadedLocationResolver(histories, fallback);
  }

  get cachedLookups(): number {
    return this.memo.size;
  }

  get preloadedNodes(): number {
    return this.histories.size;
  }

  lookup(nodeNum: number, targetTimestamp: number): ResolvedLocation | null {
    const key = `${nodeNum}:${Math.floor(targetTimestamp / SECONDS_PER_HOUR)}`;
    const memoized = this.memo.get(key);
    if (memoized !== undefined) {
      return memoized;
    }

    const history = this.histories.get(nodeNum);
    let resolved: ResolvedLocation | null;
    if (history) {
      const fix = selectFixAt(history, targetTimestamp);
      resolved = fix ? toResolved(fix, targetTimestamp) : null;
    } else {
      resolved = this.fallback?.lookup(nodeNum, targetTimestamp) ?? null;
    }

    this.memo.set(key, resolved);
    return resolved;
  }
}
