import { cloneDashboard } from "./clone.js";
import type { Dashboard } from "./types.js";

export const DEFAULT_CACHE_FRESH_TTL_MS = 15_000;
export const DEFAULT_CACHE_STALE_TTL_MS = 2 * 60_000;

export interface DashboardCacheKey {
  userId: string;
  locale: string;
}

interface DashboardCacheEntry {
  dashboard: Dashboard;
  cachedAt: number;
}

export interface DashboardCacheStats {
  fresh_hits: number;
  stale_hits: number;
  misses: number;
  sets: number;
  entries: number;
}

export interface DashboardCache {
  getFresh(key: DashboardCacheKey, now: Date): Dashboard | null;
  getStale(key: DashboardCacheKey, now: Date): Dashboard | null;
  set(key: DashboardCacheKey, dashboard: Dashboard, now: Date): void;
  getStats(): DashboardCacheStats;
  readonly freshTtlMs: number;
  readonly staleTtlMs: number;
}

interface DashboardCacheOptions {
  freshTtlMs?: number;
  staleTtlMs?: number;
}

function positiveOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;
}

function storageKey(key: DashboardCacheKey): string {
  return JSON.stringify([key.userId, key.locale]);
}

/**
 * In-process dashboard snapshots keyed by (user, locale).
 *
 * Entries expire passively: reads compare the entry age with the fresh or
 * stale TTL and nothing is ever evicted. Each operation touches the map
 * synchronously, so no read or write can interleave with another one and no
 * access is held open across an upstream call.
 */
export function createDashboardCache(opts: DashboardCacheOptions = {}): DashboardCache {
  const freshTtlMs = positiveOr(opts.freshTtlMs, DEFAULT_CACHE_FRESH_TTL_MS);
  const staleTtlMs = Math.max(positiveOr(opts.staleTtlMs, DEFAULT_CACHE_STALE_TTL_MS), freshTtlMs);

  const entries = new Map<string, DashboardCacheEntry>();
  const stats = {
    fresh_hits: 0,
    stale_hits: 0,
    misses: 0,
    sets: 0,
  };

  function lookup(key: DashboardCacheKey, now: Date, ttlMs: number): Dashboard | null {
    const entry = entries.get(storageKey(key));
    if (!entry) return null;
    const age = now.getTime() - entry.cachedAt;
    // negative age means the clock moved backwards; treat it as a miss
    if (age < 0 || age > ttlMs) return null;
    return cloneDashboard(entry.dashboard);
  }

  // A fresh miss is always followed by a stale lookup, which counts the miss.
  function getFresh(key: DashboardCacheKey, now: Date): Dashboard | null {
    const dashboard = lookup(key, now, freshTtlMs);
    if (dashboard) stats.fresh_hits++;
    return dashboard;
  }

  function getStale(key: DashboardCacheKey, now: Date): Dashboard | null {
    const dashboard = lookup(key, now, staleTtlMs);
    if (dashboard) stats.stale_hits++;
    else stats.misses++;
    return dashboard;
  }

  function set(key: DashboardCacheKey, dashboard: Dashboard, now: Date): void {
    entries.set(storageKey(key), {
      dashboard: cloneDashboard(dashboard),
      cachedAt: now.getTime(),
    });
    stats.sets++;
  }

  function getStats(): DashboardCacheStats {
    return { ...stats, entries: entries.size };
  }

  return { getFresh, getStale, set, getStats, freshTtlMs, staleTtlMs };
}
