import { buildDashboardActions } from "./actions.js";
import { cloneCampaignPreviews, cloneDashboard, clonePendingInvites } from "./clone.js";
import { createDashboardCache } from "./dashboard-cache.js";
import type { DashboardCache, DashboardCacheKey } from "./dashboard-cache.js";
import {
  ConfigurationError,
  DEPENDENCY_CAMPAIGNS,
  DEPENDENCY_INVITES,
  DEPENDENCY_NOTIFICATIONS,
  DEPENDENCY_PROFILE,
  DependencyUnavailableError,
  InputError,
  isProfileNotFound,
} from "./errors.js";
import type {
  CampaignGateway,
  Dashboard,
  GatewayCallOptions,
  GetDashboardInput,
  GetDashboardOptions,
  NotificationGateway,
  ProfileGateway,
} from "./types.js";
import type { Logger } from "../../types/index.js";

export const DEFAULT_PREVIEW_LIMIT = 3;
export const MAX_PREVIEW_LIMIT = 10;

export interface UserHubConfig {
  cacheFreshTtlMs?: number;
  cacheStaleTtlMs?: number;
  clock?: () => Date;
}

export interface UserHubDeps {
  campaigns: CampaignGateway | null;
  profiles: ProfileGateway | null;
  notifications: NotificationGateway | null;
  config?: UserHubConfig;
  logger?: Logger | Console;
}

export interface UserHubStats {
  requests_total: number;
  fresh_cache_hits_total: number;
  stale_fallbacks_total: number;
  degraded_total: number;
  unavailable_total: number;
  dependency_failures_total: Record<string, number>;
}

export interface UserHubService {
  getDashboard(input: GetDashboardInput, options?: GetDashboardOptions): Promise<Dashboard>;
  getStats(): UserHubStats;
  readonly cache: DashboardCache;
}

type Attempt<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function clampPreviewLimit(limit: number | null | undefined): number {
  const value = Number.isFinite(limit) ? Math.trunc(Number(limit)) : 0;
  if (value <= 0) return DEFAULT_PREVIEW_LIMIT;
  return Math.min(value, MAX_PREVIEW_LIMIT);
}

export function normalizeDependencies(values: readonly string[]): string[] {
  const set = new Set<string>();
  for (const value of values) {
    const name = String(value ?? "").trim();
    if (name) set.add(name);
  }
  return [...set].sort();
}

/**
 * Replays a cached snapshot as a stale response. The original generatedAt is
 * kept so callers can tell how old the data is.
 */
export function staleFallback(stale: Dashboard, failedDependencies: readonly string[]): Dashboard {
  const result = cloneDashboard(stale);
  result.metadata.cacheHit = true;
  result.metadata.freshness = "stale";
  result.metadata.degraded = true;
  result.metadata.degradedDependencies = normalizeDependencies([
    ...result.metadata.degradedDependencies,
    ...failedDependencies,
  ]);
  return result;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Aggregates the user dashboard from the campaign, profile and notification
 * gateways.
 *
 * Gateways are called one at a time. The campaign listing is critical: when it
 * fails and no stale snapshot exists the whole request fails with
 * DependencyUnavailableError. Every other gateway degrades its own section
 * instead. Whenever a stale snapshot exists, any gateway failure returns that
 * snapshot straight away. Degraded results are returned but never cached.
 *
 * Concurrent misses for the same key are not coalesced; each one fans out to
 * the gateways and the last successful write wins.
 */
export function createUserHubService(deps: UserHubDeps): UserHubService {
  const { campaigns, profiles, notifications, config = {}, logger = console } = deps;
  const clock = config.clock ?? (() => new Date());
  const cache = createDashboardCache({
    freshTtlMs: config.cacheFreshTtlMs,
    staleTtlMs: config.cacheStaleTtlMs,
  });

  const stats = {
    requests_total: 0,
    fresh_cache_hits_total: 0,
    stale_fallbacks_total: 0,
    degraded_total: 0,
    unavailable_total: 0,
  };
  const dependencyFailures = new Map<string, number>();

  async function attempt<T>(
    dependency: string,
    userId: string,
    options: GatewayCallOptions,
    call: () => Promise<T>
  ): Promise<Attempt<T>> {
    try {
      options.signal?.throwIfAborted();
      return { ok: true, value: await call() };
    } catch (error) {
      if (!(dependency === DEPENDENCY_PROFILE && isProfileNotFound(error))) {
        dependencyFailures.set(dependency, (dependencyFailures.get(dependency) ?? 0) + 1);
        logger.warn({ dependency, user_id: userId, error: errorMessage(error) }, "userhub dependency call failed");
      }
      return { ok: false, error };
    }
  }

  function useStale(stale: Dashboard, dependency: string, userId: string): Dashboard {
    stats.stale_fallbacks_total++;
    const result = staleFallback(stale, [dependency]);
    logger.info(
      { user_id: userId, dependencies: result.metadata.degradedDependencies, generated_at: result.metadata.generatedAt.toISOString() },
      "userhub served stale dashboard"
    );
    return result;
  }

  async function getDashboard(input: GetDashboardInput, options: GetDashboardOptions = {}): Promise<Dashboard> {
    if (!campaigns) throw new ConfigurationError("campaign_gateway_not_configured", "campaign gateway is not configured");
    if (!profiles) throw new ConfigurationError("profile_gateway_not_configured", "profile gateway is not configured");
    if (!notifications) {
      throw new ConfigurationError("notification_gateway_not_configured", "notification gateway is not configured");
    }

    const userId = String(input.userId ?? "").trim();
    if (!userId) throw new InputError("user_id_required", "user id is required");
    stats.requests_total++;

    const now = clock();
    const cacheKey: DashboardCacheKey = {
      userId,
      locale: String(input.locale ?? "").trim(),
    };

    const cached = cache.getFresh(cacheKey, now);
    if (cached) {
      stats.fresh_cache_hits_total++;
      cached.metadata.cacheHit = true;
      cached.metadata.freshness = "fresh";
      return cached;
    }
    const stale = cache.getStale(cacheKey, now);

    const campaignLimit = clampPreviewLimit(input.campaignPreviewLimit);
    const inviteLimit = clampPreviewLimit(input.invitePreviewLimit);
    const callOptions: GatewayCallOptions = { signal: options.signal };

    const campaignPage = await attempt(DEPENDENCY_CAMPAIGNS, userId, callOptions, () =>
      campaigns.listCampaignPreviews(userId, campaignLimit, callOptions)
    );
    if (!campaignPage.ok) {
      if (stale) return useStale(stale, DEPENDENCY_CAMPAIGNS, userId);
      stats.unavailable_total++;
      throw new DependencyUnavailableError(DEPENDENCY_CAMPAIGNS, campaignPage.error);
    }

    const previews = cloneCampaignPreviews(campaignPage.value.campaigns);
    const result: Dashboard = {
      metadata: {
        freshness: "unspecified",
        cacheHit: false,
        degraded: false,
        degradedDependencies: [],
        generatedAt: now,
      },
      user: {
        userId,
        username: "",
        name: "",
        profileAvailable: false,
        discoverable: false,
        needsProfileCompletion: false,
      },
      invites: { available: true, listedCount: 0, hasMore: false, pending: [] },
      notifications: { available: true, hasUnread: false, unreadCount: 0 },
      campaigns: {
        available: true,
        listedCount: previews.length,
        activeCount: previews.filter((campaign) => campaign.status === "active").length,
        hasMore: Boolean(campaignPage.value.hasMore),
        campaigns: previews,
      },
      nextActions: [],
    };

    const degradedDependencies: string[] = [];

    const invitePage = await attempt(DEPENDENCY_INVITES, userId, callOptions, () =>
      campaigns.listPendingInvitePreviews(userId, inviteLimit, callOptions)
    );
    if (invitePage.ok) {
      result.invites.pending = clonePendingInvites(invitePage.value.invites);
      result.invites.listedCount = result.invites.pending.length;
      result.invites.hasMore = Boolean(invitePage.value.hasMore);
    } else {
      if (stale) return useStale(stale, DEPENDENCY_INVITES, userId);
      result.invites.available = false;
      degradedDependencies.push(DEPENDENCY_INVITES);
    }

    const profile = await attempt(DEPENDENCY_PROFILE, userId, callOptions, () =>
      profiles.getUserProfile(userId, callOptions)
    );
    if (profile.ok) {
      result.user.profileAvailable = true;
      result.user.username = String(profile.value.username ?? "").trim();
      result.user.name = String(profile.value.name ?? "").trim();
    } else if (!isProfileNotFound(profile.error)) {
      if (stale) return useStale(stale, DEPENDENCY_PROFILE, userId);
      degradedDependencies.push(DEPENDENCY_PROFILE);
    }
    result.user.discoverable = result.user.username.trim() !== "";
    result.user.needsProfileCompletion = !result.user.discoverable;

    const unread = await attempt(DEPENDENCY_NOTIFICATIONS, userId, callOptions, () =>
      notifications.getUnreadStatus(userId, callOptions)
    );
    if (unread.ok) {
      result.notifications.hasUnread = Boolean(unread.value.hasUnread);
      result.notifications.unreadCount = Math.max(0, Math.trunc(Number(unread.value.unreadCount) || 0));
    } else {
      if (stale) return useStale(stale, DEPENDENCY_NOTIFICATIONS, userId);
      result.notifications.available = false;
      degradedDependencies.push(DEPENDENCY_NOTIFICATIONS);
    }

    result.nextActions = buildDashboardActions(result);
    result.metadata = {
      freshness: "fresh",
      cacheHit: false,
      degraded: degradedDependencies.length > 0,
      degradedDependencies: normalizeDependencies(degradedDependencies),
      generatedAt: now,
    };

    if (result.metadata.degraded) {
      stats.degraded_total++;
      logger.warn(
        { user_id: userId, dependencies: result.metadata.degradedDependencies },
        "userhub dashboard degraded, not cached"
      );
    } else {
      cache.set(cacheKey, result, now);
    }

    return result;
  }

  function getStats(): UserHubStats {
    return {
      ...stats,
      dependency_failures_total: Object.fromEntries(dependencyFailures),
    };
  }

  return { getDashboard, getStats, cache };
}
