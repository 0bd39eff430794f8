import {
  ConfigurationError,
  createUserHubService,
  DependencyUnavailableError,
  InputError,
  ProfileNotFoundError,
} from "../index.js";
import type { UserHubService } from "../index.js";
import { clampPreviewLimit, normalizeDependencies, staleFallback } from "../service.js";
import { createFakeGateways, sampleDashboard, silentLogger, totalCalls } from "./fixtures.js";
import type { FakeGateways } from "./fixtures.js";

const t0 = new Date("2026-03-05T12:00:00.000Z");

describe("userhub service", () => {
  let fake: FakeGateways;
  let logger: ReturnType<typeof silentLogger>;
  let now: Date;
  let service: UserHubService;

  function advance(ms: number) {
    now = new Date(now.getTime() + ms);
  }

  beforeEach(() => {
    fake = createFakeGateways();
    logger = silentLogger();
    now = t0;
    service = createUserHubService({
      campaigns: fake.campaigns,
      profiles: fake.profiles,
      notifications: fake.notifications,
      config: { clock: () => now },
      logger,
    });
  });

  describe("validation", () => {
    it("requires a user id", async () => {
      await expect(service.getDashboard({ userId: "   " })).rejects.toBeInstanceOf(InputError);
      await expect(service.getDashboard({ userId: "" })).rejects.toMatchObject({ code: "user_id_required" });
      expect(totalCalls(fake)).toBe(0);
      expect(service.getStats().requests_total).toBe(0);
    });

    it("reports each missing gateway as a configuration error", async () => {
      const withoutCampaigns = createUserHubService({
        campaigns: null,
        profiles: fake.profiles,
        notifications: fake.notifications,
      });
      const withoutProfiles = createUserHubService({
        campaigns: fake.campaigns,
        profiles: null,
        notifications: fake.notifications,
      });
      const withoutNotifications = createUserHubService({
        campaigns: fake.campaigns,
        profiles: fake.profiles,
        notifications: null,
      });

      await expect(withoutCampaigns.getDashboard({ userId: "" })).rejects.toBeInstanceOf(ConfigurationError);
      await expect(withoutCampaigns.getDashboard({ userId: "user-1" })).rejects.toMatchObject({
        code: "campaign_gateway_not_configured",
      });
      await expect(withoutProfiles.getDashboard({ userId: "user-1" })).rejects.toMatchObject({
        code: "profile_gateway_not_configured",
      });
      await expect(withoutNotifications.getDashboard({ userId: "user-1" })).rejects.toMatchObject({
        code: "notification_gateway_not_configured",
      });
      expect(totalCalls(fake)).toBe(0);
    });
  });

  describe("aggregation", () => {
    it("assembles every section and ranks next actions", async () => {
      const dashboard = await service.getDashboard({ userId: " user-1 ", locale: "en" });

      expect(dashboard.metadata).toEqual({
        freshness: "fresh",
        cacheHit: false,
        degraded: false,
        degradedDependencies: [],
        generatedAt: t0,
      });
      expect(dashboard.user).toEqual({
        userId: "user-1",
        username: "",
        name: "Rowan",
        profileAvailable: true,
        discoverable: false,
        needsProfileCompletion: true,
      });
      expect(dashboard.campaigns).toMatchObject({ available: true, listedCount: 1, activeCount: 1, hasMore: false });
      expect(dashboard.invites).toMatchObject({ available: true, listedCount: 1, hasMore: false });
      expect(dashboard.invites.pending[0].inviteId).toBe("inv-1");
      expect(dashboard.notifications).toEqual({ available: true, hasUnread: true, unreadCount: 2 });
      expect(dashboard.nextActions.map((action) => action.id)).toEqual([
        "review_pending_invites",
        "complete_profile",
        "continue_active_campaign",
        "review_notifications",
      ]);
    });

    it("trims profile fields and marks a named user discoverable", async () => {
      fake.profile = { username: "  rowan ", name: " Rowan Vale " };

      const dashboard = await service.getDashboard({ userId: "user-1" });

      expect(dashboard.user.username).toBe("rowan");
      expect(dashboard.user.name).toBe("Rowan Vale");
      expect(dashboard.user.discoverable).toBe(true);
      expect(dashboard.user.needsProfileCompletion).toBe(false);
      expect(dashboard.nextActions.map((action) => action.id)).not.toContain("complete_profile");
    });

    it("clamps preview limits before calling gateways", async () => {
      await service.getDashboard({ userId: "user-1", campaignPreviewLimit: 0, invitePreviewLimit: 999 });

      expect(fake.limits.campaigns).toEqual([3]);
      expect(fake.limits.invites).toEqual([10]);
    });

    it("never reports a negative unread count", async () => {
      fake.unread = { hasUnread: false, unreadCount: -4 };

      const dashboard = await service.getDashboard({ userId: "user-1" });

      expect(dashboard.notifications.unreadCount).toBe(0);
    });

    it("treats a missing profile as a complete, non-degraded answer", async () => {
      fake.profile = new ProfileNotFoundError();

      const dashboard = await service.getDashboard({ userId: "user-1" });

      expect(dashboard.metadata.degraded).toBe(false);
      expect(dashboard.user.profileAvailable).toBe(false);
      expect(dashboard.user.needsProfileCompletion).toBe(true);
      expect(service.getStats().dependency_failures_total).toEqual({});
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("forwards the caller's abort signal to gateways", async () => {
      const ctrl = new AbortController();

      await service.getDashboard({ userId: "user-1" }, { signal: ctrl.signal });

      expect(fake.signals[0]).toBe(ctrl.signal);
    });
  });

  describe("caching", () => {
    it("serves repeated reads within the fresh TTL from cache", async () => {
      await service.getDashboard({ userId: "user-1", locale: "en" });
      advance(10_000);
      const second = await service.getDashboard({ userId: "user-1", locale: " en " });

      expect(totalCalls(fake)).toBe(4);
      expect(second.metadata.cacheHit).toBe(true);
      expect(second.metadata.freshness).toBe("fresh");
      expect(second.metadata.generatedAt).toEqual(t0);
      expect(service.getStats().fresh_cache_hits_total).toBe(1);
    });

    it("counts one cache miss per cold request", async () => {
      await service.getDashboard({ userId: "user-1" });
      await service.getDashboard({ userId: "user-1" });
      advance(20_000);
      fake.invitePage = new Error("invites down");
      await service.getDashboard({ userId: "user-1" });

      expect(service.cache.getStats()).toMatchObject({ fresh_hits: 1, stale_hits: 1, misses: 1, sets: 1 });
    });

    it("caches each locale separately", async () => {
      await service.getDashboard({ userId: "user-1", locale: "en" });
      await service.getDashboard({ userId: "user-1", locale: "de" });

      expect(fake.calls.campaigns).toBe(2);
    });

    it("returns copies that cannot corrupt the cached snapshot", async () => {
      const first = await service.getDashboard({ userId: "user-1" });
      first.campaigns.campaigns.length = 0;
      first.user.name = "mutated";

      const second = await service.getDashboard({ userId: "user-1" });

      expect(second.campaigns.campaigns).toHaveLength(1);
      expect(second.user.name).toBe("Rowan");
    });

    it("does not cache degraded results", async () => {
      fake.invitePage = new Error("invites down");

      const degraded = await service.getDashboard({ userId: "user-1" });

      expect(degraded.metadata).toMatchObject({
        freshness: "fresh",
        cacheHit: false,
        degraded: true,
        degradedDependencies: ["game.invites"],
      });
      expect(degraded.invites).toEqual({ available: false, listedCount: 0, hasMore: false, pending: [] });
      expect(degraded.nextActions.map((action) => action.id)).toEqual([
        "complete_profile",
        "continue_active_campaign",
        "review_notifications",
      ]);
      expect(service.cache.getStats().sets).toBe(0);

      fake.invitePage = { invites: [], hasMore: false };
      const recovered = await service.getDashboard({ userId: "user-1" });

      expect(fake.calls.campaigns).toBe(2);
      expect(recovered.metadata.degraded).toBe(false);
      expect(service.getStats().degraded_total).toBe(1);
    });

    it("collects every failed optional dependency in sorted order", async () => {
      fake.unread = new Error("notifications down");
      fake.profile = new Error("social down");
      fake.invitePage = new Error("invites down");

      const dashboard = await service.getDashboard({ userId: "user-1" });

      expect(dashboard.metadata.degradedDependencies).toEqual([
        "game.invites",
        "notifications.unread",
        "social.profile",
      ]);
      expect(dashboard.notifications.available).toBe(false);
      expect(dashboard.user.profileAvailable).toBe(false);
      expect(service.getStats().dependency_failures_total).toEqual({
        "game.invites": 1,
        "notifications.unread": 1,
        "social.profile": 1,
      });
    });
  });

  describe("stale fallback", () => {
    const failures: Array<[string, (fake: FakeGateways) => void]> = [
      ["game.campaigns", (f) => { f.campaignPage = new Error("campaigns down"); }],
      ["game.invites", (f) => { f.invitePage = new Error("invites down"); }],
      ["social.profile", (f) => { f.profile = new Error("social down"); }],
      ["notifications.unread", (f) => { f.unread = new Error("notifications down"); }],
    ];

    it.each(failures)("replays the last snapshot when %s fails", async (dependency, breakIt) => {
      await service.getDashboard({ userId: "user-1" });
      advance(20_000);
      breakIt(fake);

      const dashboard = await service.getDashboard({ userId: "user-1" });

      expect(dashboard.metadata).toEqual({
        freshness: "stale",
        cacheHit: true,
        degraded: true,
        degradedDependencies: [dependency],
        generatedAt: t0,
      });
      expect(dashboard.campaigns.campaigns[0].campaignId).toBe("c-1");
      expect(service.getStats().stale_fallbacks_total).toBe(1);
    });

    it("stops calling gateways once it falls back", async () => {
      await service.getDashboard({ userId: "user-1" });
      advance(20_000);
      fake.invitePage = new Error("invites down");

      await service.getDashboard({ userId: "user-1" });

      expect(fake.calls).toEqual({ campaigns: 2, invites: 2, profile: 1, unread: 1 });
    });

    it("does not fall back for a missing profile", async () => {
      await service.getDashboard({ userId: "user-1" });
      advance(20_000);
      fake.profile = new ProfileNotFoundError();

      const dashboard = await service.getDashboard({ userId: "user-1" });

      expect(dashboard.metadata.freshness).toBe("fresh");
      expect(dashboard.metadata.generatedAt).toEqual(new Date(t0.getTime() + 20_000));
    });

    it("fails once the stale TTL has passed", async () => {
      await service.getDashboard({ userId: "user-1" });
      advance(120_001);
      fake.campaignPage = new Error("campaigns down");

      await expect(service.getDashboard({ userId: "user-1" })).rejects.toBeInstanceOf(DependencyUnavailableError);
    });
  });

  describe("critical dependency", () => {
    it("fails without a stale snapshot and skips the other gateways", async () => {
      fake.campaignPage = new Error("boom");

      const error = await service.getDashboard({ userId: "user-1" }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DependencyUnavailableError);
      expect(error).toMatchObject({ dependency: "game.campaigns", message: "game.campaigns unavailable: boom" });
      expect(fake.calls).toEqual({ campaigns: 1, invites: 0, profile: 0, unread: 0 });
      expect(service.getStats().unavailable_total).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { dependency: "game.campaigns", user_id: "user-1", error: "boom" },
        "userhub dependency call failed"
      );
    });

    it("treats an already aborted signal as a failed dependency", async () => {
      const ctrl = new AbortController();
      ctrl.abort();

      await expect(service.getDashboard({ userId: "user-1" }, { signal: ctrl.signal })).rejects.toMatchObject({
        dependency: "game.campaigns",
      });
      expect(fake.calls.campaigns).toBe(0);
    });

    it("degrades every optional section when the request is aborted after the campaign listing", async () => {
      const ctrl = new AbortController();
      const listCampaigns = fake.campaigns.listCampaignPreviews;
      fake.campaigns.listCampaignPreviews = async (userId, limit, options) => {
        const page = await listCampaigns(userId, limit, options);
        ctrl.abort(new Error("client disconnected"));
        return page;
      };

      const dashboard = await service.getDashboard({ userId: "user-1" }, { signal: ctrl.signal });

      expect(dashboard.metadata).toMatchObject({
        freshness: "fresh",
        degraded: true,
        degradedDependencies: ["game.invites", "notifications.unread", "social.profile"],
      });
      expect(dashboard.campaigns.listedCount).toBe(1);
      expect(dashboard.invites.available).toBe(false);
      expect(dashboard.notifications.available).toBe(false);
      expect(dashboard.user.profileAvailable).toBe(false);
      expect(fake.calls).toEqual({ campaigns: 1, invites: 0, profile: 0, unread: 0 });
      expect(service.cache.getStats().sets).toBe(0);
    });

    it("serves the stale snapshot when the request is aborted", async () => {
      await service.getDashboard({ userId: "user-1" });
      advance(20_000);
      const ctrl = new AbortController();
      ctrl.abort();

      const dashboard = await service.getDashboard({ userId: "user-1" }, { signal: ctrl.signal });

      expect(dashboard.metadata.freshness).toBe("stale");
      expect(dashboard.metadata.degradedDependencies).toEqual(["game.campaigns"]);
    });
  });
});

describe("clampPreviewLimit", () => {
  it("uses the default for absent or non-positive limits and caps large ones", () => {
    expect(clampPreviewLimit(undefined)).toBe(3);
    expect(clampPreviewLimit(0)).toBe(3);
    expect(clampPreviewLimit(-2)).toBe(3);
    expect(clampPreviewLimit(Number.NaN)).toBe(3);
    expect(clampPreviewLimit(7)).toBe(7);
    expect(clampPreviewLimit(999)).toBe(10);
  });
});

describe("normalizeDependencies", () => {
  it("trims, drops blanks, de-duplicates and sorts", () => {
    expect(normalizeDependencies([" social.profile", "", "game.invites", "social.profile", "  "])).toEqual([
      "game.invites",
      "social.profile",
    ]);
  });
});

describe("staleFallback", () => {
  it("merges prior and new failures without touching the source", () => {
    const source = sampleDashboard();
    source.metadata.degradedDependencies = ["social.profile"];

    const result = staleFallback(source, ["game.invites", "social.profile"]);

    expect(result.metadata).toMatchObject({
      freshness: "stale",
      cacheHit: true,
      degraded: true,
      degradedDependencies: ["game.invites", "social.profile"],
    });
    expect(source.metadata.degradedDependencies).toEqual(["social.profile"]);
    expect(source.metadata.cacheHit).toBe(false);
  });
});
