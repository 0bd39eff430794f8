import type {
  CampaignGateway,
  CampaignPage,
  Dashboard,
  GatewayCallOptions,
  InvitePage,
  NotificationGateway,
  ProfileGateway,
  UnreadStatus,
  UserProfile,
} from "../types.js";

type Outcome<T> = T | Error;

function settle<T>(outcome: Outcome<T>): Promise<T> {
  return outcome instanceof Error ? Promise.reject(outcome) : Promise.resolve(outcome);
}

export interface FakeGateways {
  campaigns: CampaignGateway;
  profiles: ProfileGateway;
  notifications: NotificationGateway;
  calls: Record<"campaigns" | "invites" | "profile" | "unread", number>;
  limits: { campaigns: number[]; invites: number[] };
  signals: Array<AbortSignal | undefined>;
  campaignPage: Outcome<CampaignPage>;
  invitePage: Outcome<InvitePage>;
  profile: Outcome<UserProfile>;
  unread: Outcome<UnreadStatus>;
}

export function createFakeGateways(): FakeGateways {
  const fake: FakeGateways = {
    calls: { campaigns: 0, invites: 0, profile: 0, unread: 0 },
    limits: { campaigns: [], invites: [] },
    signals: [],
    campaignPage: {
      campaigns: [
        {
          campaignId: "c-1",
          name: "Ashes of Vell",
          status: "active",
          participantCount: 4,
          characterCount: 5,
          updatedAt: new Date("2026-03-01T10:00:00.000Z"),
        },
      ],
      hasMore: false,
    },
    invitePage: {
      invites: [
        {
          inviteId: "inv-1",
          campaignId: "c-2",
          campaignName: "Salt Road",
          participantId: "p-9",
          createdAt: new Date("2026-03-02T08:30:00.000Z"),
        },
      ],
      hasMore: false,
    },
    profile: { username: "", name: "Rowan" },
    unread: { hasUnread: true, unreadCount: 2 },
    campaigns: {
      listCampaignPreviews(_userId: string, limit: number, options?: GatewayCallOptions) {
        fake.calls.campaigns++;
        fake.limits.campaigns.push(limit);
        fake.signals.push(options?.signal);
        return settle(fake.campaignPage);
      },
      listPendingInvitePreviews(_userId: string, limit: number) {
        fake.calls.invites++;
        fake.limits.invites.push(limit);
        return settle(fake.invitePage);
      },
    },
    profiles: {
      getUserProfile() {
        fake.calls.profile++;
        return settle(fake.profile);
      },
    },
    notifications: {
      getUnreadStatus() {
        fake.calls.unread++;
        return settle(fake.unread);
      },
    },
  };
  return fake;
}

export function totalCalls(fake: FakeGateways): number {
  const { campaigns, invites, profile, unread } = fake.calls;
  return campaigns + invites + profile + unread;
}

export function sampleDashboard(generatedAt = new Date("2026-03-05T12:00:00.000Z")): Dashboard {
  return {
    metadata: {
      freshness: "fresh",
      cacheHit: false,
      degraded: false,
      degradedDependencies: [],
      generatedAt,
    },
    user: {
      userId: "user-1",
      username: "rowan",
      name: "Rowan",
      profileAvailable: true,
      discoverable: true,
      needsProfileCompletion: false,
    },
    invites: {
      available: true,
      listedCount: 1,
      hasMore: false,
      pending: [
        {
          inviteId: "inv-1",
          campaignId: "c-2",
          campaignName: "Salt Road",
          participantId: "p-9",
          createdAt: new Date("2026-03-02T08:30:00.000Z"),
        },
      ],
    },
    notifications: { available: true, hasUnread: false, unreadCount: 0 },
    campaigns: {
      available: true,
      listedCount: 1,
      activeCount: 1,
      hasMore: false,
      campaigns: [
        {
          campaignId: "c-1",
          name: "Ashes of Vell",
          status: "active",
          participantCount: 4,
          characterCount: 5,
          updatedAt: new Date("2026-03-01T10:00:00.000Z"),
        },
      ],
    },
    nextActions: [
      { id: "review_pending_invites", priority: 100 },
      { id: "continue_active_campaign", priority: 70 },
    ],
  };
}

export function silentLogger() {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
