// ── Enumerations ───────────────────────────────────────────────

export type Freshness = "unspecified" | "fresh" | "stale";

export type CampaignStatus = "unspecified" | "draft" | "active" | "completed" | "archived";

export const CAMPAIGN_STATUSES: readonly CampaignStatus[] = [
  "unspecified",
  "draft",
  "active",
  "completed",
  "archived",
];

export type DashboardActionId =
  | "review_pending_invites"
  | "complete_profile"
  | "create_or_join_campaign"
  | "continue_active_campaign"
  | "review_notifications";

// ── Dashboard aggregate ────────────────────────────────────────

export interface DashboardMetadata {
  freshness: Freshness;
  cacheHit: boolean;
  degraded: boolean;
  /** Deduplicated and sorted. */
  degradedDependencies: string[];
  generatedAt: Date;
}

export interface UserSummary {
  userId: string;
  username: string;
  name: string;
  profileAvailable: boolean;
  discoverable: boolean;
  needsProfileCompletion: boolean;
}

export interface PendingInvite {
  inviteId: string;
  campaignId: string;
  campaignName: string;
  participantId: string;
  createdAt: Date | null;
}

export interface InviteSummary {
  available: boolean;
  listedCount: number;
  hasMore: boolean;
  pending: PendingInvite[];
}

export interface NotificationSummary {
  available: boolean;
  hasUnread: boolean;
  unreadCount: number;
}

export interface CampaignPreview {
  campaignId: string;
  name: string;
  status: CampaignStatus;
  participantCount: number;
  characterCount: number;
  updatedAt: Date | null;
}

export interface CampaignSummary {
  available: boolean;
  listedCount: number;
  activeCount: number;
  hasMore: boolean;
  campaigns: CampaignPreview[];
}

export interface DashboardAction {
  id: DashboardActionId;
  priority: number;
}

/**
 * At-a-glance view for one user. A section whose `available` flag is false
 * carries zero values (or a from-cache copy) and must not be read as live data.
 */
export interface Dashboard {
  metadata: DashboardMetadata;
  user: UserSummary;
  invites: InviteSummary;
  notifications: NotificationSummary;
  campaigns: CampaignSummary;
  nextActions: DashboardAction[];
}

// ── Requests ───────────────────────────────────────────────────

export interface GetDashboardInput {
  userId: string;
  /** Only partitions the cache. */
  locale?: string;
  campaignPreviewLimit?: number;
  invitePreviewLimit?: number;
}

export interface GetDashboardOptions {
  signal?: AbortSignal;
}

// ── Upstream gateways ──────────────────────────────────────────

export interface GatewayCallOptions {
  signal?: AbortSignal;
}

export interface UserProfile {
  username: string;
  name: string;
}

export interface UnreadStatus {
  hasUnread: boolean;
  unreadCount: number;
}

export interface CampaignPage {
  campaigns: CampaignPreview[];
  hasMore: boolean;
}

export interface InvitePage {
  invites: PendingInvite[];
  hasMore: boolean;
}

export interface CampaignGateway {
  listCampaignPreviews(userId: string, limit: number, options?: GatewayCallOptions): Promise<CampaignPage>;
  listPendingInvitePreviews(userId: string, limit: number, options?: GatewayCallOptions): Promise<InvitePage>;
}

/** Rejects with `ProfileNotFoundError` when the user has no profile. */
export interface ProfileGateway {
  getUserProfile(userId: string, options?: GatewayCallOptions): Promise<UserProfile>;
}

export interface NotificationGateway {
  getUnreadStatus(userId: string, options?: GatewayCallOptions): Promise<UnreadStatus>;
}
