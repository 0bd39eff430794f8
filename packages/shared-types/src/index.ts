// @userhub/shared-types: cross-service type definitions
// These types are shared between apps/api and the clients of its HTTP surface.

// ── Logger ─────────────────────────────────────────────────────

export interface Logger {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
  child?(bindings: Record<string, unknown>): Logger;
}

// ── Dashboard wire shape ───────────────────────────────────────

export type DashboardFreshnessWire = "unspecified" | "fresh" | "stale";

export type CampaignStatusWire = "unspecified" | "draft" | "active" | "completed" | "archived";

export type DashboardActionIdWire =
  | "review_pending_invites"
  | "complete_profile"
  | "create_or_join_campaign"
  | "continue_active_campaign"
  | "review_notifications";

export interface DashboardMetadataWire {
  freshness: DashboardFreshnessWire;
  cache_hit: boolean;
  degraded: boolean;
  degraded_dependencies: string[];
  generated_at: string;
}

export interface UserSummaryWire {
  user_id: string;
  username: string;
  name: string;
  profile_available: boolean;
  discoverable: boolean;
  needs_profile_completion: boolean;
}

export interface PendingInviteWire {
  invite_id: string;
  campaign_id: string;
  campaign_name: string;
  participant_id: string;
  created_at: string | null;
}

export interface InviteSummaryWire {
  available: boolean;
  listed_count: number;
  has_more: boolean;
  pending: PendingInviteWire[];
}

export interface NotificationSummaryWire {
  available: boolean;
  has_unread: boolean;
  unread_count: number;
}

export interface CampaignPreviewWire {
  campaign_id: string;
  name: string;
  status: CampaignStatusWire;
  participant_count: number;
  character_count: number;
  updated_at: string | null;
}

export interface CampaignSummaryWire {
  available: boolean;
  listed_count: number;
  active_count: number;
  has_more: boolean;
  campaigns: CampaignPreviewWire[];
}

export interface DashboardActionWire {
  id: DashboardActionIdWire;
  priority: number;
}

export interface DashboardWire {
  metadata: DashboardMetadataWire;
  user: UserSummaryWire;
  invites: InviteSummaryWire;
  notifications: NotificationSummaryWire;
  campaigns: CampaignSummaryWire;
  next_actions: DashboardActionWire[];
}
