import type { DashboardWire } from "@userhub/shared-types";
import type { Dashboard } from "./types.js";
import { toIso } from "../../infra/utils.js";

/** Maps the domain dashboard to the snake_case response body. */
export function toDashboardWire(dashboard: Dashboard): DashboardWire {
  const { metadata, user, invites, notifications, campaigns } = dashboard;
  return {
    metadata: {
      freshness: metadata.freshness,
      cache_hit: metadata.cacheHit,
      degraded: metadata.degraded,
      degraded_dependencies: [...metadata.degradedDependencies],
      generated_at: metadata.generatedAt.toISOString(),
    },
    user: {
      user_id: user.userId,
      username: user.username,
      name: user.name,
      profile_available: user.profileAvailable,
      discoverable: user.discoverable,
      needs_profile_completion: user.needsProfileCompletion,
    },
    invites: {
      available: invites.available,
      listed_count: invites.listedCount,
      has_more: invites.hasMore,
      pending: invites.pending.map((invite) => ({
        invite_id: invite.inviteId,
        campaign_id: invite.campaignId,
        campaign_name: invite.campaignName,
        participant_id: invite.participantId,
        created_at: toIso(invite.createdAt),
      })),
    },
    notifications: {
      available: notifications.available,
      has_unread: notifications.hasUnread,
      unread_count: notifications.unreadCount,
    },
    campaigns: {
      available: campaigns.available,
      listed_count: campaigns.listedCount,
      active_count: campaigns.activeCount,
      has_more: campaigns.hasMore,
      campaigns: campaigns.campaigns.map((campaign) => ({
        campaign_id: campaign.campaignId,
        name: campaign.name,
        status: campaign.status,
        participant_count: campaign.participantCount,
        character_count: campaign.characterCount,
        updated_at: toIso(campaign.updatedAt),
      })),
    },
    next_actions: dashboard.nextActions.map((action) => ({ id: action.id, priority: action.priority })),
  };
}
