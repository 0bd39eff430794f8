import type { Dashboard, DashboardAction } from "./types.js";

export const ACTION_PRIORITY = {
  review_pending_invites: 100,
  complete_profile: 90,
  create_or_join_campaign: 80,
  continue_active_campaign: 70,
  review_notifications: 60,
} as const;

/**
 * Suggested next steps for the assembled (possibly degraded) dashboard,
 * highest priority first. Equal priorities keep the order they were added in.
 */
export function buildDashboardActions(dashboard: Dashboard): DashboardAction[] {
  const actions: DashboardAction[] = [];
  const { invites, user, campaigns, notifications } = dashboard;

  if (invites.available && invites.listedCount > 0) {
    actions.push({ id: "review_pending_invites", priority: ACTION_PRIORITY.review_pending_invites });
  }
  if (user.needsProfileCompletion) {
    actions.push({ id: "complete_profile", priority: ACTION_PRIORITY.complete_profile });
  }
  if (campaigns.available && campaigns.listedCount === 0 && !campaigns.hasMore) {
    actions.push({ id: "create_or_join_campaign", priority: ACTION_PRIORITY.create_or_join_campaign });
  }
  if (campaigns.available && campaigns.activeCount > 0) {
    actions.push({ id: "continue_active_campaign", priority: ACTION_PRIORITY.continue_active_campaign });
  }
  if (notifications.available && notifications.hasUnread) {
    actions.push({ id: "review_notifications", priority: ACTION_PRIORITY.review_notifications });
  }

  return sortActions(actions);
}

// Array.prototype.sort is stable since ES2019.
export function sortActions(actions: readonly DashboardAction[]): DashboardAction[] {
  return [...actions].sort((a, b) => b.priority - a.priority);
}
