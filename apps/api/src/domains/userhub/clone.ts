import type { CampaignPreview, Dashboard, PendingInvite } from "./types.js";

function cloneDate(value: Date | null): Date | null {
  return value ? new Date(value.getTime()) : null;
}

export function clonePendingInvites(input: readonly PendingInvite[] | null | undefined): PendingInvite[] {
  if (!input?.length) return [];
  return input.map((invite) => ({ ...invite, createdAt: cloneDate(invite.createdAt) }));
}

export function cloneCampaignPreviews(input: readonly CampaignPreview[] | null | undefined): CampaignPreview[] {
  if (!input?.length) return [];
  return input.map((campaign) => ({ ...campaign, updatedAt: cloneDate(campaign.updatedAt) }));
}

/**
 * Copies every nested array and element so that a cached snapshot and the value
 * handed to a caller never share mutable state.
 */
export function cloneDashboard(input: Dashboard): Dashboard {
  return {
    metadata: {
      ...input.metadata,
      degradedDependencies: [...input.metadata.degradedDependencies],
      generatedAt: new Date(input.metadata.generatedAt.getTime()),
    },
    user: { ...input.user },
    invites: { ...input.invites, pending: clonePendingInvites(input.invites.pending) },
    notifications: { ...input.notifications },
    campaigns: { ...input.campaigns, campaigns: cloneCampaignPreviews(input.campaigns.campaigns) },
    nextActions: input.nextActions.map((action) => ({ ...action })),
  };
}
