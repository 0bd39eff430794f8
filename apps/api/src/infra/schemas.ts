import { z } from "zod";

// ---------------------------------------------------------------------------
// Reusable primitives
// ---------------------------------------------------------------------------

const optionalTrimmedString = (max = 500) =>
  z.string().transform((s) => s.trim()).pipe(z.string().max(max)).optional().transform((v) => v || "");

// Zero, negative and absent all mean "use the default"; the service clamps the rest.
const previewLimit = z.coerce.number().int().optional().default(0);

// ---------------------------------------------------------------------------
// Dashboard schemas
// ---------------------------------------------------------------------------

export const DashboardQuerySchema = z.object({
  locale: optionalTrimmedString(35),
  campaign_preview_limit: previewLimit,
  invite_preview_limit: previewLimit,
});

export type DashboardQuery = z.infer<typeof DashboardQuerySchema>;

// ---------------------------------------------------------------------------
// Upstream payload schemas
// ---------------------------------------------------------------------------

const upstreamText = z.string().nullish().transform((v) => (v ?? "").trim());
const upstreamCount = z.coerce.number().int().catch(0);
const upstreamTimestamp = z.string().nullish().transform((v) => v ?? null);

export const CampaignPreviewPayloadSchema = z.object({
  campaign_id: z.string().min(1),
  name: upstreamText,
  status: z.string().nullish().transform((v) => (v ?? "").trim().toLowerCase()),
  participant_count: upstreamCount,
  character_count: upstreamCount,
  updated_at: upstreamTimestamp,
});

export const CampaignPagePayloadSchema = z.object({
  campaigns: z.array(CampaignPreviewPayloadSchema).nullish().transform((v) => v ?? []),
  has_more: z.boolean().nullish().transform((v) => Boolean(v)),
});

export const PendingInvitePayloadSchema = z.object({
  invite_id: z.string().min(1),
  campaign_id: upstreamText,
  campaign_name: upstreamText,
  participant_id: upstreamText,
  created_at: upstreamTimestamp,
});

export const InvitePagePayloadSchema = z.object({
  invites: z.array(PendingInvitePayloadSchema).nullish().transform((v) => v ?? []),
  has_more: z.boolean().nullish().transform((v) => Boolean(v)),
});

export const UserProfilePayloadSchema = z.object({
  username: upstreamText,
  name: upstreamText,
});

export const UnreadStatusPayloadSchema = z.object({
  has_unread: z.boolean(),
  unread_count: upstreamCount,
});
