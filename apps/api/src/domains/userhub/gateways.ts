import type { z } from "zod";
import { ProfileNotFoundError } from "./errors.js";
import { CAMPAIGN_STATUSES } from "./types.js";
import type {
  CampaignGateway,
  CampaignPage,
  CampaignStatus,
  GatewayCallOptions,
  InvitePage,
  NotificationGateway,
  ProfileGateway,
  UnreadStatus,
  UserProfile,
} from "./types.js";
import { fetchWithRetry } from "../../infra/http.js";
import {
  CampaignPagePayloadSchema,
  InvitePagePayloadSchema,
  UnreadStatusPayloadSchema,
  UserProfilePayloadSchema,
} from "../../infra/schemas.js";
import { toDate } from "../../infra/utils.js";
import type { Logger } from "../../types/index.js";

export interface HttpGatewayOptions {
  baseUrl: string;
  token?: string | null;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  logger?: Logger | Console;
}

export class UpstreamError extends Error {
  status: number;
  url: string;

  constructor(url: string, status: number, message?: string) {
    super(message || `upstream request failed with status ${status}`);
    this.name = "UpstreamError";
    this.status = status;
    this.url = url;
  }
}

function toCampaignStatus(value: string): CampaignStatus {
  return CAMPAIGN_STATUSES.find((status) => status === value) ?? "unspecified";
}

function createJsonClient(opts: HttpGatewayOptions) {
  const baseUrl = String(opts.baseUrl || "").replace(/\/+$/, "");
  const { token, timeoutMs = 5_000, retries = 1, backoffMs = 200, logger = console } = opts;

  function urlFor(path: string, query: Record<string, string | number> = {}): string {
    const url = new URL(`${baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async function request(url: string, options: GatewayCallOptions): Promise<Response> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (token) headers.authorization = `Bearer ${token}`;
    return fetchWithRetry(url, {
      method: "GET",
      headers,
      signal: options.signal,
      retries,
      timeoutMs,
      backoffMs,
      logger,
    });
  }

  async function decode<T>(url: string, response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    if (!response.ok) {
      throw new UpstreamError(url, response.status);
    }
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError(url, response.status, `upstream returned invalid json: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(url, response.status, `upstream payload rejected: ${parsed.error.issues[0]?.message || "invalid"}`);
    }
    return parsed.data;
  }

  return { urlFor, request, decode };
}

function userPath(userId: string, suffix: string): string {
  return `/users/${encodeURIComponent(userId)}${suffix}`;
}

export function createHttpCampaignGateway(opts: HttpGatewayOptions): CampaignGateway {
  const client = createJsonClient(opts);

  return {
    async listCampaignPreviews(userId: string, limit: number, options: GatewayCallOptions = {}): Promise<CampaignPage> {
      const url = client.urlFor(userPath(userId, "/campaigns"), { limit });
      const payload = await client.decode(url, await client.request(url, options), CampaignPagePayloadSchema);
      return {
        campaigns: payload.campaigns.map((row) => ({
          campaignId: row.campaign_id,
          name: row.name,
          status: toCampaignStatus(row.status),
          participantCount: Math.max(0, row.participant_count),
          characterCount: Math.max(0, row.character_count),
          updatedAt: toDate(row.updated_at),
        })),
        hasMore: payload.has_more,
      };
    },

    async listPendingInvitePreviews(userId: string, limit: number, options: GatewayCallOptions = {}): Promise<InvitePage> {
      const url = client.urlFor(userPath(userId, "/invites"), { status: "pending", limit });
      const payload = await client.decode(url, await client.request(url, options), InvitePagePayloadSchema);
      return {
        invites: payload.invites.map((row) => ({
          inviteId: row.invite_id,
          campaignId: row.campaign_id,
          campaignName: row.campaign_name,
          participantId: row.participant_id,
          createdAt: toDate(row.created_at),
        })),
        hasMore: payload.has_more,
      };
    },
  };
}

export function createHttpProfileGateway(opts: HttpGatewayOptions): ProfileGateway {
  const client = createJsonClient(opts);

  return {
    async getUserProfile(userId: string, options: GatewayCallOptions = {}): Promise<UserProfile> {
      const url = client.urlFor(userPath(userId, "/profile"));
      const response = await client.request(url, options);
      if (response.status === 404) {
        throw new ProfileNotFoundError();
      }
      const payload = await client.decode(url, response, UserProfilePayloadSchema);
      return { username: payload.username, name: payload.name };
    },
  };
}

export function createHttpNotificationGateway(opts: HttpGatewayOptions): NotificationGateway {
  const client = createJsonClient(opts);

  return {
    async getUnreadStatus(userId: string, options: GatewayCallOptions = {}): Promise<UnreadStatus> {
      const url = client.urlFor(userPath(userId, "/unread"));
      const payload = await client.decode(url, await client.request(url, options), UnreadStatusPayloadSchema);
      return { hasUnread: payload.has_unread, unreadCount: payload.unread_count };
    },
  };
}
