import { fail, parseQuery, sendOk } from "../infra/api-contract.js";
import { DashboardQuerySchema } from "../infra/schemas.js";
import { headerText, requestIdOf } from "../infra/utils.js";
import { toDashboardWire } from "../domains/userhub/serialize.js";
import type { UserHubService } from "../domains/userhub/service.js";
import type { FastifyReply, FastifyRequest } from "fastify";

type ReplyLike = FastifyReply;
type RegisterFn = (
  path: string,
  handler: (request: FastifyRequest, reply: ReplyLike) => Promise<unknown> | unknown
) => void;

interface RouteCtx {
  registerGet: RegisterFn;
  userhub: Pick<UserHubService, "getDashboard"> | null;
}

export const USER_ID_HEADER = "x-user-id";

/**
 * User dashboard route. Identity comes from the x-user-id header set by the
 * authenticating proxy in front of this service.
 */
export function registerDashboardRoutes(ctx: RouteCtx) {
  const { registerGet, userhub } = ctx;

  registerGet("/dashboard", async (request, reply) => {
    if (!userhub) fail(500, "service_not_configured", "userhub service is not configured");

    const query = parseQuery(DashboardQuerySchema, request.query);
    const userId = headerText(request.headers[USER_ID_HEADER]);

    const ctrl = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) ctrl.abort(new Error("client disconnected"));
    };
    reply.raw.on("close", onClose);

    try {
      const dashboard = await userhub.getDashboard(
        {
          userId,
          locale: query.locale,
          campaignPreviewLimit: query.campaign_preview_limit,
          invitePreviewLimit: query.invite_preview_limit,
        },
        { signal: ctrl.signal }
      );
      return sendOk(reply, requestIdOf(request), { dashboard: toDashboardWire(dashboard) });
    } finally {
      reply.raw.off("close", onClose);
    }
  });
}
