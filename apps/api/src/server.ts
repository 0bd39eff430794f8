import Fastify from "fastify";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { sendError, toApiError } from "./infra/api-contract.js";
import { requestIdOf, resolveRequestId } from "./infra/utils.js";
import { registerDashboardRoutes } from "./routes/dashboard.js";
import { registerHealthRoutes } from "./routes/health.js";
import type { Metrics } from "./routes/health.js";
import type { UserHubService } from "./domains/userhub/service.js";
import type { Logger } from "./types/index.js";

export interface ServerDeps {
  userhub: UserHubService | null;
  logger?: Logger | Console;
}

type Handler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown> | unknown;

export function buildServer(deps: ServerDeps): FastifyInstance {
  const { userhub, logger = console } = deps;

  const app = Fastify({
    logger: false,
    genReqId: (req) => resolveRequestId(req.headers["x-request-id"]),
  });

  const metrics: Metrics = {
    requests_total: 0,
    responses_total: 0,
    errors_total: 0,
    status_counts: {},
    route_times: {},
  };

  app.addHook("onRequest", async (request, reply) => {
    metrics.requests_total++;
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (_request, reply) => {
    metrics.responses_total++;
    const key = String(reply.statusCode);
    metrics.status_counts[key] = (metrics.status_counts[key] || 0) + 1;
  });

  function recordRouteTime(path: string, elapsedMs: number) {
    const entry = metrics.route_times[path] || { count: 0, total_ms: 0, max_ms: 0 };
    entry.count++;
    entry.total_ms += elapsedMs;
    entry.max_ms = Math.max(entry.max_ms, elapsedMs);
    metrics.route_times[path] = entry;
  }

  function registerGet(path: string, handler: Handler) {
    app.get(path, async (request, reply) => {
      const started = Date.now();
      try {
        return await handler(request, reply);
      } catch (error) {
        metrics.errors_total++;
        const apiError = toApiError(error);
        if (apiError.status >= 500) {
          logger.error(
            { request_id: requestIdOf(request), path, code: apiError.code, error: error instanceof Error ? error.message : String(error) },
            "request failed"
          );
        }
        return sendError(reply, requestIdOf(request), apiError);
      } finally {
        recordRouteTime(path, Date.now() - started);
      }
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.code(404).send({ ok: false, error: "not_found", message: "Route not found", request_id: requestIdOf(request) });
  });

  registerHealthRoutes({ registerGet, metrics, userhub });
  registerDashboardRoutes({ registerGet, userhub });

  return app;
}
