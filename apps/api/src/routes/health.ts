import { sendOk } from "../infra/api-contract.js";
import { getCircuitBreakerStates } from "../infra/http.js";
import { requestIdOf } from "../infra/utils.js";
import type { UserHubService } from "../domains/userhub/service.js";
import type { FastifyReply, FastifyRequest } from "fastify";

export type Metrics = {
  requests_total: number;
  responses_total: number;
  errors_total: number;
  status_counts: Record<string, number>;
  route_times: Record<string, { count: number; total_ms: number; max_ms: number }>;
};

type ReplyLike = FastifyReply;
type RegisterFn = (
  path: string,
  handler: (request: FastifyRequest, reply: ReplyLike) => Promise<unknown> | unknown
) => void;

interface RouteCtx {
  registerGet: RegisterFn;
  metrics: Metrics;
  userhub: Pick<UserHubService, "getStats" | "cache"> | null;
}

export function registerHealthRoutes(ctx: RouteCtx) {
  const { registerGet, metrics, userhub } = ctx;

  registerGet("/health", async (request, reply) => {
    return sendOk(reply, requestIdOf(request), { service: "userhub" });
  });

  registerGet("/metrics", async (_request, reply) => {
    const mem = process.memoryUsage();
    const lines = [
      "# TYPE app_requests_total counter",
      `app_requests_total ${metrics.requests_total}`,
      "# TYPE app_responses_total counter",
      `app_responses_total ${metrics.responses_total}`,
      "# TYPE app_errors_total counter",
      `app_errors_total ${metrics.errors_total}`,
      "# TYPE app_process_uptime_seconds gauge",
      `app_process_uptime_seconds ${Math.floor(process.uptime())}`,
      "# TYPE app_process_heap_bytes gauge",
      `app_process_heap_bytes ${mem.heapUsed}`,
      "# TYPE app_process_rss_bytes gauge",
      `app_process_rss_bytes ${mem.rss}`,
    ];

    if (userhub) {
      const stats = userhub.getStats();
      const cacheStats = userhub.cache.getStats();
      lines.push(
        "# TYPE userhub_dashboard_requests_total counter",
        `userhub_dashboard_requests_total ${stats.requests_total}`,
        "# TYPE userhub_fresh_cache_hits_total counter",
        `userhub_fresh_cache_hits_total ${stats.fresh_cache_hits_total}`,
        "# TYPE userhub_stale_fallbacks_total counter",
        `userhub_stale_fallbacks_total ${stats.stale_fallbacks_total}`,
        "# TYPE userhub_degraded_total counter",
        `userhub_degraded_total ${stats.degraded_total}`,
        "# TYPE userhub_unavailable_total counter",
        `userhub_unavailable_total ${stats.unavailable_total}`,
        "# TYPE userhub_cache_entries gauge",
        `userhub_cache_entries ${cacheStats.entries}`,
        "# TYPE userhub_cache_fresh_hits_total counter",
        `userhub_cache_fresh_hits_total ${cacheStats.fresh_hits}`,
        "# TYPE userhub_cache_stale_hits_total counter",
        `userhub_cache_stale_hits_total ${cacheStats.stale_hits}`,
        "# TYPE userhub_cache_misses_total counter",
        `userhub_cache_misses_total ${cacheStats.misses}`,
        "# TYPE userhub_cache_sets_total counter",
        `userhub_cache_sets_total ${cacheStats.sets}`
      );
      for (const [dependency, count] of Object.entries(stats.dependency_failures_total)) {
        lines.push(`userhub_dependency_failures_total{dependency="${dependency}"} ${count}`);
      }
    }

    for (const [statusCode, count] of Object.entries(metrics.status_counts)) {
      lines.push(`app_response_status_total{status="${statusCode}"} ${count}`);
    }
    for (const [route, t] of Object.entries(metrics.route_times)) {
      const avgMs = t.count > 0 ? (t.total_ms / t.count).toFixed(1) : "0";
      lines.push(`app_route_response_avg_ms{route="${route}"} ${avgMs}`);
      lines.push(`app_route_response_max_ms{route="${route}"} ${t.max_ms.toFixed(1)}`);
      lines.push(`app_route_requests_total{route="${route}"} ${t.count}`);
    }

    for (const cb of getCircuitBreakerStates()) {
      lines.push(`app_circuit_breaker_state{host="${cb.name}",state="${cb.state}"} ${cb.state === "open" ? 1 : 0}`);
      lines.push(`app_circuit_breaker_failures{host="${cb.name}"} ${cb.failures}`);
    }
    reply.type("text/plain; version=0.0.4");
    return lines.join("\n");
  });
}
