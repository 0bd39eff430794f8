export * from "./types.js";
export * from "./errors.js";
export { buildDashboardActions, ACTION_PRIORITY } from "./actions.js";
export { createDashboardCache, DEFAULT_CACHE_FRESH_TTL_MS, DEFAULT_CACHE_STALE_TTL_MS } from "./dashboard-cache.js";
export type { DashboardCache, DashboardCacheKey, DashboardCacheStats } from "./dashboard-cache.js";
export { createUserHubService, clampPreviewLimit, DEFAULT_PREVIEW_LIMIT, MAX_PREVIEW_LIMIT } from "./service.js";
export type { UserHubConfig, UserHubDeps, UserHubService, UserHubStats } from "./service.js";
export {
  createHttpCampaignGateway,
  createHttpNotificationGateway,
  createHttpProfileGateway,
  UpstreamError,
} from "./gateways.js";
export type { HttpGatewayOptions } from "./gateways.js";
export { toDashboardWire } from "./serialize.js";
