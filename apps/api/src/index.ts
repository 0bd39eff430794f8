import "dotenv/config";

import { loadConfig, validateUpstreams } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";
import { buildServer } from "./server.js";
import {
  createHttpCampaignGateway,
  createHttpNotificationGateway,
  createHttpProfileGateway,
  createUserHubService,
} from "./domains/userhub/index.js";
import type { HttpGatewayOptions } from "./domains/userhub/index.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger("userhub-api", config.logLevel);
  validateUpstreams(config, logger);

  const { upstream } = config;
  const gatewayOptions = (baseUrl: string, name: string): HttpGatewayOptions => ({
    baseUrl,
    token: upstream.token,
    timeoutMs: upstream.timeoutMs,
    retries: upstream.retries,
    logger: logger.child({ gateway: name }),
  });

  const userhub = createUserHubService({
    campaigns: upstream.campaignsUrl ? createHttpCampaignGateway(gatewayOptions(upstream.campaignsUrl, "campaigns")) : null,
    profiles: upstream.socialUrl ? createHttpProfileGateway(gatewayOptions(upstream.socialUrl, "social")) : null,
    notifications: upstream.notificationsUrl
      ? createHttpNotificationGateway(gatewayOptions(upstream.notificationsUrl, "notifications"))
      : null,
    config: {
      cacheFreshTtlMs: config.cache.freshTtlMs,
      cacheStaleTtlMs: config.cache.staleTtlMs,
    },
    logger: logger.child({ component: "userhub" }),
  });

  const app = buildServer({ userhub, logger });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "shutting down");
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    }
  };
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));

  await app.listen({ host: config.host, port: config.port });
  logger.info({ host: config.host, port: config.port }, "userhub api listening");
}

main().catch((error) => {
  const logger = createLogger("userhub-api");
  logger.fatal({ err: error }, "userhub api crashed");
  process.exit(1);
});
