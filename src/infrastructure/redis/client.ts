import { createClient } from "redis";

import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";

export interface RedisConnectionOptions {
  url: string;
  clientName?: string;
  logger?: Logger;
}

export type AppRedisClient = ReturnType<typeof createClient>;

const MAX_RECONNECT_DELAY_MS = 2_000;

/**
 * Opens the connection shared by the cycle lease and the notifier state
 * store. Errors after startup are logged while the client reconnects.
 */
export async function connectRedis({
  url,
  clientName,
  logger = createNoopLogger()
}: RedisConnectionOptions): Promise<AppRedisClient> {
  const client = createClient({
    url,
    ...(clientName ? { name: clientName } : {}),
    socket: {
      reconnectStrategy: (retries: number) => Math.min(retries * 100, MAX_RECONNECT_DELAY_MS)
    }
  });
  client.on("error", (error: unknown) => {
    logger.error("redis connection error", { error: errorMessage(error) });
  });

  await client.connect();
  logger.info("redis connected", { client_name: clientName });
  return client;
}

export async function disconnectRedis(
  client: AppRedisClient,
  logger: Logger = createNoopLogger()
): Promise<void> {
  try {
    await client.quit();
  } catch (error) {
    logger.warn("redis quit failed, forcing disconnect", { error: errorMessage(error) });
    await client.disconnect();
  }
}
