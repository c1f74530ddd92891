import { randomUUID } from "node:crypto";
import { hostname } from "node:os";

import type { CycleLease, CycleLeaseManager } from "../lease/types.js";
import type { AppRedisClient } from "./client.js";

export const LEASE_KEY_PREFIX = "storm-watch:lease:";

// Deletes the key only while it still carries this holder's token.
const RELEASE_IF_OWNER_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

/**
 * Cross-instance cycle lease. Whoever holds it is the only worker reading and
 * writing the shared notifier state for that cycle, so two instances cannot
 * both pass the gate on the same stale state and send the same alert twice.
 *
 * Each acquisition stores a fresh token; the TTL frees the lease if the holder
 * dies mid-cycle.
 */
export class RedisCycleLeaseManager implements CycleLeaseManager {
  private readonly instanceId: string;

  constructor(
    private readonly redis: Pick<AppRedisClient, "set" | "eval">,
    instanceId: string = `${hostname()}:${process.pid}`
  ) {
    this.instanceId = instanceId;
  }

  async tryAcquire(name: string, ttlSeconds: number): Promise<CycleLease | undefined> {
    if (name.trim() === "") {
      throw new Error("Lease name must be non-empty");
    }
    const key = `${LEASE_KEY_PREFIX}${name}`;
    const token = `${this.instanceId}:${randomUUID()}`;

    const reply = await this.redis.set(key, token, { NX: true, EX: ttlSeconds });
    if (reply !== "OK") {
      return undefined;
    }

    return {
      release: async () => {
        await this.redis.eval(RELEASE_IF_OWNER_SCRIPT, { keys: [key], arguments: [token] });
      }
    };
  }
}
