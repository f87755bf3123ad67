import { Redis } from "ioredis";
import type { FastifyBaseLogger } from "fastify";

/** Does not connect until connectRedis (or the first command). */
export function createRedis(url: string): Redis {
    return new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 });
}

export async function connectRedis(redis: Redis, log: FastifyBaseLogger): Promise<void> {
    redis.on("error", (err) => log.error({ err }, "Redis error"));
    await redis.connect();
    log.info("Redis connected");
}
