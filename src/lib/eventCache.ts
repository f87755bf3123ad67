import { eventSchema, type Event } from "../types/event.js";

/** The slice of an ioredis client the cache uses. */
export interface CacheClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
    expire(key: string, seconds: number): Promise<number>;
    del(key: string): Promise<number>;
}

export const DEFAULT_EVENT_TTL_SEC = 3600;

/**
 * Read-through cache for single events with a sliding TTL. Every write path
 * that changes an event document (including its rsvp_count) must invalidate.
 */
export class EventCache {
    constructor(
        private readonly redis: CacheClient,
        private readonly ttlSec = DEFAULT_EVENT_TTL_SEC,
    ) {}

    private key(eventId: string): string {
        return `event:${eventId}`;
    }

    async get(eventId: string): Promise<Event | null> {
        const key = this.key(eventId);
        const cached = await this.redis.get(key);
        if (!cached) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(cached);
        } catch {
            await this.redis.del(key);
            return null;
        }
        const parsed = eventSchema.safeParse(raw);
        if (!parsed.success) {
            await this.redis.del(key);
            return null;
        }

        await this.redis.expire(key, this.ttlSec);
        return parsed.data;
    }

    async set(event: Event): Promise<void> {
        await this.redis.set(this.key(event.id), JSON.stringify(event), "EX", this.ttlSec);
    }

    async invalidate(eventId: string): Promise<void> {
        await this.redis.del(this.key(eventId));
    }
}
