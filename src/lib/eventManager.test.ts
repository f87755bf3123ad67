import { describe, expect, it } from "vitest";
import { createEventManager, rankTrending } from "./eventManager.js";
import { MemoryStore } from "../testing/memoryStore.js";
import type { Event, NewEvent } from "../types/event.js";

function event(id: string, overrides: Partial<Event> = {}): Event {
    return {
        id,
        organizer_id: "org-1",
        title: `Event ${id}`,
        description: "Something to attend",
        datetime: "2030-06-01T18:00:00.000Z",
        end_datetime: null,
        location: "Main Hall",
        city: "Lahore",
        address: null,
        category: "tech",
        image_url: null,
        capacity: null,
        status: "active",
        is_trending: false,
        rsvp_count: 0,
        created_at: "2030-01-01T00:00:00.000Z",
        updated_at: "2030-01-01T00:00:00.000Z",
        ...overrides,
    };
}

describe("rankTrending", () => {
    it("keeps flagged events in the cut before ordering by attendance", () => {
        const ranked = rankTrending(
            [
                event("a", { is_trending: true, rsvp_count: 1 }),
                event("b", { rsvp_count: 9 }),
                event("c", { is_trending: true, rsvp_count: 5 }),
            ],
            2,
        );
        expect(ranked.map((e) => e.id)).toEqual(["c", "a"]);
    });

    it("keeps start-time order between equal counts", () => {
        const ranked = rankTrending([event("a", { rsvp_count: 3 }), event("b", { rsvp_count: 3 }), event("c")]);
        expect(ranked.map((e) => e.id)).toEqual(["a", "b", "c"]);
    });

    it("returns at most ten events by default", () => {
        const many = Array.from({ length: 12 }, (_, i) => event(`e${i}`));
        expect(rankTrending(many)).toHaveLength(10);
    });
});

describe("createEventManager", () => {
    const now = () => new Date("2030-01-01T00:00:00.000Z");

    it("leaves out RSVPs whose event no longer exists", async () => {
        const store = new MemoryStore();
        const manager = createEventManager(store, now);
        const input: NewEvent = {
            organizer_id: "org-1",
            title: "Launch Party",
            description: "An evening of demos",
            datetime: "2030-06-01T18:00:00.000Z",
            end_datetime: null,
            location: "Main Hall",
            city: "Lahore",
            address: null,
            category: "tech",
            image_url: null,
            capacity: null,
        };
        const kept = await store.createEvent(input);
        const dropped = await store.createEvent(input);
        await store.addRsvp(kept.id, "user-1");
        await store.addRsvp(dropped.id, "user-1");
        store.events.delete(dropped.id);

        const views = await manager.reservations("user-1");

        expect(views.map((view) => view.id)).toEqual([kept.id]);
        expect(views[0].organizer).toBeNull();
    });
});
