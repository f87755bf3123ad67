import { BadRequestError, ConflictError, NotFoundError } from "./errors.js";
import { assertEventOwner, canViewEvent } from "./policies.js";
import { includesText } from "./request.js";
import type { DataStore } from "./store.js";
import type { Event, EventCategory } from "../types/event.js";
import type { Profile } from "../types/profile.js";
import type { Rsvp } from "../types/rsvp.js";

export type OrganizerSummary = Pick<Profile, "id" | "name" | "email">;

export interface EventView extends Event {
    organizer: OrganizerSummary | null;
    user_has_rsvped: boolean;
}

export interface RsvpedEventView extends Event {
    organizer: OrganizerSummary | null;
    rsvped_at: string;
}

export interface EventSearch {
    city?: string;
    category?: EventCategory;
    search?: string;
}

export const TRENDING_LIMIT = 10;

export const EVENT_NOT_FOUND = "Event not found";

function organizerOf(profile: Profile | undefined): OrganizerSummary | null {
    return profile ? { id: profile.id, name: profile.name, email: profile.email } : null;
}

/**
 * Flagged events win a place in the top `limit`; within it the most
 * attended come first. Ties keep their start-time order.
 */
export function rankTrending(events: readonly Event[], limit = TRENDING_LIMIT): Event[] {
    const flaggedFirst = [...events].sort((a, b) => Number(b.is_trending) - Number(a.is_trending));
    return flaggedFirst.slice(0, limit).sort((a, b) => b.rsvp_count - a.rsvp_count);
}

export function createEventManager(store: DataStore, now: () => Date = () => new Date()) {
    async function organizers(events: readonly Event[]): Promise<Map<string, Profile>> {
        return store.getProfiles(events.map((event) => event.organizer_id));
    }

    async function loadEvent(eventId: string): Promise<Event> {
        const event = await store.getEvent(eventId);
        if (!event) throw new NotFoundError(EVENT_NOT_FOUND);
        return event;
    }

    async function present(events: readonly Event[], viewerId?: string): Promise<EventView[]> {
        const profiles = await organizers(events);
        const rsvped = new Set<string>();
        if (viewerId) {
            for (const rsvp of await store.listRsvpsByUser(viewerId)) rsvped.add(rsvp.event_id);
        }
        return events.map((event) => ({
            ...event,
            organizer: organizerOf(profiles.get(event.organizer_id)),
            user_has_rsvped: rsvped.has(event.id),
        }));
    }

    return {
        present,

        /** Active, upcoming events, soonest first. */
        async search(query: EventSearch, viewerId?: string): Promise<EventView[]> {
            const events = await store.listEvents({ from: now().toISOString(), category: query.category });
            const city = query.city?.toLowerCase();
            const matching = events.filter(
                (event) =>
                    (!city || event.city.toLowerCase().includes(city)) &&
                    (!query.search || includesText([event.title, event.description], query.search)),
            );
            return present(matching, viewerId);
        },

        async trending(viewerId?: string): Promise<EventView[]> {
            const events = await store.listEvents({ from: now().toISOString() });
            return present(rankTrending(events), viewerId);
        },

        /** Inactive events exist only for their organizer. */
        async getVisible(eventId: string, viewerId?: string): Promise<EventView> {
            const event = await loadEvent(eventId);
            if (!canViewEvent(event, viewerId)) throw new NotFoundError(EVENT_NOT_FOUND);
            const [view] = await present([event], viewerId);
            return view;
        },

        async getOwned(eventId: string, uid: string, action: "update" | "delete"): Promise<Event> {
            const event = await loadEvent(eventId);
            assertEventOwner(event, uid, action);
            return event;
        },

        /**
         * Status, then duplicate, then capacity; the first failing check is
         * reported. The store repeats the checks atomically and a lost race
         * maps onto the same errors.
         */
        async reserveSeat(eventId: string, userId: string): Promise<{ rsvp: Rsvp; event: Event }> {
            const event = await loadEvent(eventId);
            if (event.status !== "active") throw new BadRequestError("Cannot RSVP to inactive event");
            if (await store.getRsvp(eventId, userId)) {
                throw new ConflictError("You have already RSVP'd to this event");
            }
            if (event.capacity !== null && event.rsvp_count >= event.capacity) {
                throw new BadRequestError("Event is at full capacity");
            }

            const outcome = await store.addRsvp(eventId, userId);
            switch (outcome.status) {
                case "created":
                    return { rsvp: outcome.rsvp, event };
                case "missing":
                    throw new NotFoundError(EVENT_NOT_FOUND);
                case "inactive":
                    throw new BadRequestError("Cannot RSVP to inactive event");
                case "duplicate":
                    throw new ConflictError("You have already RSVP'd to this event");
                case "full":
                    throw new BadRequestError("Event is at full capacity");
            }
        },

        async cancelReservation(eventId: string, userId: string): Promise<void> {
            const existing = await store.getRsvp(eventId, userId);
            if (!existing || !(await store.removeRsvp(eventId, userId))) {
                throw new NotFoundError("RSVP not found");
            }
        },

        /** Most recent RSVP first; RSVPs whose event is gone are skipped. */
        async reservations(userId: string): Promise<RsvpedEventView[]> {
            const rsvps = await store.listRsvpsByUser(userId);
            const events = await store.getEvents(rsvps.map((rsvp) => rsvp.event_id));
            const profiles = await organizers([...events.values()]);

            const views: RsvpedEventView[] = [];
            for (const rsvp of rsvps) {
                const event = events.get(rsvp.event_id);
                if (!event) continue;
                views.push({
                    ...event,
                    organizer: organizerOf(profiles.get(event.organizer_id)),
                    rsvped_at: rsvp.created_at,
                });
            }
            return views;
        },
    };
}

export type EventManager = ReturnType<typeof createEventManager>;
