import { z } from "zod";

export const EVENT_CATEGORIES = [
    "music",
    "tech",
    "sports",
    "food",
    "arts",
    "business",
    "workshop",
    "networking",
    "entertainment",
    "other",
] as const;

export const EVENT_STATUSES = ["active", "canceled", "completed"] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];
export type EventStatus = (typeof EVENT_STATUSES)[number];

export const eventSchema = z.object({
    id: z.string(),
    organizer_id: z.string(),
    title: z.string(),
    description: z.string(),
    datetime: z.string(),
    end_datetime: z.string().nullable(),
    location: z.string(),
    city: z.string(),
    address: z.string().nullable(),
    category: z.enum(EVENT_CATEGORIES),
    image_url: z.string().nullable(),
    capacity: z.number().int().nullable(),
    status: z.enum(EVENT_STATUSES),
    is_trending: z.boolean(),
    // maintained by the store inside the RSVP transactions
    rsvp_count: z.number().int(),
    created_at: z.string(),
    updated_at: z.string(),
});

export type Event = z.infer<typeof eventSchema>;

export type NewEvent = Omit<Event, "id" | "is_trending" | "rsvp_count" | "status" | "created_at" | "updated_at">;

export type EventPatch = Partial<
    Pick<
        Event,
        | "title"
        | "description"
        | "datetime"
        | "end_datetime"
        | "location"
        | "city"
        | "address"
        | "category"
        | "image_url"
        | "capacity"
        | "status"
    >
>;

export interface EventFilter {
    from: string;
    category?: EventCategory;
}

export function isEventCategory(value: string): value is EventCategory {
    return (EVENT_CATEGORIES as readonly string[]).includes(value);
}

export function isEventStatus(value: string): value is EventStatus {
    return (EVENT_STATUSES as readonly string[]).includes(value);
}
