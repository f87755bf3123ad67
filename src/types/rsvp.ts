import { z } from "zod";

export const rsvpSchema = z.object({
    id: z.string(),
    event_id: z.string(),
    user_id: z.string(),
    created_at: z.string(),
});

export type Rsvp = z.infer<typeof rsvpSchema>;

/**
 * Result of the guarded RSVP insert. Anything other than "created" means the
 * check lost to a concurrent writer or the event changed in between.
 */
export type RsvpOutcome =
    | { status: "created"; rsvp: Rsvp }
    | { status: "missing" }
    | { status: "inactive" }
    | { status: "duplicate" }
    | { status: "full" };
