import { z } from "zod";

export const MAX_MESSAGE_LENGTH = 2000;

export const messageSchema = z.object({
    id: z.string(),
    group_id: z.string(),
    user_id: z.string(),
    content: z.string(),
    is_deleted: z.boolean(),
    created_at: z.string(),
});

export type Message = z.infer<typeof messageSchema>;

export interface MessagePage {
    limit: number;
    /** Only messages created strictly before this timestamp. */
    before?: string;
}
