import { z } from "zod";

export const MEMBER_ROLES = ["admin", "member"] as const;

export type MemberRole = (typeof MEMBER_ROLES)[number];

export const groupSchema = z.object({
    id: z.string(),
    creator_id: z.string(),
    name: z.string(),
    description: z.string(),
    category: z.string().nullable(),
    avatar_url: z.string().nullable(),
    is_public: z.boolean(),
    member_count: z.number().int(),
    created_at: z.string(),
    updated_at: z.string(),
});

export type Group = z.infer<typeof groupSchema>;

export type NewGroup = Pick<Group, "creator_id" | "name" | "description" | "category" | "avatar_url" | "is_public">;

export type GroupPatch = Partial<Pick<Group, "name" | "description" | "category" | "avatar_url" | "is_public">>;

export interface GroupFilter {
    category?: string;
}

export const membershipSchema = z.object({
    id: z.string(),
    group_id: z.string(),
    user_id: z.string(),
    role: z.enum(MEMBER_ROLES),
    joined_at: z.string(),
});

export type Membership = z.infer<typeof membershipSchema>;

export type JoinOutcome =
    | { status: "joined"; membership: Membership }
    | { status: "missing" }
    | { status: "duplicate" };

export type LeaveOutcome = "removed" | "not_member" | "last_admin";

export type RoleChangeOutcome =
    | { status: "updated"; membership: Membership }
    | { status: "not_member" }
    | { status: "last_admin" };

export function isMemberRole(value: string): value is MemberRole {
    return (MEMBER_ROLES as readonly string[]).includes(value);
}
