import { z } from "zod";

export const ROLES = ["attendee", "organizer"] as const;

export type Role = (typeof ROLES)[number];

export const profileSchema = z.object({
    id: z.string(),
    email: z.string(),
    name: z.string(),
    role: z.enum(ROLES),
    avatar_url: z.string().nullable(),
    bio: z.string().nullable(),
    location: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
});

export type Profile = z.infer<typeof profileSchema>;

export type ProfilePatch = Partial<Pick<Profile, "name" | "role" | "avatar_url" | "bio" | "location">>;

/** Public subset embedded in events, groups, members and messages. */
export type ProfileSummary = Pick<Profile, "id" | "name" | "email" | "avatar_url">;

export function isRole(value: string): value is Role {
    return (ROLES as readonly string[]).includes(value);
}

export function toSummary(profile: Profile): ProfileSummary {
    return {
        id: profile.id,
        name: profile.name,
        email: profile.email,
        avatar_url: profile.avatar_url,
    };
}
