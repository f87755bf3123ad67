import { BadRequestError, ConflictError, NotFoundError, AuthorizationError } from "./errors.js";
import { assertGroupAdmin, canViewGroup } from "./policies.js";
import { includesText } from "./request.js";
import type { DataStore } from "./store.js";
import type { Group, GroupPatch, MemberRole, Membership, NewGroup } from "../types/group.js";
import { toSummary, type Profile, type ProfileSummary } from "../types/profile.js";

export interface GroupView extends Group {
    creator: ProfileSummary | null;
    user_is_member: boolean;
    user_role: MemberRole | null;
}

export interface JoinedGroupView extends Group {
    creator: ProfileSummary | null;
    user_role: MemberRole;
    joined_at: string;
}

export interface MemberView {
    membership_id: string;
    role: MemberRole;
    joined_at: string;
    user: Pick<Profile, "id" | "name" | "email" | "avatar_url" | "bio" | "location">;
}

export interface MemberList {
    group: Pick<Group, "id" | "name">;
    members: MemberView[];
    total: number;
}

export interface GroupSearch {
    category?: string;
    search?: string;
}

export const GROUP_NOT_FOUND = "Group not found";
export const NOT_A_MEMBER = "You are not a member of this group";
export const SOLE_ADMIN_LEAVE =
    "Cannot leave group: you are the only admin. Please assign another admin first or delete the group.";
export const SOLE_ADMIN_DEMOTE = "Cannot demote the only admin of the group. Promote another member first.";

function creatorOf(profile: Profile | undefined): ProfileSummary | null {
    return profile ? toSummary(profile) : null;
}

function adminCount(members: readonly Membership[]): number {
    return members.filter((member) => member.role === "admin").length;
}

export function createGroupManager(store: DataStore) {
    async function loadGroup(groupId: string): Promise<Group> {
        const group = await store.getGroup(groupId);
        if (!group) throw new NotFoundError(GROUP_NOT_FOUND);
        return group;
    }

    async function present(groups: readonly Group[], viewerId?: string): Promise<GroupView[]> {
        const creators = await store.getProfiles(groups.map((group) => group.creator_id));
        const roles = new Map<string, MemberRole>();
        if (viewerId) {
            for (const membership of await store.listMembershipsByUser(viewerId)) {
                roles.set(membership.group_id, membership.role);
            }
        }
        return groups.map((group) => ({
            ...group,
            creator: creatorOf(creators.get(group.creator_id)),
            user_is_member: roles.has(group.id),
            user_role: roles.get(group.id) ?? null,
        }));
    }

    return {
        present,

        /** Public groups, newest first. */
        async search(query: GroupSearch, viewerId?: string): Promise<GroupView[]> {
            const groups = await store.listPublicGroups({ category: query.category });
            const needle = query.search;
            const matching = needle
                ? groups.filter((group) => includesText([group.name, group.description], needle))
                : groups;
            return present(matching, viewerId);
        },

        /** Private groups exist only for their members. */
        async getVisible(groupId: string, viewerId?: string): Promise<GroupView> {
            const group = await loadGroup(groupId);
            const membership = viewerId ? await store.getMembership(groupId, viewerId) : null;
            if (!canViewGroup(group, membership)) throw new NotFoundError(GROUP_NOT_FOUND);
            const [view] = await present([group], viewerId);
            return view;
        },

        async create(input: NewGroup): Promise<GroupView> {
            const { group, membership } = await store.createGroup(input);
            const creator = await store.getProfile(input.creator_id);
            return {
                ...group,
                creator: creator ? toSummary(creator) : null,
                user_is_member: true,
                user_role: membership.role,
            };
        },

        /** The group, provided `uid` is one of its admins. */
        async getAdministered(groupId: string, uid: string, message: string): Promise<Group> {
            const group = await loadGroup(groupId);
            assertGroupAdmin(await store.getMembership(groupId, uid), message);
            return group;
        },

        async update(groupId: string, patch: GroupPatch): Promise<Group> {
            const group = await store.updateGroup(groupId, patch);
            if (!group) throw new NotFoundError(GROUP_NOT_FOUND);
            return group;
        },

        async remove(groupId: string): Promise<void> {
            await store.deleteGroup(groupId);
        },

        async join(groupId: string, userId: string): Promise<{ membership: Membership; group: Group }> {
            const group = await loadGroup(groupId);
            if (!group.is_public) throw new BadRequestError("Cannot join private group");
            if (await store.getMembership(groupId, userId)) {
                throw new ConflictError("You are already a member of this group");
            }

            const outcome = await store.addMember(groupId, userId, "member");
            switch (outcome.status) {
                case "joined":
                    return { membership: outcome.membership, group };
                case "missing":
                    throw new NotFoundError(GROUP_NOT_FOUND);
                case "duplicate":
                    throw new ConflictError("You are already a member of this group");
            }
        },

        async leave(groupId: string, userId: string): Promise<void> {
            const membership = await store.getMembership(groupId, userId);
            if (!membership) throw new NotFoundError(NOT_A_MEMBER);
            if (membership.role === "admin" && adminCount(await store.listMembers(groupId)) <= 1) {
                throw new BadRequestError(SOLE_ADMIN_LEAVE);
            }

            const outcome = await store.removeMember(groupId, userId);
            if (outcome === "not_member") throw new NotFoundError(NOT_A_MEMBER);
            if (outcome === "last_admin") throw new BadRequestError(SOLE_ADMIN_LEAVE);
        },

        /** Oldest member first; members without a profile are left out. */
        async members(groupId: string, viewerId: string): Promise<MemberList> {
            const group = await loadGroup(groupId);
            if (!group.is_public && !(await store.getMembership(groupId, viewerId))) {
                throw new AuthorizationError("You must be a member to view group members");
            }

            const memberships = await store.listMembers(groupId);
            const profiles = await store.getProfiles(memberships.map((membership) => membership.user_id));
            const members: MemberView[] = [];
            for (const membership of memberships) {
                const profile = profiles.get(membership.user_id);
                if (!profile) continue;
                members.push({
                    membership_id: membership.id,
                    role: membership.role,
                    joined_at: membership.joined_at,
                    user: {
                        id: profile.id,
                        name: profile.name,
                        email: profile.email,
                        avatar_url: profile.avatar_url,
                        bio: profile.bio,
                        location: profile.location,
                    },
                });
            }
            return { group: { id: group.id, name: group.name }, members, total: members.length };
        },

        async changeRole(groupId: string, actorId: string, userId: string, role: MemberRole): Promise<Membership> {
            await loadGroup(groupId);
            assertGroupAdmin(await store.getMembership(groupId, actorId), "Only group admins can change member roles");

            const target = await store.getMembership(groupId, userId);
            if (!target) throw new NotFoundError("Member not found");
            if (target.role === "admin" && role !== "admin" && adminCount(await store.listMembers(groupId)) <= 1) {
                throw new BadRequestError(SOLE_ADMIN_DEMOTE);
            }

            const outcome = await store.setMemberRole(groupId, userId, role);
            switch (outcome.status) {
                case "updated":
                    return outcome.membership;
                case "not_member":
                    throw new NotFoundError("Member not found");
                case "last_admin":
                    throw new BadRequestError(SOLE_ADMIN_DEMOTE);
            }
        },

        /** Most recent join first. */
        async joined(userId: string): Promise<JoinedGroupView[]> {
            const memberships = await store.listMembershipsByUser(userId);
            const groups = await store.getGroups(memberships.map((membership) => membership.group_id));
            const creators = await store.getProfiles([...groups.values()].map((group) => group.creator_id));

            const views: JoinedGroupView[] = [];
            for (const membership of memberships) {
                const group = groups.get(membership.group_id);
                if (!group) continue;
                views.push({
                    ...group,
                    creator: creatorOf(creators.get(group.creator_id)),
                    user_role: membership.role,
                    joined_at: membership.joined_at,
                });
            }
            return views;
        },
    };
}

export type GroupManager = ReturnType<typeof createGroupManager>;
