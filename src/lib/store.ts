import type { Event, EventFilter, EventPatch, NewEvent } from "../types/event.js";
import type {
    Group,
    GroupFilter,
    GroupPatch,
    JoinOutcome,
    LeaveOutcome,
    MemberRole,
    Membership,
    NewGroup,
    RoleChangeOutcome,
} from "../types/group.js";
import type { Message, MessagePage } from "../types/message.js";
import type { Profile, ProfilePatch } from "../types/profile.js";
import type { Rsvp, RsvpOutcome } from "../types/rsvp.js";

/**
 * Persistence seen by the route handlers. The handlers run the business
 * checks first; the guarded writes (addRsvp, addMember, removeMember,
 * setMemberRole) repeat them atomically and report a lost race as an outcome
 * instead of throwing.
 *
 * Lists come back in the order the API returns them.
 */
export interface DataStore {
    getProfile(id: string): Promise<Profile | null>;
    getProfiles(ids: readonly string[]): Promise<Map<string, Profile>>;
    createProfile(profile: Profile): Promise<Profile>;
    updateProfile(id: string, patch: ProfilePatch): Promise<Profile | null>;

    /** Active events starting at or after `filter.from`, soonest first. */
    listEvents(filter: EventFilter): Promise<Event[]>;
    /** Every status, newest first. */
    listEventsByOrganizer(organizerId: string): Promise<Event[]>;
    getEvent(id: string): Promise<Event | null>;
    getEvents(ids: readonly string[]): Promise<Map<string, Event>>;
    createEvent(input: NewEvent): Promise<Event>;
    updateEvent(id: string, patch: EventPatch): Promise<Event | null>;

    getRsvp(eventId: string, userId: string): Promise<Rsvp | null>;
    /** Newest first. */
    listRsvpsByUser(userId: string): Promise<Rsvp[]>;
    addRsvp(eventId: string, userId: string): Promise<RsvpOutcome>;
    /** False when there was nothing to remove. */
    removeRsvp(eventId: string, userId: string): Promise<boolean>;

    /** Public groups, newest first. */
    listPublicGroups(filter: GroupFilter): Promise<Group[]>;
    getGroup(id: string): Promise<Group | null>;
    getGroups(ids: readonly string[]): Promise<Map<string, Group>>;
    /** Creates the group and enrolls the creator as its first admin in one write. */
    createGroup(input: NewGroup): Promise<{ group: Group; membership: Membership }>;
    updateGroup(id: string, patch: GroupPatch): Promise<Group | null>;
    /** Removes the group with its memberships and messages. */
    deleteGroup(id: string): Promise<void>;

    getMembership(groupId: string, userId: string): Promise<Membership | null>;
    /** Oldest member first. */
    listMembers(groupId: string): Promise<Membership[]>;
    /** Most recent join first. */
    listMembershipsByUser(userId: string): Promise<Membership[]>;
    addMember(groupId: string, userId: string, role: MemberRole): Promise<JoinOutcome>;
    /** Refuses to remove the group's last admin. */
    removeMember(groupId: string, userId: string): Promise<LeaveOutcome>;
    /** Refuses to demote the group's last admin. */
    setMemberRole(groupId: string, userId: string, role: MemberRole): Promise<RoleChangeOutcome>;

    /** Non-deleted messages, newest first, at most `page.limit`. */
    listMessages(groupId: string, page: MessagePage): Promise<Message[]>;
    getMessage(groupId: string, messageId: string): Promise<Message | null>;
    createMessage(groupId: string, userId: string, content: string): Promise<Message>;
    softDeleteMessage(messageId: string): Promise<void>;
}
