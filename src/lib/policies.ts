import { AuthorizationError } from "./errors.js";
import type { Event } from "../types/event.js";
import type { Group, Membership } from "../types/group.js";
import type { Message } from "../types/message.js";

export function assertEventOwner(event: Event, uid: string, action: "update" | "delete"): void {
    if (event.organizer_id !== uid) {
        throw new AuthorizationError(`You can only ${action} your own events`);
    }
}

/** Inactive events are only visible to their organizer. */
export function canViewEvent(event: Event, uid: string | undefined): boolean {
    return event.status === "active" || event.organizer_id === uid;
}

/** Private groups are only visible to their members. */
export function canViewGroup(group: Group, membership: Membership | null): boolean {
    return group.is_public || membership !== null;
}

export function assertGroupMember(membership: Membership | null, message: string): asserts membership is Membership {
    if (!membership) throw new AuthorizationError(message);
}

export function assertGroupAdmin(membership: Membership | null, message: string): asserts membership is Membership {
    if (!membership || membership.role !== "admin") throw new AuthorizationError(message);
}

/** Sender or any admin of the group. */
export function assertCanDeleteMessage(message: Message, uid: string, membership: Membership | null): void {
    const isSender = message.user_id === uid;
    const isAdmin = membership?.role === "admin";
    if (!isSender && !isAdmin) {
        throw new AuthorizationError("You can only delete your own messages or if you are a group admin");
    }
}
