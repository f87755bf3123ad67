import { randomUUID } from "crypto";
import { z } from "zod";
import {
    FieldValue,
    type DocumentData,
    type OrderByDirection,
    type ReadOptions,
    type UpdateData,
    type WhereFilterOp,
} from "firebase-admin/firestore";
import type { DataStore } from "./store.js";
import type { EventCache } from "./eventCache.js";
import { eventSchema, type Event, type EventFilter, type EventPatch, type NewEvent } from "../types/event.js";
import {
    groupSchema,
    membershipSchema,
    type Group,
    type GroupFilter,
    type GroupPatch,
    type JoinOutcome,
    type LeaveOutcome,
    type MemberRole,
    type Membership,
    type NewGroup,
    type RoleChangeOutcome,
} from "../types/group.js";
import { messageSchema, type Message, type MessagePage } from "../types/message.js";
import { profileSchema, type Profile, type ProfilePatch } from "../types/profile.js";
import { rsvpSchema, type Rsvp, type RsvpOutcome } from "../types/rsvp.js";

const PROFILES = "profiles";
const EVENTS = "events";
const RSVPS = "rsvps";
const GROUPS = "groups";
const MEMBERS = "group_members";
const MESSAGES = "messages";

// Firestore caps a write batch at 500 operations.
const BATCH_LIMIT = 500;

const adminCountSchema = z.number().int().catch(0);

export interface DocumentSnap {
    readonly exists: boolean;
    data(): unknown;
    get(field: string): unknown;
}

export interface DocumentRef {
    readonly path: string;
    get(): Promise<DocumentSnap>;
    set(data: DocumentData): Promise<unknown>;
    update(data: UpdateData<DocumentData>): Promise<unknown>;
}

export interface QueryRef {
    where(field: string, op: WhereFilterOp, value: unknown): QueryRef;
    orderBy(field: string, direction?: OrderByDirection): QueryRef;
    limit(limit: number): QueryRef;
    get(): Promise<{ readonly docs: ReadonlyArray<{ readonly ref: DocumentRef; data(): unknown }> }>;
}

export interface CollectionRef extends QueryRef {
    doc(id: string): DocumentRef;
}

export interface TransactionRef {
    get(ref: DocumentRef): Promise<DocumentSnap>;
    create(ref: DocumentRef, data: DocumentData): unknown;
    update(ref: DocumentRef, data: UpdateData<DocumentData>): unknown;
    delete(ref: DocumentRef): unknown;
}

export interface WriteBatchRef {
    set(ref: DocumentRef, data: DocumentData): unknown;
    delete(ref: DocumentRef): unknown;
    commit(): Promise<unknown>;
}

/** The slice of the Admin SDK's Firestore client used here. */
export interface FirestoreClient {
    collection(path: string): CollectionRef;
    getAll(...refs: Array<DocumentRef | ReadOptions>): Promise<DocumentSnap[]>;
    runTransaction<T>(fn: (t: TransactionRef) => Promise<T>): Promise<T>;
    batch(): WriteBatchRef;
}

/** Deterministic ids make the pair unique without a separate index. */
export function rsvpDocId(eventId: string, userId: string): string {
    return `${eventId}_${userId}`;
}

export function membershipDocId(groupId: string, userId: string): string {
    return `${groupId}_${userId}`;
}

function parseDoc<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, snap: DocumentSnap): T | null {
    if (!snap.exists) return null;
    return schema.parse(snap.data());
}

export class FirestoreStore implements DataStore {
    constructor(
        private readonly db: FirestoreClient,
        private readonly cache: EventCache | null = null,
        private readonly now: () => Date = () => new Date(),
    ) {}

    private timestamp(): string {
        return this.now().toISOString();
    }

    private async getMany<T extends { id: string }>(
        collection: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        ids: readonly string[],
    ): Promise<Map<string, T>> {
        const result = new Map<string, T>();
        const unique = [...new Set(ids)];
        if (unique.length === 0) return result;

        const snaps = await this.db.getAll(...unique.map((id) => this.db.collection(collection).doc(id)));
        for (const snap of snaps) {
            const doc = parseDoc(schema, snap);
            if (doc) result.set(doc.id, doc);
        }
        return result;
    }

    private async list<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: QueryRef): Promise<T[]> {
        const snapshot = await query.get();
        return snapshot.docs.map((doc) => schema.parse(doc.data()));
    }

    // --- Profiles ---

    async getProfile(id: string): Promise<Profile | null> {
        return parseDoc(profileSchema, await this.db.collection(PROFILES).doc(id).get());
    }

    async getProfiles(ids: readonly string[]): Promise<Map<string, Profile>> {
        return this.getMany(PROFILES, profileSchema, ids);
    }

    async createProfile(profile: Profile): Promise<Profile> {
        await this.db.collection(PROFILES).doc(profile.id).set(profile);
        return profile;
    }

    async updateProfile(id: string, patch: ProfilePatch): Promise<Profile | null> {
        const ref = this.db.collection(PROFILES).doc(id);
        if (!(await ref.get()).exists) return null;
        await ref.update({ ...patch, updated_at: this.timestamp() });
        return this.getProfile(id);
    }

    // --- Events ---

    async listEvents(filter: EventFilter): Promise<Event[]> {
        let query: QueryRef = this.db
            .collection(EVENTS)
            .where("status", "==", "active")
            .where("datetime", ">=", filter.from);
        if (filter.category) query = query.where("category", "==", filter.category);
        return this.list(eventSchema, query.orderBy("datetime", "asc"));
    }

    async listEventsByOrganizer(organizerId: string): Promise<Event[]> {
        const query = this.db.collection(EVENTS).where("organizer_id", "==", organizerId).orderBy("created_at", "desc");
        return this.list(eventSchema, query);
    }

    async getEvent(id: string): Promise<Event | null> {
        const cached = await this.cache?.get(id);
        if (cached) return cached;

        const event = parseDoc(eventSchema, await this.db.collection(EVENTS).doc(id).get());
        if (event && this.cache) await this.cache.set(event);
        return event;
    }

    async getEvents(ids: readonly string[]): Promise<Map<string, Event>> {
        return this.getMany(EVENTS, eventSchema, ids);
    }

    async createEvent(input: NewEvent): Promise<Event> {
        const createdAt = this.timestamp();
        const event: Event = {
            ...input,
            id: randomUUID(),
            status: "active",
            is_trending: false,
            rsvp_count: 0,
            created_at: createdAt,
            updated_at: createdAt,
        };
        await this.db.collection(EVENTS).doc(event.id).set(event);
        return event;
    }

    async updateEvent(id: string, patch: EventPatch): Promise<Event | null> {
        const ref = this.db.collection(EVENTS).doc(id);
        if (!(await ref.get()).exists) return null;
        await ref.update({ ...patch, updated_at: this.timestamp() });
        await this.cache?.invalidate(id);
        return parseDoc(eventSchema, await ref.get());
    }

    // --- RSVPs ---

    async getRsvp(eventId: string, userId: string): Promise<Rsvp | null> {
        return parseDoc(rsvpSchema, await this.db.collection(RSVPS).doc(rsvpDocId(eventId, userId)).get());
    }

    async listRsvpsByUser(userId: string): Promise<Rsvp[]> {
        const query = this.db.collection(RSVPS).where("user_id", "==", userId).orderBy("created_at", "desc");
        return this.list(rsvpSchema, query);
    }

    async addRsvp(eventId: string, userId: string): Promise<RsvpOutcome> {
        const eventRef = this.db.collection(EVENTS).doc(eventId);
        const rsvpRef = this.db.collection(RSVPS).doc(rsvpDocId(eventId, userId));

        const outcome = await this.db.runTransaction(async (t): Promise<RsvpOutcome> => {
            const event = parseDoc(eventSchema, await t.get(eventRef));
            const existing = await t.get(rsvpRef);

            if (!event) return { status: "missing" };
            if (event.status !== "active") return { status: "inactive" };
            if (existing.exists) return { status: "duplicate" };
            if (event.capacity !== null && event.rsvp_count >= event.capacity) return { status: "full" };

            const rsvp: Rsvp = { id: randomUUID(), event_id: eventId, user_id: userId, created_at: this.timestamp() };
            t.create(rsvpRef, rsvp);
            t.update(eventRef, { rsvp_count: FieldValue.increment(1) });
            return { status: "created", rsvp };
        });

        if (outcome.status === "created") await this.cache?.invalidate(eventId);
        return outcome;
    }

    async removeRsvp(eventId: string, userId: string): Promise<boolean> {
        const eventRef = this.db.collection(EVENTS).doc(eventId);
        const rsvpRef = this.db.collection(RSVPS).doc(rsvpDocId(eventId, userId));

        const removed = await this.db.runTransaction(async (t) => {
            const rsvpSnap = await t.get(rsvpRef);
            const eventSnap = await t.get(eventRef);
            if (!rsvpSnap.exists) return false;

            t.delete(rsvpRef);
            if (eventSnap.exists) t.update(eventRef, { rsvp_count: FieldValue.increment(-1) });
            return true;
        });

        if (removed) await this.cache?.invalidate(eventId);
        return removed;
    }

    // --- Groups ---

    async listPublicGroups(filter: GroupFilter): Promise<Group[]> {
        let query: QueryRef = this.db.collection(GROUPS).where("is_public", "==", true);
        if (filter.category) query = query.where("category", "==", filter.category);
        return this.list(groupSchema, query.orderBy("created_at", "desc"));
    }

    async getGroup(id: string): Promise<Group | null> {
        return parseDoc(groupSchema, await this.db.collection(GROUPS).doc(id).get());
    }

    async getGroups(ids: readonly string[]): Promise<Map<string, Group>> {
        return this.getMany(GROUPS, groupSchema, ids);
    }

    async createGroup(input: NewGroup): Promise<{ group: Group; membership: Membership }> {
        const createdAt = this.timestamp();
        const group: Group = { ...input, id: randomUUID(), member_count: 1, created_at: createdAt, updated_at: createdAt };
        const membership: Membership = {
            id: randomUUID(),
            group_id: group.id,
            user_id: input.creator_id,
            role: "admin",
            joined_at: createdAt,
        };

        const batch = this.db.batch();
        batch.set(this.db.collection(GROUPS).doc(group.id), { ...group, admin_count: 1 });
        batch.set(this.db.collection(MEMBERS).doc(membershipDocId(group.id, input.creator_id)), membership);
        await batch.commit();

        return { group, membership };
    }

    async updateGroup(id: string, patch: GroupPatch): Promise<Group | null> {
        const ref = this.db.collection(GROUPS).doc(id);
        if (!(await ref.get()).exists) return null;
        await ref.update({ ...patch, updated_at: this.timestamp() });
        return this.getGroup(id);
    }

    async deleteGroup(id: string): Promise<void> {
        const [members, messages] = await Promise.all([
            this.db.collection(MEMBERS).where("group_id", "==", id).get(),
            this.db.collection(MESSAGES).where("group_id", "==", id).get(),
        ]);
        // the group document goes last so an interrupted delete can be retried
        const refs = [...members.docs.map((doc) => doc.ref), ...messages.docs.map((doc) => doc.ref)];
        refs.push(this.db.collection(GROUPS).doc(id));

        for (let i = 0; i < refs.length; i += BATCH_LIMIT) {
            const batch = this.db.batch();
            for (const ref of refs.slice(i, i + BATCH_LIMIT)) batch.delete(ref);
            await batch.commit();
        }
    }

    // --- Memberships ---

    async getMembership(groupId: string, userId: string): Promise<Membership | null> {
        return parseDoc(membershipSchema, await this.db.collection(MEMBERS).doc(membershipDocId(groupId, userId)).get());
    }

    async listMembers(groupId: string): Promise<Membership[]> {
        const query = this.db.collection(MEMBERS).where("group_id", "==", groupId).orderBy("joined_at", "asc");
        return this.list(membershipSchema, query);
    }

    async listMembershipsByUser(userId: string): Promise<Membership[]> {
        const query = this.db.collection(MEMBERS).where("user_id", "==", userId).orderBy("joined_at", "desc");
        return this.list(membershipSchema, query);
    }

    async addMember(groupId: string, userId: string, role: MemberRole): Promise<JoinOutcome> {
        const groupRef = this.db.collection(GROUPS).doc(groupId);
        const memberRef = this.db.collection(MEMBERS).doc(membershipDocId(groupId, userId));

        return this.db.runTransaction(async (t): Promise<JoinOutcome> => {
            const groupSnap = await t.get(groupRef);
            const memberSnap = await t.get(memberRef);
            if (!groupSnap.exists) return { status: "missing" };
            if (memberSnap.exists) return { status: "duplicate" };

            const membership: Membership = {
                id: randomUUID(),
                group_id: groupId,
                user_id: userId,
                role,
                joined_at: this.timestamp(),
            };
            t.create(memberRef, membership);
            t.update(groupRef, {
                member_count: FieldValue.increment(1),
                ...(role === "admin" ? { admin_count: FieldValue.increment(1) } : {}),
            });
            return { status: "joined", membership };
        });
    }

    async removeMember(groupId: string, userId: string): Promise<LeaveOutcome> {
        const groupRef = this.db.collection(GROUPS).doc(groupId);
        const memberRef = this.db.collection(MEMBERS).doc(membershipDocId(groupId, userId));

        return this.db.runTransaction(async (t): Promise<LeaveOutcome> => {
            const membership = parseDoc(membershipSchema, await t.get(memberRef));
            const groupSnap = await t.get(groupRef);
            if (!membership) return "not_member";

            const isAdmin = membership.role === "admin";
            if (isAdmin && adminCountSchema.parse(groupSnap.get("admin_count")) <= 1) return "last_admin";

            t.delete(memberRef);
            if (groupSnap.exists) {
                t.update(groupRef, {
                    member_count: FieldValue.increment(-1),
                    ...(isAdmin ? { admin_count: FieldValue.increment(-1) } : {}),
                });
            }
            return "removed";
        });
    }

    async setMemberRole(groupId: string, userId: string, role: MemberRole): Promise<RoleChangeOutcome> {
        const groupRef = this.db.collection(GROUPS).doc(groupId);
        const memberRef = this.db.collection(MEMBERS).doc(membershipDocId(groupId, userId));

        return this.db.runTransaction(async (t): Promise<RoleChangeOutcome> => {
            const membership = parseDoc(membershipSchema, await t.get(memberRef));
            const groupSnap = await t.get(groupRef);
            if (!membership) return { status: "not_member" };
            if (membership.role === role) return { status: "updated", membership };

            const demoting = membership.role === "admin";
            if (demoting && adminCountSchema.parse(groupSnap.get("admin_count")) <= 1) return { status: "last_admin" };

            t.update(memberRef, { role });
            t.update(groupRef, { admin_count: FieldValue.increment(demoting ? -1 : 1) });
            return { status: "updated", membership: { ...membership, role } };
        });
    }

    // --- Messages ---

    async listMessages(groupId: string, page: MessagePage): Promise<Message[]> {
        let query: QueryRef = this.db
            .collection(MESSAGES)
            .where("group_id", "==", groupId)
            .where("is_deleted", "==", false);
        if (page.before) query = query.where("created_at", "<", page.before);
        return this.list(messageSchema, query.orderBy("created_at", "desc").limit(page.limit));
    }

    async getMessage(groupId: string, messageId: string): Promise<Message | null> {
        const message = parseDoc(messageSchema, await this.db.collection(MESSAGES).doc(messageId).get());
        return message && message.group_id === groupId ? message : null;
    }

    async createMessage(groupId: string, userId: string, content: string): Promise<Message> {
        const message: Message = {
            id: randomUUID(),
            group_id: groupId,
            user_id: userId,
            content,
            is_deleted: false,
            created_at: this.timestamp(),
        };
        await this.db.collection(MESSAGES).doc(message.id).set(message);
        return message;
    }

    async softDeleteMessage(messageId: string): Promise<void> {
        await this.db.collection(MESSAGES).doc(messageId).update({ is_deleted: true });
    }
}
