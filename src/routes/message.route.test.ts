import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { DEFAULT_MESSAGE_LIMIT, MAX_MESSAGE_LIMIT, parseLimit } from "./message.route.js";
import { bearer, createHarness, dataOf, envelope, seedGroup, seedUser, type Harness, type TestUser } from "../testing/harness.js";
import type { Group } from "../types/group.js";
import type { Message } from "../types/message.js";

const messageViewSchema = z.object({
    id: z.string(),
    content: z.string(),
    created_at: z.string(),
    sender: z.object({ id: z.string(), name: z.string(), avatar_url: z.string().nullable() }).nullable(),
});

const messagePageSchema = z.object({
    messages: z.array(messageViewSchema),
    count: z.number(),
    has_more: z.boolean(),
});

describe("parseLimit", () => {
    it("falls back to the default and caps at the maximum", () => {
        expect(parseLimit("")).toBe(DEFAULT_MESSAGE_LIMIT);
        expect(parseLimit("abc")).toBe(DEFAULT_MESSAGE_LIMIT);
        expect(parseLimit("0")).toBe(DEFAULT_MESSAGE_LIMIT);
        expect(parseLimit("-5")).toBe(DEFAULT_MESSAGE_LIMIT);
        expect(parseLimit("20")).toBe(20);
        expect(parseLimit("500")).toBe(MAX_MESSAGE_LIMIT);
    });
});

describe("message routes", () => {
    let h: Harness;
    let admin: TestUser;
    let member: TestUser;
    let outsider: TestUser;
    let group: Group;

    beforeEach(async () => {
        h = await createHarness();
        admin = await seedUser(h, "admin@example.com", "attendee", "Ada Admin");
        member = await seedUser(h, "member@example.com", "attendee", "Max Member");
        outsider = await seedUser(h, "outsider@example.com", "attendee", "Otto Outsider");
        ({ group } = await seedGroup(h, admin.uid));
        await h.store.addMember(group.id, member.uid, "member");
    });

    afterEach(async () => {
        await h.app.close();
    });

    function messagesUrl(query = ""): string {
        return `/api/groups/${group.id}/messages${query}`;
    }

    describe("POST /api/groups/:groupId/messages", () => {
        it("posts a trimmed message as the caller", async () => {
            const res = await h.app.inject({
                method: "POST",
                url: messagesUrl(),
                headers: bearer(member.token),
                payload: { content: "  See you at the trailhead  " },
            });

            expect(res.statusCode).toBe(201);
            expect(envelope(res).message).toBe("Message sent successfully");
            const message = dataOf(res, messageViewSchema);
            expect(message.content).toBe("See you at the trailhead");
            expect(message.sender).toEqual({ id: member.uid, name: "Max Member", avatar_url: null });
            expect(h.store.messages.get(message.id)?.user_id).toBe(member.uid);
        });

        it("requires content within the length limit", async () => {
            const blank = await h.app.inject({
                method: "POST",
                url: messagesUrl(),
                headers: bearer(member.token),
                payload: { content: "   " },
            });
            expect(blank.statusCode).toBe(400);
            expect(envelope(blank).validation_errors).toEqual({ content: "Content is required" });

            const long = await h.app.inject({
                method: "POST",
                url: messagesUrl(),
                headers: bearer(member.token),
                payload: { content: "a".repeat(2001) },
            });
            expect(envelope(long).validation_errors).toEqual({ content: "Message must not exceed 2000 characters" });
        });

        it("is limited to members", async () => {
            const res = await h.app.inject({
                method: "POST",
                url: messagesUrl(),
                headers: bearer(outsider.token),
                payload: { content: "Let me in" },
            });

            expect(res.statusCode).toBe(403);
            expect(envelope(res).error).toBe("You must be a member of this group to send messages");
        });

        it("is limited to members of a private group", async () => {
            const { group: closed } = await seedGroup(h, admin.uid, { name: "Quiet Room", is_public: false });
            const res = await h.app.inject({
                method: "POST",
                url: `/api/groups/${closed.id}/messages`,
                headers: bearer(outsider.token),
                payload: { content: "Let me in" },
            });

            expect(res.statusCode).toBe(403);
            expect(envelope(res).error).toBe("You must be a member of this group to send messages");
            expect(h.store.messages.size).toBe(0);
        });

        it("counts emoji as single characters", async () => {
            const res = await h.app.inject({
                method: "POST",
                url: messagesUrl(),
                headers: bearer(member.token),
                payload: { content: "😀".repeat(1500) },
            });

            expect(res.statusCode).toBe(201);
            expect(dataOf(res, messageViewSchema).content).toBe("😀".repeat(1500));
        });

        it("reports unknown groups", async () => {
            const res = await h.app.inject({
                method: "POST",
                url: "/api/groups/00000000-0000-4000-8000-000000000000/messages",
                headers: bearer(member.token),
                payload: { content: "Anyone here?" },
            });

            expect(res.statusCode).toBe(404);
            expect(envelope(res).error).toBe("Group not found");
        });
    });

    describe("GET /api/groups/:groupId/messages", () => {
        it("returns the newest page in chronological order", async () => {
            for (const content of ["one", "two", "three"]) {
                await h.store.createMessage(group.id, admin.uid, content);
            }

            const res = await h.app.inject({ method: "GET", url: messagesUrl("?limit=2"), headers: bearer(member.token) });

            const page = dataOf(res, messagePageSchema);
            expect(page.messages.map((message) => message.content)).toEqual(["two", "three"]);
            expect(page.count).toBe(2);
            expect(page.has_more).toBe(true);
            expect(page.messages[0].sender).toEqual({ id: admin.uid, name: "Ada Admin", avatar_url: null });
        });

        it("pages backwards from a message id", async () => {
            const anchors: Message[] = [];
            for (const content of ["one", "two", "three"]) {
                anchors.push(await h.store.createMessage(group.id, admin.uid, content));
            }

            const res = await h.app.inject({
                method: "GET",
                url: messagesUrl(`?before=${anchors[2].id}`),
                headers: bearer(member.token),
            });

            const page = dataOf(res, messagePageSchema);
            expect(page.messages.map((message) => message.content)).toEqual(["one", "two"]);
            expect(page.has_more).toBe(false);
        });

        it("skips deleted messages", async () => {
            const gone = await h.store.createMessage(group.id, admin.uid, "oops");
            await h.store.createMessage(group.id, admin.uid, "kept");
            await h.store.softDeleteMessage(gone.id);

            const res = await h.app.inject({ method: "GET", url: messagesUrl(), headers: bearer(member.token) });

            expect(dataOf(res, messagePageSchema).messages.map((message) => message.content)).toEqual(["kept"]);
        });

        it("is limited to members", async () => {
            const res = await h.app.inject({ method: "GET", url: messagesUrl(), headers: bearer(outsider.token) });

            expect(res.statusCode).toBe(403);
            expect(envelope(res).error).toBe("You must be a member of this group to view messages");
        });

        it("is limited to members of a private group", async () => {
            const { group: closed } = await seedGroup(h, admin.uid, { name: "Quiet Room", is_public: false });
            await h.store.createMessage(closed.id, admin.uid, "members only");

            const res = await h.app.inject({
                method: "GET",
                url: `/api/groups/${closed.id}/messages`,
                headers: bearer(outsider.token),
            });

            expect(res.statusCode).toBe(403);
            expect(envelope(res).error).toBe("You must be a member of this group to view messages");
        });
    });

    describe("DELETE /api/groups/:groupId/messages/:messageId", () => {
        it("lets the sender delete their message", async () => {
            const message = await h.store.createMessage(group.id, member.uid, "mine");
            const res = await h.app.inject({
                method: "DELETE",
                url: messagesUrl(`/${message.id}`),
                headers: bearer(member.token),
            });

            expect(res.statusCode).toBe(200);
            expect(envelope(res)).toEqual({ success: true, message: "Message deleted successfully" });
            expect(h.store.messages.get(message.id)?.is_deleted).toBe(true);
        });

        it("lets an admin delete any message", async () => {
            const message = await h.store.createMessage(group.id, member.uid, "spam");
            const res = await h.app.inject({
                method: "DELETE",
                url: messagesUrl(`/${message.id}`),
                headers: bearer(admin.token),
            });

            expect(res.statusCode).toBe(200);
        });

        it("refuses other members", async () => {
            const message = await h.store.createMessage(group.id, admin.uid, "announcement");
            const res = await h.app.inject({
                method: "DELETE",
                url: messagesUrl(`/${message.id}`),
                headers: bearer(member.token),
            });

            expect(res.statusCode).toBe(403);
            expect(envelope(res).error).toBe("You can only delete your own messages or if you are a group admin");
        });

        it("treats a deleted message as missing", async () => {
            const message = await h.store.createMessage(group.id, member.uid, "twice");
            await h.store.softDeleteMessage(message.id);

            const res = await h.app.inject({
                method: "DELETE",
                url: messagesUrl(`/${message.id}`),
                headers: bearer(member.token),
            });

            expect(res.statusCode).toBe(404);
            expect(envelope(res).error).toBe("Message not found");
        });
    });
});
