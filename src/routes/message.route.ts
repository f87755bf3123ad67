import type { FastifyInstance } from "fastify";
import { getIdentity } from "../auth.js";
import { NotFoundError } from "../lib/errors.js";
import { GROUP_NOT_FOUND } from "../lib/groupManager.js";
import { assertCanDeleteMessage, assertGroupMember } from "../lib/policies.js";
import { assertField, assertNoFieldErrors, assertUuid, queryText, requireBody, text } from "../lib/request.js";
import { send, success } from "../lib/responses.js";
import { validateMessageContent, validateRequiredFields, validateUuid } from "../lib/validators.js";
import type { Message, MessagePage } from "../types/message.js";
import type { Profile } from "../types/profile.js";
import type { RouteContext } from "./context.js";

export const DEFAULT_MESSAGE_LIMIT = 50;
export const MAX_MESSAGE_LIMIT = 100;

type Sender = Pick<Profile, "id" | "name" | "avatar_url">;

interface MessageView {
    id: string;
    content: string;
    created_at: string;
    sender: Sender | null;
}

interface MessageQuery {
    limit?: string | string[];
    before?: string | string[];
}

/** Unparseable or non-positive limits fall back to the default. */
export function parseLimit(value: string): number {
    const limit = Number.parseInt(value, 10);
    if (Number.isNaN(limit) || limit < 1) return DEFAULT_MESSAGE_LIMIT;
    return Math.min(limit, MAX_MESSAGE_LIMIT);
}

function toView(message: Message, sender: Profile | undefined): MessageView {
    return {
        id: message.id,
        content: message.content,
        created_at: message.created_at,
        sender: sender ? { id: sender.id, name: sender.name, avatar_url: sender.avatar_url } : null,
    };
}

export default async function messageRoutes(fastify: FastifyInstance, ctx: RouteContext) {
    const { store, gate } = ctx;

    async function requireGroup(groupId: string): Promise<void> {
        if (!(await store.getGroup(groupId))) throw new NotFoundError(GROUP_NOT_FOUND);
    }

    fastify.get<{ Params: { groupId: string }; Querystring: MessageQuery }>(
        "/:groupId/messages",
        { preHandler: gate.requireAuth },
        async (request, reply) => {
            const { uid } = getIdentity(request);
            const { groupId } = request.params;
            assertUuid(groupId);
            await requireGroup(groupId);
            assertGroupMember(
                await store.getMembership(groupId, uid),
                "You must be a member of this group to view messages",
            );

            const page: MessagePage = { limit: parseLimit(queryText(request.query.limit)) };
            const before = queryText(request.query.before);
            if (before && validateUuid(before).ok) {
                const anchor = await store.getMessage(groupId, before);
                if (anchor) page.before = anchor.created_at;
            }

            // newest page first from the store, shown oldest first
            const messages = (await store.listMessages(groupId, page)).reverse();
            const senders = await store.getProfiles(messages.map((message) => message.user_id));
            const views = messages.map((message) => toView(message, senders.get(message.user_id)));

            return send(
                reply,
                success({ messages: views, count: views.length, has_more: views.length === page.limit }),
            );
        },
    );

    fastify.post<{ Params: { groupId: string } }>(
        "/:groupId/messages",
        { preHandler: gate.requireAuth },
        async (request, reply) => {
            const { uid, profile } = getIdentity(request);
            const { groupId } = request.params;
            assertUuid(groupId);
            const body = requireBody(request.body);
            assertNoFieldErrors(validateRequiredFields(body, ["content"]));
            assertField("content", validateMessageContent(body.content));

            await requireGroup(groupId);
            assertGroupMember(
                await store.getMembership(groupId, uid),
                "You must be a member of this group to send messages",
            );

            const message = await store.createMessage(groupId, uid, text(body.content));
            return send(reply, success(toView(message, profile), "Message sent successfully", 201));
        },
    );

    fastify.delete<{ Params: { groupId: string; messageId: string } }>(
        "/:groupId/messages/:messageId",
        { preHandler: gate.requireAuth },
        async (request, reply) => {
            const { uid } = getIdentity(request);
            const { groupId, messageId } = request.params;
            assertUuid(groupId);
            assertUuid(messageId);

            const message = await store.getMessage(groupId, messageId);
            if (!message || message.is_deleted) throw new NotFoundError("Message not found");
            assertCanDeleteMessage(message, uid, await store.getMembership(groupId, uid));

            await store.softDeleteMessage(messageId);
            return send(reply, success(undefined, "Message deleted successfully"));
        },
    );
}
