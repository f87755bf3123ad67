import type { FastifyInstance } from "fastify";
import { getIdentity } from "../auth.js";
import { BadRequestError } from "../lib/errors.js";
import { assertNoFieldErrors, assertUuid, nullableText, queryText, requireBody, requireChoice, text } from "../lib/request.js";
import { send, success } from "../lib/responses.js";
import { validateGroupData, validateMemberRole } from "../lib/validators.js";
import { isMemberRole, type GroupPatch } from "../types/group.js";
import type { RouteContext } from "./context.js";

type QueryValue = string | string[];

interface GroupQuery {
    category?: QueryValue;
    search?: QueryValue;
}

interface GroupParams {
    id: string;
}

/** Copies the present fields of an already validated payload. */
export function toGroupPatch(body: Record<string, unknown>): GroupPatch {
    const patch: GroupPatch = {};
    if (body.name !== undefined) patch.name = text(body.name);
    if (body.description !== undefined) patch.description = text(body.description);
    if (body.category !== undefined) patch.category = nullableText(body.category)?.toLowerCase() ?? null;
    if (body.avatar_url !== undefined) patch.avatar_url = nullableText(body.avatar_url);
    if (typeof body.is_public === "boolean") patch.is_public = body.is_public;
    return patch;
}

export default async function groupRoutes(fastify: FastifyInstance, ctx: RouteContext) {
    const { gate, groups } = ctx;

    fastify.get<{ Querystring: GroupQuery }>("/", { preHandler: gate.optionalAuth }, async (request, reply) => {
        const list = await groups.search(
            {
                category: queryText(request.query.category).toLowerCase() || undefined,
                search: queryText(request.query.search) || undefined,
            },
            request.auth?.uid,
        );
        return send(reply, success({ groups: list }));
    });

    fastify.post("/", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const body = requireBody(request.body);
        assertNoFieldErrors(validateGroupData(body));

        const fields = toGroupPatch(body);
        const group = await groups.create({
            creator_id: uid,
            name: text(body.name),
            description: text(body.description),
            category: fields.category ?? null,
            avatar_url: fields.avatar_url ?? null,
            is_public: fields.is_public ?? true,
        });
        return send(reply, success(group, "Group created successfully", 201));
    });

    fastify.get("/my-groups", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        return send(reply, success({ groups: await groups.joined(uid) }));
    });

    fastify.get<{ Params: GroupParams }>("/:id", { preHandler: gate.optionalAuth }, async (request, reply) => {
        const { id } = request.params;
        assertUuid(id);
        return send(reply, success(await groups.getVisible(id, request.auth?.uid)));
    });

    fastify.put<{ Params: GroupParams }>("/:id", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { id } = request.params;
        assertUuid(id);
        const body = requireBody(request.body);

        await groups.getAdministered(id, uid, "Only group admins can update this group");
        assertNoFieldErrors(validateGroupData(body, { partial: true }));

        const patch = toGroupPatch(body);
        if (Object.keys(patch).length === 0) throw new BadRequestError("No fields to update");

        const updated = await groups.update(id, patch);
        const [view] = await groups.present([updated], uid);
        return send(reply, success(view, "Group updated successfully"));
    });

    fastify.delete<{ Params: GroupParams }>("/:id", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { id } = request.params;
        assertUuid(id);

        await groups.getAdministered(id, uid, "Only group admins can delete this group");
        await groups.remove(id);
        request.log.info({ groupId: id, uid }, "Group deleted");
        return send(reply, success(undefined, "Group deleted successfully"));
    });

    fastify.post<{ Params: GroupParams }>("/:id/join", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { id } = request.params;
        assertUuid(id);

        const { membership, group } = await groups.join(id, uid);
        return send(
            reply,
            success({ membership, group: { id: group.id, name: group.name } }, "Successfully joined group", 201),
        );
    });

    fastify.delete<{ Params: GroupParams }>("/:id/leave", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { id } = request.params;
        assertUuid(id);

        await groups.leave(id, uid);
        return send(reply, success(undefined, "Successfully left group"));
    });

    fastify.get<{ Params: GroupParams }>("/:id/members", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { id } = request.params;
        assertUuid(id);
        return send(reply, success(await groups.members(id, uid)));
    });

    fastify.patch<{ Params: GroupParams & { userId: string } }>(
        "/:id/members/:userId",
        { preHandler: gate.requireAuth },
        async (request, reply) => {
            const { uid } = getIdentity(request);
            const { id, userId } = request.params;
            assertUuid(id);
            assertUuid(userId);
            const body = requireBody(request.body);

            const rawRole = text(body.role).toLowerCase();
            const role = requireChoice("role", rawRole, validateMemberRole(rawRole), isMemberRole);
            const membership = await groups.changeRole(id, uid, userId, role);
            return send(reply, success(membership, `Member role updated to ${role}`));
        },
    );
}
