import type { FastifyInstance } from "fastify";
import { getIdentity } from "../auth.js";
import { BadRequestError, NotFoundError } from "../lib/errors.js";
import { assertNoFieldErrors, assertUuid, nullableText, requireBody, requireChoice, text } from "../lib/request.js";
import { send, success } from "../lib/responses.js";
import { validateProfileUpdate, validateRole } from "../lib/validators.js";
import { isRole, type ProfilePatch } from "../types/profile.js";
import type { RouteContext } from "./context.js";

const USER_NOT_FOUND = "User not found";

export default async function profileRoutes(fastify: FastifyInstance, ctx: RouteContext) {
    const { store, gate } = ctx;

    fastify.get<{ Params: { id: string } }>("/:id", async (request, reply) => {
        const { id } = request.params;
        assertUuid(id);

        const profile = await store.getProfile(id);
        if (!profile) throw new NotFoundError(USER_NOT_FOUND);
        return send(reply, success(profile));
    });

    fastify.put("/", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const body = requireBody(request.body);
        assertNoFieldErrors(validateProfileUpdate(body));

        const patch: ProfilePatch = {};
        if (body.name !== undefined) patch.name = text(body.name);
        if (body.bio !== undefined) patch.bio = nullableText(body.bio);
        if (body.location !== undefined) patch.location = nullableText(body.location);
        if (body.avatar_url !== undefined) patch.avatar_url = nullableText(body.avatar_url);
        if (Object.keys(patch).length === 0) throw new BadRequestError("No fields to update");

        const updated = await store.updateProfile(uid, patch);
        if (!updated) throw new NotFoundError(USER_NOT_FOUND);
        return send(reply, success(updated, "Profile updated successfully"));
    });

    fastify.patch("/role", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const body = requireBody(request.body);
        const rawRole = text(body.role).toLowerCase();
        const role = requireChoice("role", rawRole, validateRole(rawRole), isRole);

        const updated = await store.updateProfile(uid, { role });
        if (!updated) throw new NotFoundError(USER_NOT_FOUND);
        return send(reply, success(updated, `Role updated to ${role}`));
    });
}
