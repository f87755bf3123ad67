import type { FastifyInstance } from "fastify";
import { getIdentity } from "../auth.js";
import { BadRequestError, NotFoundError, ValidationError } from "../lib/errors.js";
import { EVENT_NOT_FOUND } from "../lib/eventManager.js";
import { assertNoFieldErrors, assertUuid, nullableText, queryText, requireBody, requireChoice, text } from "../lib/request.js";
import { send, success } from "../lib/responses.js";
import { isDateTime, parseCapacity, toIsoDateTime, validateEventData } from "../lib/validators.js";
import { isEventCategory, isEventStatus, type EventPatch, type NewEvent } from "../types/event.js";
import type { RouteContext } from "./context.js";

type QueryValue = string | string[];

interface EventQuery {
    city?: QueryValue;
    category?: QueryValue;
    search?: QueryValue;
}

/** Copies the present fields of an already validated payload. */
export function toEventPatch(body: Record<string, unknown>): EventPatch {
    const patch: EventPatch = {};
    if (body.title !== undefined) patch.title = text(body.title);
    if (body.description !== undefined) patch.description = text(body.description);
    if (body.location !== undefined) patch.location = text(body.location);
    if (body.city !== undefined) patch.city = text(body.city);
    if (body.address !== undefined) patch.address = nullableText(body.address);
    if (body.image_url !== undefined) patch.image_url = nullableText(body.image_url);
    if (isDateTime(body.datetime)) patch.datetime = toIsoDateTime(body.datetime);
    if (body.end_datetime !== undefined) {
        patch.end_datetime = isDateTime(body.end_datetime) ? toIsoDateTime(body.end_datetime) : null;
    }
    if (body.capacity !== undefined) patch.capacity = parseCapacity(body.capacity);

    const category = text(body.category).toLowerCase();
    if (isEventCategory(category)) patch.category = category;
    const status = text(body.status).toLowerCase();
    if (isEventStatus(status)) patch.status = status;
    return patch;
}

export default async function eventRoutes(fastify: FastifyInstance, ctx: RouteContext) {
    const { store, gate, events, now } = ctx;
    const organizerOnly = gate.requireRole("organizer");

    fastify.get<{ Querystring: EventQuery }>("/", { preHandler: gate.optionalAuth }, async (request, reply) => {
        const category = queryText(request.query.category).toLowerCase();
        const list = await events.search(
            {
                city: queryText(request.query.city) || undefined,
                category: isEventCategory(category) ? category : undefined,
                search: queryText(request.query.search) || undefined,
            },
            request.auth?.uid,
        );
        return send(reply, success({ events: list }));
    });

    fastify.get("/trending", { preHandler: gate.optionalAuth }, async (request, reply) => {
        return send(reply, success({ events: await events.trending(request.auth?.uid) }));
    });

    fastify.get("/organizer/my-events", { preHandler: organizerOnly }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const own = await store.listEventsByOrganizer(uid);
        return send(reply, success({ events: await events.present(own, uid) }));
    });

    fastify.get<{ Params: { id: string } }>("/:id", { preHandler: gate.optionalAuth }, async (request, reply) => {
        const { id } = request.params;
        assertUuid(id);
        return send(reply, success(await events.getVisible(id, request.auth?.uid)));
    });

    fastify.post("/", { preHandler: organizerOnly }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const body = requireBody(request.body);
        assertNoFieldErrors(validateEventData(body, { now: now() }));

        const fields = toEventPatch(body);
        const rawCategory = text(body.category).toLowerCase();
        const input: NewEvent = {
            organizer_id: uid,
            title: text(body.title),
            description: text(body.description),
            datetime: fields.datetime ?? toIsoDateTime(text(body.datetime)),
            end_datetime: fields.end_datetime ?? null,
            location: text(body.location),
            city: text(body.city),
            address: fields.address ?? null,
            category: requireChoice("category", rawCategory, { ok: true }, isEventCategory),
            image_url: fields.image_url ?? null,
            capacity: fields.capacity ?? null,
        };

        const created = await store.createEvent(input);
        const [view] = await events.present([created], uid);
        return send(reply, success(view, "Event created successfully", 201));
    });

    fastify.put<{ Params: { id: string } }>("/:id", { preHandler: organizerOnly }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { id } = request.params;
        assertUuid(id);
        const body = requireBody(request.body);

        const event = await events.getOwned(id, uid, "update");
        assertNoFieldErrors(validateEventData(body, { partial: true }));

        const patch = toEventPatch(body);
        if (Object.keys(patch).length === 0) throw new BadRequestError("No fields to update");

        const start = patch.datetime ?? event.datetime;
        const end = patch.end_datetime !== undefined ? patch.end_datetime : event.end_datetime;
        if ((patch.datetime !== undefined || patch.end_datetime !== undefined) && end !== null && end <= start) {
            throw new ValidationError({ end_datetime: "End datetime must be after the start datetime" });
        }

        const updated = await store.updateEvent(id, patch);
        if (!updated) throw new NotFoundError(EVENT_NOT_FOUND);
        const [view] = await events.present([updated], uid);
        return send(reply, success(view, "Event updated successfully"));
    });

    fastify.delete<{ Params: { id: string } }>("/:id", { preHandler: organizerOnly }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { id } = request.params;
        assertUuid(id);

        await events.getOwned(id, uid, "delete");
        await store.updateEvent(id, { status: "canceled" });
        return send(reply, success(undefined, "Event canceled successfully"));
    });
}
