import type { FastifyInstance } from "fastify";
import { getIdentity } from "../auth.js";
import { assertUuid } from "../lib/request.js";
import { send, success } from "../lib/responses.js";
import type { RouteContext } from "./context.js";

export default async function rsvpRoutes(fastify: FastifyInstance, ctx: RouteContext) {
    const { gate, events } = ctx;

    fastify.get("/my-rsvps", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        return send(reply, success({ events: await events.reservations(uid) }));
    });

    fastify.post<{ Params: { eventId: string } }>("/:eventId", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { eventId } = request.params;
        assertUuid(eventId);

        const { rsvp, event } = await events.reserveSeat(eventId, uid);
        request.log.info({ eventId, uid }, "RSVP created");
        return send(
            reply,
            success(
                { rsvp, event: { id: event.id, title: event.title, datetime: event.datetime } },
                "RSVP successful",
                201,
            ),
        );
    });

    fastify.delete<{ Params: { eventId: string } }>("/:eventId", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        const { eventId } = request.params;
        assertUuid(eventId);

        await events.cancelReservation(eventId, uid);
        return send(reply, success(undefined, "RSVP canceled successfully"));
    });
}
