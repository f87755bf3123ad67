import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { createAuthGate } from "./auth.js";
import { InternalError, isAppError } from "./lib/errors.js";
import { createEventManager } from "./lib/eventManager.js";
import { createGroupManager } from "./lib/groupManager.js";
import type { IdentityProvider } from "./lib/identity.js";
import { error, fromAppError, send, success } from "./lib/responses.js";
import type { DataStore } from "./lib/store.js";
import type { RouteContext } from "./routes/context.js";
import authRoutes from "./routes/auth.route.js";
import eventRoutes from "./routes/event.route.js";
import groupRoutes from "./routes/group.route.js";
import messageRoutes from "./routes/message.route.js";
import profileRoutes from "./routes/profile.route.js";
import rsvpRoutes from "./routes/rsvp.route.js";

export interface AppDeps {
    store: DataStore;
    identity: IdentityProvider;
}

export interface AppOptions {
    logger?: FastifyServerOptions["logger"];
    corsOrigin?: string | string[];
    version?: string;
    now?: () => Date;
}

const FRAMEWORK_MESSAGES: Record<number, string> = {
    400: "Malformed request",
    404: "Resource not found",
    405: "Method not allowed",
    413: "Request body is too large",
    415: "Unsupported media type",
};

function frameworkMessage(err: FastifyError, status: number): string {
    if (err.code === "FST_ERR_CTP_EMPTY_JSON_BODY") return "Request body is required";
    return FRAMEWORK_MESSAGES[status] ?? "Bad request";
}

export async function buildApp(deps: AppDeps, options: AppOptions = {}): Promise<FastifyInstance> {
    const { logger = true, corsOrigin = "*", version = "1.0.0", now = () => new Date() } = options;
    const app = Fastify({ logger });

    await app.register(cors, {
        origin: corsOrigin,
        methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
        allowedHeaders: ["Content-Type", "Authorization"],
    });

    app.decorateRequest("auth", null);

    app.setErrorHandler((err: FastifyError, request, reply) => {
        if (isAppError(err)) return send(reply, fromAppError(err));

        const status = err.statusCode;
        if (status !== undefined && status >= 400 && status < 500) {
            request.log.info({ err }, "Request rejected");
            return send(reply, error(frameworkMessage(err, status), status));
        }

        request.log.error({ err }, "Unhandled error");
        return send(reply, error(new InternalError().message, 500));
    });

    app.setNotFoundHandler((_request, reply) => send(reply, error("Resource not found", 404)));

    app.get("/api/health", async (_request, reply) => {
        return send(reply, success({ version }, "EventSaga API is running"));
    });

    const context: RouteContext = {
        store: deps.store,
        identity: deps.identity,
        gate: createAuthGate(deps),
        events: createEventManager(deps.store, now),
        groups: createGroupManager(deps.store),
        now,
    };

    await app.register(authRoutes, { prefix: "/api/auth", ...context });
    await app.register(profileRoutes, { prefix: "/api/profile", ...context });
    await app.register(eventRoutes, { prefix: "/api/events", ...context });
    await app.register(rsvpRoutes, { prefix: "/api/rsvps", ...context });
    await app.register(groupRoutes, { prefix: "/api/groups", ...context });
    await app.register(messageRoutes, { prefix: "/api/groups", ...context });

    return app;
}
