import type { FastifyRequest } from "fastify";
import { AuthenticationError, AuthorizationError, NotFoundError } from "./lib/errors.js";
import type { IdentityProvider } from "./lib/identity.js";
import type { DataStore } from "./lib/store.js";
import type { Profile, Role } from "./types/profile.js";

/** Resolved caller, attached to the request by the auth hooks. */
export interface AuthContext {
    uid: string;
    token: string;
    profile: Profile;
}

export type AuthHook = (request: FastifyRequest) => Promise<void>;

export interface AuthGate {
    requireAuth: AuthHook;
    requireRole(role: Role): AuthHook;
    optionalAuth: AuthHook;
}

export type BearerToken = { status: "ok"; token: string } | { status: "missing" } | { status: "malformed" };

/** Accepts exactly "Bearer <token>", scheme case-insensitive. */
export function parseBearer(header: string | undefined): BearerToken {
    if (!header || !header.trim()) return { status: "missing" };
    const parts = header.trim().split(/\s+/);
    if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer") return { status: "malformed" };
    return { status: "ok", token: parts[1] };
}

export function createAuthGate(deps: { identity: IdentityProvider; store: DataStore }): AuthGate {
    const { identity, store } = deps;

    async function resolve(request: FastifyRequest, token: string): Promise<AuthContext> {
        let uid: string;
        try {
            ({ uid } = await identity.verifyToken(token));
        } catch (err) {
            request.log.warn({ err }, "Auth failed");
            throw new AuthenticationError("Invalid or expired token");
        }

        const profile = await store.getProfile(uid);
        if (!profile) throw new NotFoundError("User profile not found");
        return { uid, token, profile };
    }

    const requireAuth: AuthHook = async (request) => {
        const bearer = parseBearer(request.headers.authorization);
        if (bearer.status === "missing") {
            throw new AuthenticationError("Authorization header is required");
        }
        if (bearer.status === "malformed") {
            throw new AuthenticationError("Invalid authorization header format. Use: Bearer <token>");
        }
        request.auth = await resolve(request, bearer.token);
    };

    const requireRole = (role: Role): AuthHook => {
        return async (request) => {
            await requireAuth(request);
            if (request.auth?.profile.role !== role) {
                throw new AuthorizationError(`${role.charAt(0).toUpperCase()}${role.slice(1)} role required`);
            }
        };
    };

    const optionalAuth: AuthHook = async (request) => {
        request.auth = null;
        const bearer = parseBearer(request.headers.authorization);
        if (bearer.status !== "ok") return;
        try {
            request.auth = await resolve(request, bearer.token);
        } catch (err) {
            request.log.debug({ err }, "Continuing without identity");
            request.auth = null;
        }
    };

    return { requireAuth, requireRole, optionalAuth };
}

/** For handlers behind requireAuth/requireRole; throws 401 if no hook resolved a caller. */
export function getIdentity(request: FastifyRequest): AuthContext {
    if (!request.auth) throw new AuthenticationError();
    return request.auth;
}
