import type { FastifyInstance } from "fastify";
import { getIdentity } from "../auth.js";
import { AuthenticationError, BadRequestError, ConflictError, NotFoundError } from "../lib/errors.js";
import { isIdentityError, type Session } from "../lib/identity.js";
import { assertField, assertNoFieldErrors, requireBody, requireChoice, text } from "../lib/request.js";
import { send, success } from "../lib/responses.js";
import {
    validateEmail,
    validateName,
    validatePassword,
    validateRequiredFields,
    validateRole,
} from "../lib/validators.js";
import { isRole } from "../types/profile.js";
import type { RouteContext } from "./context.js";

export default async function authRoutes(fastify: FastifyInstance, ctx: RouteContext) {
    const { store, identity, gate, now } = ctx;

    fastify.post("/signup", async (request, reply) => {
        const body = requireBody(request.body);
        assertNoFieldErrors(validateRequiredFields(body, ["email", "password", "name", "role"]));

        const email = text(body.email).toLowerCase();
        const password = typeof body.password === "string" ? body.password : "";
        const name = text(body.name);
        const rawRole = text(body.role).toLowerCase();

        assertField("email", validateEmail(email));
        assertField("password", validatePassword(password));
        assertField("name", validateName(name));
        const role = requireChoice("role", rawRole, validateRole(rawRole), isRole);

        let uid: string;
        try {
            ({ uid } = await identity.createAccount({ email, password, name }));
        } catch (err) {
            if (isIdentityError(err, "email_exists")) throw new ConflictError("Email already registered");
            throw err;
        }

        const timestamp = now().toISOString();
        const user = await store.createProfile({
            id: uid,
            email,
            name,
            role,
            avatar_url: null,
            bio: null,
            location: null,
            created_at: timestamp,
            updated_at: timestamp,
        });

        let session: Session | undefined;
        try {
            ({ session } = await identity.signIn(email, password));
        } catch (err) {
            request.log.warn({ err, uid }, "Sign-in after signup failed");
        }

        return send(
            reply,
            success(
                session ? { user, session } : { user },
                session ? "User registered successfully" : "User registered successfully. Please log in to continue.",
                201,
            ),
        );
    });

    fastify.post("/login", async (request, reply) => {
        const body = requireBody(request.body);
        assertNoFieldErrors(validateRequiredFields(body, ["email", "password"]));

        const email = text(body.email);
        assertField("email", validateEmail(email));
        const password = typeof body.password === "string" ? body.password : "";

        let signedIn: Awaited<ReturnType<typeof identity.signIn>>;
        try {
            signedIn = await identity.signIn(email, password);
        } catch (err) {
            if (isIdentityError(err, "invalid_credentials")) throw new AuthenticationError("Invalid email or password");
            throw err;
        }

        const user = await store.getProfile(signedIn.uid);
        if (!user) throw new NotFoundError("User profile not found");

        return send(reply, success({ user, session: signedIn.session }, "Login successful"));
    });

    fastify.post("/logout", { preHandler: gate.requireAuth }, async (request, reply) => {
        const { uid } = getIdentity(request);
        await identity.revokeSessions(uid);
        return send(reply, success(undefined, "Logout successful"));
    });

    fastify.get("/me", { preHandler: gate.requireAuth }, async (request, reply) => {
        return send(reply, success(getIdentity(request).profile));
    });

    fastify.post("/refresh", async (request, reply) => {
        const body = requireBody(request.body);
        const refreshToken = text(body.refresh_token);
        if (!refreshToken) throw new BadRequestError("Refresh token is required");

        try {
            const session = await identity.refresh(refreshToken);
            return send(reply, success(session, "Token refreshed successfully"));
        } catch (err) {
            if (isIdentityError(err, "invalid_refresh_token")) {
                throw new BadRequestError("Invalid or expired refresh token");
            }
            throw err;
        }
    });
}
