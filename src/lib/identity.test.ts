import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FirebaseIdentity, IdentityError, type AdminAuth } from "./identity.js";

const NOW = 1_700_000_000_500;

function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function fakeAuth() {
    return {
        createUser: vi.fn(async (props: { uid: string; email: string; password: string; displayName: string }) => ({
            uid: props.uid,
        })),
        verifyIdToken: vi.fn(async (_token: string, _checkRevoked?: boolean) => ({
            uid: "user-1",
            email: "user@example.com",
        })),
        revokeRefreshTokens: vi.fn(async (_uid: string) => undefined),
    } satisfies AdminAuth;
}

describe("FirebaseIdentity", () => {
    let auth: ReturnType<typeof fakeAuth>;
    let identity: FirebaseIdentity;
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse(200, {}));

    beforeEach(() => {
        auth = fakeAuth();
        identity = new FirebaseIdentity(auth, "test-key", () => NOW);
        fetchMock.mockReset();
        vi.stubGlobal("fetch", fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe("createAccount", () => {
        it("creates the user under a UUID uid", async () => {
            const { uid } = await identity.createAccount({
                email: "user@example.com",
                password: "password123",
                name: "Test User",
            });

            expect(uid).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
            expect(auth.createUser).toHaveBeenCalledWith({
                uid,
                email: "user@example.com",
                password: "password123",
                displayName: "Test User",
            });
        });

        it("reports a taken email", async () => {
            auth.createUser.mockRejectedValueOnce(
                Object.assign(new Error("The email address is already in use"), { code: "auth/email-already-exists" }),
            );

            await expect(
                identity.createAccount({ email: "user@example.com", password: "password123", name: "Test User" }),
            ).rejects.toMatchObject({ name: "IdentityError", code: "email_exists" });
        });

        it("rethrows other failures", async () => {
            auth.createUser.mockRejectedValueOnce(new Error("quota exceeded"));

            await expect(
                identity.createAccount({ email: "user@example.com", password: "password123", name: "Test User" }),
            ).rejects.toThrow("quota exceeded");
        });
    });

    describe("signIn", () => {
        it("exchanges a password for a session", async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse(200, { idToken: "id-1", refreshToken: "refresh-1", expiresIn: "3600", localId: "user-1" }),
            );

            const result = await identity.signIn("user@example.com", "password123");

            expect(result).toEqual({
                uid: "user-1",
                session: { access_token: "id-1", refresh_token: "refresh-1", expires_at: 1_700_003_600 },
            });
            const [url, init] = fetchMock.mock.calls[0];
            expect(url).toBe("https://identitytoolkit.googleapis.com/v1/accounts:signInWithPassword?key=test-key");
            expect(init?.method).toBe("POST");
            expect(init?.body).toBe(
                JSON.stringify({ email: "user@example.com", password: "password123", returnSecureToken: true }),
            );
        });

        it.each(["INVALID_LOGIN_CREDENTIALS", "INVALID_PASSWORD : Wrong password", "EMAIL_NOT_FOUND"])(
            "maps %s to invalid credentials",
            async (message) => {
                fetchMock.mockResolvedValueOnce(jsonResponse(400, { error: { message } }));

                await expect(identity.signIn("user@example.com", "wrong-pass1")).rejects.toMatchObject({
                    code: "invalid_credentials",
                    message: "Invalid email or password",
                });
            },
        );

        it("surfaces unexpected failures as plain errors", async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse(500, { error: { message: "INTERNAL" } }));

            const failure = identity.signIn("user@example.com", "password123");
            await expect(failure).rejects.toThrow("Password sign-in failed with status 500 (INTERNAL)");
            await expect(failure).rejects.not.toBeInstanceOf(IdentityError);
        });
    });

    describe("refresh", () => {
        it("posts a form-encoded refresh grant", async () => {
            fetchMock.mockResolvedValueOnce(
                jsonResponse(200, { id_token: "id-2", refresh_token: "refresh-2", expires_in: "3600" }),
            );

            const session = await identity.refresh("refresh-1");

            expect(session).toEqual({ access_token: "id-2", refresh_token: "refresh-2", expires_at: 1_700_003_600 });
            const [url, init] = fetchMock.mock.calls[0];
            expect(url).toBe("https://securetoken.googleapis.com/v1/token?key=test-key");
            expect(init?.body).toBe("grant_type=refresh_token&refresh_token=refresh-1");
        });

        it("maps an expired refresh token", async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse(400, { error: { message: "TOKEN_EXPIRED" } }));

            await expect(identity.refresh("refresh-1")).rejects.toMatchObject({ code: "invalid_refresh_token" });
        });
    });

    describe("verifyToken", () => {
        it("checks revocation", async () => {
            await expect(identity.verifyToken("id-1")).resolves.toEqual({ uid: "user-1", email: "user@example.com" });
            expect(auth.verifyIdToken).toHaveBeenCalledWith("id-1", true);
        });

        it("wraps verification failures", async () => {
            auth.verifyIdToken.mockRejectedValueOnce(new Error("Firebase ID token has been revoked"));

            await expect(identity.verifyToken("id-1")).rejects.toMatchObject({
                code: "invalid_token",
                message: "Firebase ID token has been revoked",
            });
        });
    });

    it("revokes refresh tokens on sign-out", async () => {
        await identity.revokeSessions("user-1");
        expect(auth.revokeRefreshTokens).toHaveBeenCalledWith("user-1");
    });
});
