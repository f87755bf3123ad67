import { randomUUID } from "crypto";
import { z } from "zod";

export interface Session {
    access_token: string;
    refresh_token: string;
    /** Unix seconds. */
    expires_at: number;
}

export interface VerifiedIdentity {
    uid: string;
    email?: string;
}

export type IdentityErrorCode = "email_exists" | "invalid_credentials" | "invalid_token" | "invalid_refresh_token";

export class IdentityError extends Error {
    constructor(
        readonly code: IdentityErrorCode,
        message: string,
    ) {
        super(message);
        this.name = "IdentityError";
    }
}

export function isIdentityError(err: unknown, code?: IdentityErrorCode): err is IdentityError {
    return err instanceof IdentityError && (code === undefined || err.code === code);
}

/**
 * Account store and token authority. Implementations must throw IdentityError
 * for the failures callers are expected to report to clients.
 */
export interface IdentityProvider {
    createAccount(input: { email: string; password: string; name: string }): Promise<{ uid: string }>;
    signIn(email: string, password: string): Promise<{ uid: string; session: Session }>;
    refresh(refreshToken: string): Promise<Session>;
    verifyToken(token: string): Promise<VerifiedIdentity>;
    revokeSessions(uid: string): Promise<void>;
}

const IDENTITY_TOOLKIT_URL = "https://identitytoolkit.googleapis.com/v1/accounts:signInWithPassword";
const SECURE_TOKEN_URL = "https://securetoken.googleapis.com/v1/token";

const signInResponseSchema = z.object({
    idToken: z.string(),
    refreshToken: z.string(),
    expiresIn: z.string(),
    localId: z.string(),
});

const refreshResponseSchema = z.object({
    id_token: z.string(),
    refresh_token: z.string(),
    expires_in: z.string(),
});

const restErrorSchema = z.object({
    error: z.object({ message: z.string() }),
});

const INVALID_LOGIN = new Set(["INVALID_LOGIN_CREDENTIALS", "EMAIL_NOT_FOUND", "INVALID_PASSWORD", "USER_DISABLED", "INVALID_EMAIL"]);

const INVALID_REFRESH = new Set([
    "TOKEN_EXPIRED",
    "INVALID_REFRESH_TOKEN",
    "INVALID_GRANT_TYPE",
    "MISSING_REFRESH_TOKEN",
    "USER_DISABLED",
    "USER_NOT_FOUND",
]);

function firebaseCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
        return err.code;
    }
    return undefined;
}

async function restErrorCode(resp: Response): Promise<string> {
    const body: unknown = await resp.json().catch(() => ({}));
    const parsed = restErrorSchema.safeParse(body);
    // messages look like "INVALID_PASSWORD : optional detail"
    return parsed.success ? (parsed.data.error.message.split(" ")[0] ?? "") : "";
}

function expiresAt(expiresInSec: string, now: number): number {
    return Math.floor(now / 1000) + Number.parseInt(expiresInSec, 10);
}

/** The slice of the Admin SDK's Auth client used here. */
export interface AdminAuth {
    createUser(properties: { uid: string; email: string; password: string; displayName: string }): Promise<{ uid: string }>;
    verifyIdToken(idToken: string, checkRevoked?: boolean): Promise<{ uid: string; email?: string }>;
    revokeRefreshTokens(uid: string): Promise<void>;
}

/**
 * Firebase Authentication. The Admin SDK owns accounts and token verification;
 * password sign-in and refresh go through the public REST endpoints since the
 * Admin SDK cannot mint sessions for a password.
 */
export class FirebaseIdentity implements IdentityProvider {
    constructor(
        private readonly auth: AdminAuth,
        private readonly apiKey: string,
        private readonly now: () => number = Date.now,
    ) {}

    async createAccount(input: { email: string; password: string; name: string }): Promise<{ uid: string }> {
        try {
            const user = await this.auth.createUser({
                uid: randomUUID(),
                email: input.email,
                password: input.password,
                displayName: input.name,
            });
            return { uid: user.uid };
        } catch (err) {
            if (firebaseCode(err) === "auth/email-already-exists") {
                throw new IdentityError("email_exists", "Email already registered");
            }
            throw err;
        }
    }

    async signIn(email: string, password: string): Promise<{ uid: string; session: Session }> {
        const resp = await fetch(`${IDENTITY_TOOLKIT_URL}?key=${encodeURIComponent(this.apiKey)}`, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ email, password, returnSecureToken: true }),
        });
        if (!resp.ok) {
            const code = await restErrorCode(resp);
            if (INVALID_LOGIN.has(code)) throw new IdentityError("invalid_credentials", "Invalid email or password");
            throw new Error(`Password sign-in failed with status ${resp.status}${code ? ` (${code})` : ""}`);
        }
        const data = signInResponseSchema.parse(await resp.json());
        return {
            uid: data.localId,
            session: {
                access_token: data.idToken,
                refresh_token: data.refreshToken,
                expires_at: expiresAt(data.expiresIn, this.now()),
            },
        };
    }

    async refresh(refreshToken: string): Promise<Session> {
        const resp = await fetch(`${SECURE_TOKEN_URL}?key=${encodeURIComponent(this.apiKey)}`, {
            method: "POST",
            headers: { "Content-Type": "application/x-www-form-urlencoded" },
            body: new URLSearchParams({ grant_type: "refresh_token", refresh_token: refreshToken }).toString(),
        });
        if (!resp.ok) {
            const code = await restErrorCode(resp);
            if (INVALID_REFRESH.has(code)) {
                throw new IdentityError("invalid_refresh_token", "Invalid or expired refresh token");
            }
            throw new Error(`Token refresh failed with status ${resp.status}${code ? ` (${code})` : ""}`);
        }
        const data = refreshResponseSchema.parse(await resp.json());
        return {
            access_token: data.id_token,
            refresh_token: data.refresh_token,
            expires_at: expiresAt(data.expires_in, this.now()),
        };
    }

    async verifyToken(token: string): Promise<VerifiedIdentity> {
        try {
            // checkRevoked so that logout invalidates outstanding ID tokens
            const decoded = await this.auth.verifyIdToken(token, true);
            return { uid: decoded.uid, email: decoded.email };
        } catch (err) {
            throw new IdentityError("invalid_token", err instanceof Error ? err.message : "Invalid or expired token");
        }
    }

    async revokeSessions(uid: string): Promise<void> {
        await this.auth.revokeRefreshTokens(uid);
    }
}
