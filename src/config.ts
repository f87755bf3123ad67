import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const optional = z
    .string()
    .trim()
    .transform((value) => (value === "" ? undefined : value))
    .optional();

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    HOST: z.string().trim().min(1).default("0.0.0.0"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    CORS_ORIGIN: z.string().trim().min(1).default("*"),
    FIREBASE_API_KEY: z.string({ required_error: "is required" }).trim().min(1, "is required"),
    FIREBASE_PROJECT_ID: optional,
    GOOGLE_APPLICATION_CREDENTIALS: optional,
    REDIS_URL: optional,
    EVENT_CACHE_TTL_SEC: z.coerce.number().int().positive().default(3600),
    APP_VERSION: z.string().trim().min(1).default("1.0.0"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
    port: number;
    host: string;
    env: "development" | "production" | "test";
    logLevel: LogLevel;
    corsOrigin: string | string[];
    firebase: {
        apiKey: string;
        projectId?: string;
        credentialsPath?: string;
    };
    redisUrl?: string;
    eventCacheTtlSec: number;
    version: string;
}

/** "*" or a comma-separated list of origins. */
function parseOrigins(value: string): string | string[] {
    if (value === "*") return value;
    const origins = value
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean);
    return origins.length === 1 ? origins[0] : origins;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
        throw new Error(`Invalid configuration: ${problems.join("; ")}`);
    }

    const vars = parsed.data;
    return {
        port: vars.PORT,
        host: vars.HOST,
        env: vars.NODE_ENV,
        logLevel: vars.LOG_LEVEL,
        corsOrigin: parseOrigins(vars.CORS_ORIGIN),
        firebase: {
            apiKey: vars.FIREBASE_API_KEY,
            projectId: vars.FIREBASE_PROJECT_ID,
            credentialsPath: vars.GOOGLE_APPLICATION_CREDENTIALS,
        },
        redisUrl: vars.REDIS_URL,
        eventCacheTtlSec: vars.EVENT_CACHE_TTL_SEC,
        version: vars.APP_VERSION,
    };
}
