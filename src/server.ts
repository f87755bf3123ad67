import "dotenv/config";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { initFirebase } from "./firebase.js";
import { connectRedis, createRedis } from "./redis.js";
import { EventCache } from "./lib/eventCache.js";
import { FirebaseIdentity } from "./lib/identity.js";
import { FirestoreStore } from "./lib/firestoreStore.js";

async function main(): Promise<void> {
    const config = loadConfig();
    const firebase = initFirebase(config.firebase);

    const redis = config.redisUrl ? createRedis(config.redisUrl) : null;
    const cache = redis ? new EventCache(redis, config.eventCacheTtlSec) : null;

    const server = await buildApp(
        {
            store: new FirestoreStore(firebase.db, cache),
            identity: new FirebaseIdentity(firebase.auth, config.firebase.apiKey),
        },
        { logger: { level: config.logLevel }, corsOrigin: config.corsOrigin, version: config.version },
    );

    if (redis) {
        server.addHook("onClose", async () => {
            await redis.quit();
        });
        await connectRedis(redis, server.log);
    } else {
        server.log.info("REDIS_URL not set, event cache disabled");
    }

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            server.log.info(`${signal} received, shutting down`);
            server.close().then(
                () => process.exit(0),
                (err) => {
                    server.log.error({ err }, "Shutdown failed");
                    process.exit(1);
                },
            );
        });
    }

    await server.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
    console.error(err);
    process.exit(1);
});
