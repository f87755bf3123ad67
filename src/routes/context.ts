import type { AuthGate } from "../auth.js";
import type { EventManager } from "../lib/eventManager.js";
import type { GroupManager } from "../lib/groupManager.js";
import type { IdentityProvider } from "../lib/identity.js";
import type { DataStore } from "../lib/store.js";

/** Passed to every route plugin as its register options. */
export interface RouteContext {
    store: DataStore;
    identity: IdentityProvider;
    gate: AuthGate;
    events: EventManager;
    groups: GroupManager;
    now: () => Date;
}
