/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { CompassService } from "../services/compass-service.js";
import type { AgentRegistry } from "@stellar-compass/agents";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Composition root for the request handlers */
    service: CompassService;

    /** Per-address monitoring agents */
    agents: AgentRegistry;
  };
}

/**
 * Environment of a handler that runs after validateBody(schema).
 */
export type ValidatedEnv<T> = AppEnv & {
  Variables: {
    validatedBody: T;
  };
};
