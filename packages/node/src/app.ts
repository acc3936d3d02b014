/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests build it
 * directly; main.ts serves it.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { MultisigService } from "./services/multisig-service.js";
import type { MultisigServiceConfig } from "./services/multisig-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createActionRoutes } from "./routes/actions.js";
import { createEventRoutes } from "./routes/events.js";
import { createStateRoutes } from "./routes/state.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: MultisigServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, every /api request needs an API key. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: MultisigService;
}

/**
 * Create the Hono application with all middleware and routes.
 *
 * @throws MultisigError if the service config is not a valid initial state
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new MultisigService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Caller header
    app.use("/api/*", callerHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/actions", createActionRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1", createStateRoutes());

  return { app, service };
}
