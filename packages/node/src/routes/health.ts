/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MultisigService } from "../services/multisig-service.js";

export function createHealthRoutes(service: MultisigService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      account: service.multisig.account,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
