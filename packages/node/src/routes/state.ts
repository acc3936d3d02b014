/**
 * Governance state routes.
 *
 * GET /api/v1/board           Quorum, board members, proposers, balance
 * GET /api/v1/roles/:address  Role of one address
 * GET /api/v1/snapshot        Full engine snapshot with digest
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createStateRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/board", (c) => {
    return c.json({ data: c.get("service").board() });
  });

  routes.get("/roles/:address", (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid address '${c.req.param("address")}'`),
        400,
      );
    }

    const address = parsed.data;
    return c.json({ data: { address, role: c.get("service").roleOf(address) } });
  });

  routes.get("/snapshot", (c) => {
    return c.json({ data: c.get("service").snapshot() });
  });

  return routes;
}
