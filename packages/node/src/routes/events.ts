/**
 * Event query routes.
 *
 * GET /api/v1/events: Engine events in emission order (cursor pagination).
 *   ?afterSequence=N  only events after sequence N
 *   ?type=T           only events of one type
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const entries = service.readEvents(
      query.afterSequence !== undefined ? query.afterSequence + 1 : undefined,
    );
    const filtered =
      query.type !== undefined
        ? entries.filter((entry) => entry.event.type === query.type)
        : entries;

    const result = paginate(
      filtered,
      { cursor: query.cursor, limit: query.limit },
      (entry) => entry.sequence,
      "sequence",
    );

    return c.json(result);
  });

  return routes;
}
