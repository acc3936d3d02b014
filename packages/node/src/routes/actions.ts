/**
 * Action lifecycle routes.
 *
 * POST   /api/v1/actions              Propose an action
 * GET    /api/v1/actions              List pending actions (cursor pagination)
 * GET    /api/v1/actions/:id          Get a pending action
 * POST   /api/v1/actions/:id/sign     Sign
 * POST   /api/v1/actions/:id/unsign   Withdraw a signature
 * POST   /api/v1/actions/:id/discard  Discard an action below quorum
 * POST   /api/v1/actions/:id/perform  Perform a ready action
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ActionIdParamSchema,
  CreateActionSchema,
  ListActionsQuerySchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createActionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/actions: Propose
  routes.post("/", validateBody(CreateActionSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const actionId = service.propose(body, c.get("auth").address);
    return c.json({ data: { actionId } }, 201);
  });

  // GET /api/v1/actions: List
  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListActionsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const result = paginate(
      service.listActions(),
      queryResult.data,
      (action) => action.id,
      "id",
    );
    return c.json(result);
  });

  // GET /api/v1/actions/:id
  routes.get("/:id", (c) => {
    const rawId = c.req.param("id");
    const actionId = parseActionId(rawId);
    if (actionId === undefined) {
      return invalidActionId(c, rawId);
    }

    const action = c.get("service").getAction(actionId);
    if (action === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Action ${actionId} does not exist`),
        404,
      );
    }
    return c.json({ data: action });
  });

  // POST /api/v1/actions/:id/sign
  routes.post("/:id/sign", (c) => {
    const rawId = c.req.param("id");
    const actionId = parseActionId(rawId);
    if (actionId === undefined) {
      return invalidActionId(c, rawId);
    }

    const service = c.get("service");
    service.sign(actionId, c.get("auth").address);
    return c.json({ data: service.getAction(actionId) });
  });

  // POST /api/v1/actions/:id/unsign
  routes.post("/:id/unsign", (c) => {
    const rawId = c.req.param("id");
    const actionId = parseActionId(rawId);
    if (actionId === undefined) {
      return invalidActionId(c, rawId);
    }

    const service = c.get("service");
    service.unsign(actionId, c.get("auth").address);
    return c.json({ data: service.getAction(actionId) });
  });

  // POST /api/v1/actions/:id/discard
  routes.post("/:id/discard", (c) => {
    const rawId = c.req.param("id");
    const actionId = parseActionId(rawId);
    if (actionId === undefined) {
      return invalidActionId(c, rawId);
    }

    c.get("service").discard(actionId, c.get("auth").address);
    return c.json({ data: { actionId, discarded: true } });
  });

  // POST /api/v1/actions/:id/perform
  routes.post("/:id/perform", (c) => {
    const rawId = c.req.param("id");
    const actionId = parseActionId(rawId);
    if (actionId === undefined) {
      return invalidActionId(c, rawId);
    }

    const result = c.get("service").perform(actionId, c.get("auth").address);
    return c.json({ data: { actionId, ...result } });
  });

  return routes;
}

function parseActionId(raw: string): number | undefined {
  const result = ActionIdParamSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}

function invalidActionId(c: Context<AppEnv>, raw: string): Response {
  return c.json(createErrorEnvelope("VALIDATION_ERROR", `Invalid action id '${raw}'`), 400);
}
