/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createActionRoutes } from "./actions.js";
export { createEventRoutes } from "./events.js";
export { createStateRoutes } from "./state.js";
