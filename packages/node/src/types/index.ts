/**
 * Type barrel: re-exports all public types from @consortium/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  HexBytesSchema,
  CodeMetadataSchema,
  CallDataSchema,
  PaginationQuerySchema,
  ActionIdParamSchema,
  CreateActionSchema,
  ListActionsQuerySchema,
  ListEventsQuerySchema,
  EVENT_TYPES,
} from "./dto.js";
export type {
  CallDataDto,
  CreateActionDto,
  ListActionsQuery,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export type { AuthMethod, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
