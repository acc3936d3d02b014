/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Amounts travel as decimal integer strings; the service converts
 * them to bigint before they reach the engine.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .regex(/^[A-Za-z0-9:_.-]{1,128}$/, "Invalid address");

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative decimal integer string");

export const HexBytesSchema = z
  .string()
  .regex(/^(?:[0-9a-f]{2})*$/, "Arguments must be lowercase even-length hex");

export const CodeMetadataSchema = z.object({
  upgradeable: z.boolean().default(true),
  readable: z.boolean().default(true),
  payable: z.boolean().default(false),
  payableBySc: z.boolean().default(false),
});

export const CallDataSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema.default("0"),
  endpoint: z.string().max(256).optional(),
  args: z.array(HexBytesSchema).default([]),
});

export type CallDataDto = z.infer<typeof CallDataSchema>;

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const ActionIdParamSchema = z.coerce.number().int().min(1);

// =============================================================================
// Action DTOs
// =============================================================================

export const CreateActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("add_board_member"), address: AddressSchema }),
  z.object({ type: z.literal("add_proposer"), address: AddressSchema }),
  z.object({ type: z.literal("remove_user"), address: AddressSchema }),
  z.object({ type: z.literal("change_quorum"), quorum: z.number().int().min(0) }),
  z.object({ type: z.literal("send_transfer_execute"), call: CallDataSchema }),
  z.object({ type: z.literal("send_async_call"), call: CallDataSchema }),
  z.object({
    type: z.literal("sc_deploy_from_source"),
    amount: AmountSchema.default("0"),
    source: AddressSchema,
    codeMetadata: CodeMetadataSchema.default({}),
    args: z.array(HexBytesSchema).default([]),
  }),
  z.object({
    type: z.literal("sc_upgrade_from_source"),
    target: AddressSchema,
    amount: AmountSchema.default("0"),
    source: AddressSchema,
    codeMetadata: CodeMetadataSchema.default({}),
    args: z.array(HexBytesSchema).default([]),
  }),
]);

export type CreateActionDto = z.infer<typeof CreateActionSchema>;

export const ListActionsQuerySchema = PaginationQuerySchema;

export type ListActionsQuery = z.infer<typeof ListActionsQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const EVENT_TYPES = [
  "action_proposed",
  "action_signed",
  "action_unsigned",
  "action_discarded",
  "action_performed",
  "user_role_changed",
  "quorum_changed",
  "transfer_execute",
  "async_call",
  "async_call_success",
  "async_call_error",
  "sc_deploy",
  "sc_upgrade",
] as const;

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterSequence: z.coerce.number().int().min(0).optional(),
  type: z.enum(EVENT_TYPES).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
