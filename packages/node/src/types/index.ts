/**
 * Type barrel: re-exports all public types from @stockpile/node.
 */

// DTOs
export {
  ItemKeySchema,
  EventKindSchema,
  AddContributionSchema,
  QuantityOverrideSchema,
  RedistributeSchema,
  AdjustQuantitySchema,
  RemoveEventsSchema,
  ArchiveEpochSchema,
  StockQuerySchema,
  InventoryQuerySchema,
  ListEventsQuerySchema,
  ContributorsQuerySchema,
  EventParamsSchema,
  ArchiveParamsSchema,
} from "./dto.js";
export type {
  AddContributionDto,
  QuantityOverrideDto,
  RedistributeDto,
  AdjustQuantityDto,
  RemoveEventsDto,
  ArchiveEpochDto,
  StockQuery,
  InventoryQuery,
  ListEventsQuery,
  ContributorsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ResponseErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type { PaginationMeta, PaginatedResponse } from "./pagination.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
