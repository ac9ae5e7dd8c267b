export {
  ALLOWED_MIME_TYPES,
  THUMBNAIL_VARIANTS,
  isTerminal,
} from "./item.js";
export type {
  AllowedMimeType,
  FailedItem,
  FailedUpdate,
  Item,
  ItemStatus,
  NewItem,
  ProcessingItem,
  SucceededItem,
  SucceededUpdate,
  TerminalStatus,
  TerminalUpdate,
  ThumbnailRefs,
  ThumbnailVariant,
} from "./item.js";

export {
  clientFormat,
  extensionForMimeType,
  isAllowedMimeType,
  isThumbnailVariant,
  normalizeContentType,
  normalizeOriginalName,
} from "./upload.js";

export {
  BlobStoreError,
  ConflictError,
  NotFoundError,
  RepositoryError,
  ServiceError,
  StageFailure,
  UnavailableError,
  ValidationError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, StageName } from "./errors.js";
