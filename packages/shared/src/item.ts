export const ITEM_STATUSES = ["PROCESSING", "SUCCEEDED", "FAILED"] as const;

export type ItemStatus = (typeof ITEM_STATUSES)[number];

export type TerminalStatus = Exclude<ItemStatus, "PROCESSING">;

export const THUMBNAIL_VARIANTS = ["small", "medium"] as const;
export type ThumbnailVariant = (typeof THUMBNAIL_VARIANTS)[number];

export type ThumbnailRefs = Record<ThumbnailVariant, string>;

export const ALLOWED_MIME_TYPES = ["image/jpeg", "image/png"] as const;
export type AllowedMimeType = (typeof ALLOWED_MIME_TYPES)[number];

type ItemBase = {
  id: string;
  originalName: string | null;
  mimeType: AllowedMimeType;
  sizeBytes: number;
  storedRef: string;
  createdAt: string;
};

export type ProcessingItem = ItemBase & {
  status: "PROCESSING";
  completedAt: null;
  processingDurationMs: null;
};

export type SucceededItem = ItemBase & {
  status: "SUCCEEDED";
  width: number;
  height: number;
  /** Encoder's canonical name, e.g. `JPEG`. Use `clientFormat` for output. */
  format: string;
  caption: string;
  thumbnailRefs: ThumbnailRefs;
  completedAt: string;
  processingDurationMs: number;
};

export type FailedItem = ItemBase & {
  status: "FAILED";
  error: string;
  completedAt: string;
  processingDurationMs: number;
};

export type Item = ProcessingItem | SucceededItem | FailedItem;

export type NewItem = Omit<ProcessingItem, "status" | "completedAt" | "processingDurationMs">;

export type SucceededUpdate = Omit<SucceededItem, keyof ItemBase>;
export type FailedUpdate = Omit<FailedItem, keyof ItemBase>;

/** The single write that moves an item out of `PROCESSING`. */
export type TerminalUpdate = SucceededUpdate | FailedUpdate;

export function isTerminal(status: ItemStatus): status is TerminalStatus {
  return status !== "PROCESSING";
}
