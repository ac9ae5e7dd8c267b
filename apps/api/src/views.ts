import { ensureSchema } from "@imagepipe/contracts";
import {
  BlobStoreError,
  ConflictError,
  type Item,
  NotFoundError,
  THUMBNAIL_VARIANTS,
  ValidationError,
  clientFormat,
  isThumbnailVariant,
} from "@imagepipe/shared";
import type { BlobStore } from "./blob-store.js";
import type { ItemRepository } from "./repository.js";

type ViewMetadata = {
  width: number;
  height: number;
  format: string;
  size_bytes: number;
  caption: string;
};

type ViewThumbnails = {
  small: string;
  medium: string;
};

type EmptyObject = Record<string, never>;

export type ImageView = {
  status: Item["status"];
  data: {
    image_id: string;
    original_name: string | null;
    created_at: string;
    processed_at: string | null;
    metadata: ViewMetadata | EmptyObject;
    thumbnails: ViewThumbnails | EmptyObject;
  };
  error: string | null;
};

export type StatsView = {
  total: number;
  failed: number;
  success_rate: string;
  average_processing_time_seconds: number;
};

function thumbnailUrl(baseUrl: string, itemId: string, variant: string): string {
  return `${baseUrl.replace(/\/+$/u, "")}/api/images/${encodeURIComponent(itemId)}/thumbnails/${variant}`;
}

export function toImageView(item: Item, baseUrl: string): ImageView {
  const data = {
    image_id: item.id,
    original_name: item.originalName,
    created_at: item.createdAt,
    processed_at: item.completedAt,
  };
  switch (item.status) {
    case "SUCCEEDED":
      return {
        status: item.status,
        data: {
          ...data,
          metadata: {
            width: item.width,
            height: item.height,
            format: clientFormat(item.format),
            size_bytes: item.sizeBytes,
            caption: item.caption,
          },
          thumbnails: {
            small: thumbnailUrl(baseUrl, item.id, "small"),
            medium: thumbnailUrl(baseUrl, item.id, "medium"),
          },
        },
        error: null,
      };
    case "FAILED":
      return { status: item.status, data: { ...data, metadata: {}, thumbnails: {} }, error: item.error };
    case "PROCESSING":
      return { status: item.status, data: { ...data, metadata: {}, thumbnails: {} }, error: null };
  }
}

export function listImageViews(repository: ItemRepository, baseUrl: string): ImageView[] {
  return repository.list().map((item) => toImageView(item, baseUrl));
}

export function getImageView(repository: ItemRepository, itemId: string, baseUrl: string): ImageView {
  const item = repository.get(itemId);
  if (!item) {
    throw new NotFoundError("Image not found.", { details: { image_id: itemId } });
  }
  return ensureSchema("imageView", toImageView(item, baseUrl));
}

export async function resolveThumbnail(
  repository: ItemRepository,
  blobs: BlobStore,
  itemId: string,
  variant: string,
): Promise<Buffer> {
  const item = repository.get(itemId);
  if (!item) {
    throw new NotFoundError("Image not found.", { details: { image_id: itemId } });
  }
  if (item.status !== "SUCCEEDED") {
    throw new ConflictError("Thumbnails are not available yet.", { details: { image_id: itemId, status: item.status } });
  }
  if (!isThumbnailVariant(variant)) {
    throw new ValidationError(`Unknown thumbnail variant: ${variant}`, {
      details: { variant, allowed: [...THUMBNAIL_VARIANTS] },
    });
  }
  try {
    return await blobs.read(item.thumbnailRefs[variant]);
  } catch (err) {
    if (err instanceof BlobStoreError && err.missing) {
      throw new NotFoundError("Thumbnail file is missing.", { details: { image_id: itemId, variant }, cause: err });
    }
    throw err;
  }
}

function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

export function computeStats(repository: ItemRepository): StatsView {
  const { total, succeeded, failed, averageDurationMs } = repository.stats();
  return ensureSchema<StatsView>("stats", {
    total,
    failed,
    success_rate: formatPercent(total === 0 ? 0 : succeeded / total),
    average_processing_time_seconds: averageDurationMs == null ? 0 : Number((averageDurationMs / 1000).toFixed(3)),
  });
}
