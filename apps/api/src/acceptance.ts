import { ensureSchema } from "@imagepipe/contracts";
import {
  BlobStoreError,
  RepositoryError,
  UnavailableError,
  ValidationError,
  isAllowedMimeType,
  normalizeContentType,
  normalizeOriginalName,
} from "@imagepipe/shared";
import { nanoid } from "nanoid";
import { type BlobStore, originalKey } from "./blob-store.js";
import type { ItemRepository } from "./repository.js";

export type UploadInput = {
  bytes: Buffer | undefined;
  contentType: unknown;
  originalName?: unknown;
};

export type AcceptResponse = {
  image_id: string;
  status: "PROCESSING";
};

type AcceptanceDeps = {
  repository: ItemRepository;
  blobs: BlobStore;
  /** Returns false when the dispatcher no longer takes work. */
  submit: (itemId: string) => boolean;
  isAccepting: () => boolean;
  generateId?: () => string;
};

function nowIso(): string {
  return new Date().toISOString();
}

function defaultImageId(): string {
  return `img_${nanoid(12)}`;
}

function duplicateId(id: string, cause?: unknown): RepositoryError {
  return new RepositoryError(`Image id already exists: ${id}`, {
    details: { image_id: id, reason: "DUPLICATE_ID" },
    cause,
  });
}

const SHUTTING_DOWN = "Uploads are not accepted while the service shuts down.";

/**
 * Stores the original, records a `PROCESSING` item and hands its id to the
 * dispatcher. Never waits on the derivation run.
 */
export async function acceptUpload(deps: AcceptanceDeps, input: UploadInput): Promise<AcceptResponse> {
  const mimeType = normalizeContentType(input.contentType);
  if (!isAllowedMimeType(mimeType)) {
    throw new ValidationError("Only JPG and PNG are allowed.", { details: { content_type: mimeType || null } });
  }
  const bytes = input.bytes;
  if (!bytes || bytes.length === 0) {
    throw new ValidationError("Empty upload.");
  }

  if (!deps.isAccepting()) {
    throw new UnavailableError(SHUTTING_DOWN);
  }

  const id = (deps.generateId ?? defaultImageId)();
  if (deps.repository.exists(id)) {
    throw duplicateId(id);
  }

  let storedRef: string;
  try {
    storedRef = await deps.blobs.put(originalKey(id, mimeType), bytes, { exclusive: true });
  } catch (err) {
    if (err instanceof BlobStoreError && err.alreadyExists) {
      throw duplicateId(id, err);
    }
    throw err;
  }
  try {
    deps.repository.insert({
      id,
      originalName: normalizeOriginalName(input.originalName),
      mimeType,
      sizeBytes: bytes.length,
      storedRef,
      createdAt: nowIso(),
    });
  } catch (err) {
    await deps.blobs.remove(storedRef);
    throw err;
  }

  if (!deps.submit(id)) {
    deps.repository.complete(id, {
      status: "FAILED",
      error: "Upload was not queued because the service was shutting down.",
      completedAt: nowIso(),
      processingDurationMs: 0,
    });
    throw new UnavailableError(SHUTTING_DOWN, { details: { image_id: id } });
  }
  return ensureSchema<AcceptResponse>("acceptResponse", { image_id: id, status: "PROCESSING" });
}
