import { performance } from "node:perf_hooks";
import { type DerivationEngine, type Thumbnails, runStages } from "@imagepipe/core";
import { type TerminalUpdate, type ThumbnailRefs, type ThumbnailVariant, errorMessage, isTerminal } from "@imagepipe/shared";
import type { FastifyBaseLogger } from "fastify";
import { type BlobStore, thumbnailKey } from "./blob-store.js";
import type { ItemRepository } from "./repository.js";

export type RunOutcome = "SUCCEEDED" | "FAILED" | "skipped";

type CoordinatorDeps = {
  repository: ItemRepository;
  blobs: BlobStore;
  engine: DerivationEngine;
  logger: FastifyBaseLogger;
};

function nowIso(): string {
  return new Date().toISOString();
}

export class PipelineCoordinator {
  constructor(private readonly deps: CoordinatorDeps) {}

  async run(itemId: string): Promise<RunOutcome> {
    const { repository, blobs, engine, logger } = this.deps;
    const item = repository.get(itemId);
    if (!item) {
      logger.warn({ item_id: itemId }, "pipeline_item_missing");
      return "skipped";
    }
    if (isTerminal(item.status)) {
      logger.info({ item_id: itemId, status: item.status }, "pipeline_item_already_terminal");
      return "skipped";
    }

    const started = performance.now();
    const written: string[] = [];
    let update: TerminalUpdate;
    try {
      const bytes = await blobs.read(item.storedRef);
      const sizeBytes = item.sizeBytes > 0 ? item.sizeBytes : await blobs.size(item.storedRef);
      const result = await runStages(bytes, sizeBytes, engine);
      const thumbnailRefs = await this.persistThumbnails(itemId, result.thumbnails, written);
      update = {
        status: "SUCCEEDED",
        width: result.metadata.width,
        height: result.metadata.height,
        format: result.metadata.format,
        caption: result.caption,
        thumbnailRefs,
        completedAt: nowIso(),
        processingDurationMs: Math.round(performance.now() - started),
      };
    } catch (err) {
      await this.discard(itemId, written);
      update = {
        status: "FAILED",
        error: errorMessage(err),
        completedAt: nowIso(),
        processingDurationMs: Math.round(performance.now() - started),
      };
    }

    const applied = repository.complete(itemId, update);
    if (!applied) {
      logger.warn({ item_id: itemId }, "pipeline_terminal_write_skipped");
      return "skipped";
    }
    if (update.status === "SUCCEEDED") {
      logger.info({ item_id: itemId, duration_ms: update.processingDurationMs }, "pipeline_succeeded");
    } else {
      logger.warn({ item_id: itemId, duration_ms: update.processingDurationMs, error: update.error }, "pipeline_failed");
    }
    return update.status;
  }

  private async persistThumbnails(itemId: string, thumbnails: Thumbnails, written: string[]): Promise<ThumbnailRefs> {
    const put = async (variant: ThumbnailVariant): Promise<string> => {
      const ref = await this.deps.blobs.put(thumbnailKey(itemId, variant), thumbnails[variant]);
      written.push(ref);
      return ref;
    };
    const small = await put("small");
    const medium = await put("medium");
    return { small, medium };
  }

  private async discard(itemId: string, refs: string[]): Promise<void> {
    for (const ref of refs) {
      try {
        // eslint-disable-next-line no-await-in-loop
        await this.deps.blobs.remove(ref);
      } catch (err) {
        this.deps.logger.warn({ err, item_id: itemId, ref }, "pipeline_thumbnail_cleanup_failed");
      }
    }
  }
}
