import { performance } from "node:perf_hooks";
import { StageFailure, type StageName } from "@imagepipe/shared";
import type { DecodedImage, ImageCodec } from "./codec.js";
import type { Describer } from "./describe.js";
import { type ImageMetadata, extractMetadata } from "./metadata.js";
import { type Thumbnails, makeThumbnails } from "./thumbnails.js";

export type DerivationEngine = {
  codec: ImageCodec;
  describer: Describer;
};

export type DerivationResult = {
  metadata: ImageMetadata;
  thumbnails: Thumbnails;
  caption: string;
  timings: Record<StageName, number>;
};

async function runStage<T>(
  stage: StageName,
  bytes: Buffer,
  codec: ImageCodec,
  work: (image: DecodedImage) => T | Promise<T>,
): Promise<{ value: T; elapsedMs: number }> {
  const started = performance.now();
  try {
    const image = await codec.decode(bytes);
    const value = await work(image);
    return { value, elapsedMs: Math.round(performance.now() - started) };
  } catch (err) {
    throw new StageFailure(stage, err);
  }
}

/**
 * Metadata, then thumbnails, then caption. Each stage decodes `bytes`
 * afresh; the first failure stops the run with a `StageFailure`.
 */
export async function runStages(bytes: Buffer, sizeBytes: number, engine: DerivationEngine): Promise<DerivationResult> {
  const { codec, describer } = engine;
  const metadata = await runStage("metadata", bytes, codec, (image) => extractMetadata(image, sizeBytes));
  const thumbnails = await runStage("thumbnails", bytes, codec, (image) => makeThumbnails(image, codec));
  const caption = await runStage("caption", bytes, codec, (image) => describer.describe(image));

  return {
    metadata: metadata.value,
    thumbnails: thumbnails.value,
    caption: caption.value,
    timings: {
      metadata: metadata.elapsedMs,
      thumbnails: thumbnails.elapsedMs,
      caption: caption.elapsedMs,
    },
  };
}
