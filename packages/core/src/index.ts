export { sharpCodec, mimeTypeForFormat } from "./codec.js";
export type { DecodedImage, ImageCodec } from "./codec.js";
export { extractMetadata } from "./metadata.js";
export type { ImageMetadata } from "./metadata.js";
export { THUMBNAIL_SPECS, makeThumbnails } from "./thumbnails.js";
export type { Thumbnails } from "./thumbnails.js";
export {
  CAPTION_FALLBACK,
  CAPTION_PROMPT,
  createHeuristicDescriber,
  createOpenAiDescriber,
  finalizeCaption,
  nearestColorName,
  serializeDescriber,
} from "./describe.js";
export type { CaptionCompletionClient, Describer } from "./describe.js";
export { runStages } from "./stages.js";
export type { DerivationEngine, DerivationResult } from "./stages.js";
