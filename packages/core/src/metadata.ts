import { ensureSchema } from "@imagepipe/contracts";
import type { DecodedImage } from "./codec.js";

export type ImageMetadata = {
  width: number;
  height: number;
  format: string;
  size_bytes: number;
};

export function extractMetadata(image: DecodedImage, sizeBytes: number): ImageMetadata {
  return ensureSchema("metadata", {
    width: image.width,
    height: image.height,
    format: image.format,
    size_bytes: sizeBytes,
  });
}
