import type { ThumbnailVariant } from "@imagepipe/shared";
import type { DecodedImage, ImageCodec } from "./codec.js";

type ThumbnailSpec = {
  maxWidth: number;
  maxHeight: number;
  quality: number;
};

export const THUMBNAIL_SPECS: Record<ThumbnailVariant, ThumbnailSpec> = {
  small: { maxWidth: 256, maxHeight: 256, quality: 85 },
  medium: { maxWidth: 512, maxHeight: 512, quality: 90 },
};

export type Thumbnails = Record<ThumbnailVariant, Buffer>;

export async function makeThumbnails(image: DecodedImage, codec: ImageCodec): Promise<Thumbnails> {
  const { small, medium } = THUMBNAIL_SPECS;
  return {
    small: await codec.resize(image, small.maxWidth, small.maxHeight, small.quality),
    medium: await codec.resize(image, medium.maxWidth, medium.maxHeight, medium.quality),
  };
}
