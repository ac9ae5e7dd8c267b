import sharp from "sharp";

/** Bytes plus what the decoder reported about them. */
export type DecodedImage = {
  bytes: Buffer;
  width: number;
  height: number;
  /** Encoder's canonical name, uppercase (`JPEG`, `PNG`). */
  format: string;
};

export type ImageCodec = {
  decode(bytes: Buffer): Promise<DecodedImage>;
  /**
   * Fits the image inside `maxWidth`×`maxHeight` keeping its aspect ratio,
   * never enlarging, and re-encodes it as baseline JPEG.
   */
  resize(image: DecodedImage, maxWidth: number, maxHeight: number, quality: number): Promise<Buffer>;
};

export const sharpCodec: ImageCodec = {
  async decode(bytes) {
    if (!bytes.length) {
      throw new Error("Image payload is empty");
    }
    const metadata = await sharp(bytes).metadata();
    if (!metadata.width || !metadata.height || !metadata.format) {
      throw new Error("Image dimensions could not be read");
    }
    return {
      bytes,
      width: metadata.width,
      height: metadata.height,
      format: metadata.format.toUpperCase(),
    };
  },

  async resize(image, maxWidth, maxHeight, quality) {
    return sharp(image.bytes)
      .resize(maxWidth, maxHeight, { fit: "inside", withoutEnlargement: true })
      .removeAlpha()
      .jpeg({ quality, progressive: false })
      .toBuffer();
  },
};

export function mimeTypeForFormat(format: string): string {
  const lower = format.toLowerCase();
  return lower === "jpg" ? "image/jpeg" : `image/${lower}`;
}
