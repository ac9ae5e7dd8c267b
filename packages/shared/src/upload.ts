import { ALLOWED_MIME_TYPES, type AllowedMimeType, THUMBNAIL_VARIANTS, type ThumbnailVariant } from "./item.js";

export function normalizeContentType(rawValue: unknown): string {
  if (Array.isArray(rawValue)) {
    for (const entry of rawValue) {
      const normalizedEntry = normalizeContentType(entry);
      if (normalizedEntry) return normalizedEntry;
    }
    return "";
  }
  if (rawValue == null) return "";
  return String(rawValue).split(";")[0]?.trim().toLowerCase() ?? "";
}

export function isAllowedMimeType(value: string): value is AllowedMimeType {
  return (ALLOWED_MIME_TYPES as readonly string[]).includes(value);
}

export function extensionForMimeType(mimeType: AllowedMimeType): "jpg" | "png" {
  return mimeType === "image/jpeg" ? "jpg" : "png";
}

export function isThumbnailVariant(value: string): value is ThumbnailVariant {
  return (THUMBNAIL_VARIANTS as readonly string[]).includes(value);
}

/** `JPEG` is reported as `jpg`; every other encoder name is lowercased. */
export function clientFormat(format: string): string {
  const lower = format.trim().toLowerCase();
  return lower === "jpeg" ? "jpg" : lower;
}

export function normalizeOriginalName(rawValue: unknown): string | null {
  const first = Array.isArray(rawValue) ? rawValue.find((entry) => entry != null && String(entry).trim()) : rawValue;
  if (first == null) return null;
  const name = String(first)
    .replace(/[\x00-\x1f\x7f]/g, "")
    .split(/[\\/]/u)
    .pop()
    ?.trim()
    .slice(0, 255);
  return name ? name : null;
}
