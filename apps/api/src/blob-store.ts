import { link, mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve, sep } from "node:path";
import { nanoid } from "nanoid";
import {
  type AllowedMimeType,
  BlobStoreError,
  type ThumbnailVariant,
  errorMessage,
  extensionForMimeType,
} from "@imagepipe/shared";

export type PutOptions = {
  /** Fail with `alreadyExists` instead of replacing a blob already stored under the key. */
  exclusive?: boolean;
};

/** Byte storage addressed by key; the key doubles as the stored reference. */
export type BlobStore = {
  put(key: string, bytes: Buffer, options?: PutOptions): Promise<string>;
  read(ref: string): Promise<Buffer>;
  exists(ref: string): Promise<boolean>;
  size(ref: string): Promise<number>;
  remove(ref: string): Promise<void>;
};

export function originalKey(itemId: string, mimeType: AllowedMimeType): string {
  return `originals/${itemId}.${extensionForMimeType(mimeType)}`;
}

export function thumbnailKey(itemId: string, variant: ThumbnailVariant): string {
  return `thumbs/${itemId}_${variant}.jpg`;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isMissing(err: unknown): boolean {
  return isErrnoException(err) && err.code === "ENOENT";
}

function isAlreadyPresent(err: unknown): boolean {
  return isErrnoException(err) && err.code === "EEXIST";
}

export function createFileBlobStore(rootDir: string): BlobStore {
  const root = resolve(rootDir);

  function pathFor(key: string): string {
    if (!key || isAbsolute(key) || key.split(/[\\/]/u).includes("..")) {
      throw new BlobStoreError(`Invalid blob key: ${key}`, { details: { key } });
    }
    const full = resolve(root, key);
    if (!full.startsWith(root + sep)) {
      throw new BlobStoreError(`Invalid blob key: ${key}`, { details: { key } });
    }
    return full;
  }

  function wrap(action: string, key: string, err: unknown): BlobStoreError {
    if (err instanceof BlobStoreError) return err;
    return new BlobStoreError(`Blob ${action} failed for ${key}: ${errorMessage(err)}`, {
      details: { key },
      cause: err,
      missing: isMissing(err),
      alreadyExists: isAlreadyPresent(err),
    });
  }

  return {
    async put(key, bytes, options = {}) {
      const target = pathFor(key);
      const staging = `${target}.${nanoid(8)}.tmp`;
      try {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(staging, bytes);
        if (options.exclusive) {
          // link fails with EEXIST rather than replacing the target
          await link(staging, target);
          await rm(staging, { force: true });
        } else {
          await rename(staging, target);
        }
        return key;
      } catch (err) {
        await rm(staging, { force: true });
        throw wrap("write", key, err);
      }
    },

    async read(ref) {
      try {
        return await readFile(pathFor(ref));
      } catch (err) {
        throw wrap("read", ref, err);
      }
    },

    async exists(ref) {
      try {
        return (await stat(pathFor(ref))).isFile();
      } catch (err) {
        if (isMissing(err)) return false;
        throw wrap("stat", ref, err);
      }
    },

    async size(ref) {
      try {
        return (await stat(pathFor(ref))).size;
      } catch (err) {
        throw wrap("stat", ref, err);
      }
    },

    async remove(ref) {
      try {
        await rm(pathFor(ref), { force: true });
      } catch (err) {
        throw wrap("remove", ref, err);
      }
    },
  };
}
