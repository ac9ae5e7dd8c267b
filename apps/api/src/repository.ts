import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  type Item,
  type NewItem,
  RepositoryError,
  type TerminalUpdate,
  errorMessage,
  isAllowedMimeType,
} from "@imagepipe/shared";

type DbImageRow = {
  id: string;
  original_filename: string | null;
  stored_filename: string;
  mime_type: string;
  size_bytes: number;
  width: number | null;
  height: number | null;
  format: string | null;
  created_at: string;
  status: string;
  caption: string | null;
  error: string | null;
  processing_ms: number | null;
  thumb_small_ref: string | null;
  thumb_medium_ref: string | null;
  processed_at: string | null;
};

export type RepositoryStats = {
  total: number;
  processing: number;
  succeeded: number;
  failed: number;
  averageDurationMs: number | null;
};

function ensureColumn(db: Database.Database, table: string, column: string, columnType: string): void {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  if (!columns.some((entry) => entry.name === column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${columnType}`);
  }
}

export function openDatabase(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(`
    CREATE TABLE IF NOT EXISTS images (
      id TEXT PRIMARY KEY,
      original_filename TEXT,
      stored_filename TEXT NOT NULL,
      mime_type TEXT NOT NULL,
      size_bytes INTEGER NOT NULL,

      width INTEGER,
      height INTEGER,
      format TEXT,

      created_at TEXT NOT NULL,
      status TEXT NOT NULL,
      caption TEXT,
      error TEXT,
      processing_ms INTEGER,

      thumb_small_ref TEXT,
      thumb_medium_ref TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_images_created_at ON images(created_at);
    CREATE INDEX IF NOT EXISTS idx_images_status ON images(status);
  `);
  ensureColumn(db, "images", "processed_at", "TEXT");
  return db;
}

function isPrimaryKeyViolation(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;
  const errorWithMeta = error as { code?: unknown; message?: unknown };
  const code = String(errorWithMeta.code ?? "");
  const message = String(errorWithMeta.message ?? "");
  return code.includes("SQLITE_CONSTRAINT") && message.includes("images.id");
}

function corrupt(row: DbImageRow, reason: string): RepositoryError {
  return new RepositoryError(`Stored image ${row.id} is inconsistent: ${reason}`, {
    details: { image_id: row.id, status: row.status },
  });
}

function rowToItem(row: DbImageRow): Item {
  if (!isAllowedMimeType(row.mime_type)) {
    throw corrupt(row, `unsupported mime type ${row.mime_type}`);
  }
  const base = {
    id: row.id,
    originalName: row.original_filename,
    mimeType: row.mime_type,
    sizeBytes: row.size_bytes,
    storedRef: row.stored_filename,
    createdAt: row.created_at,
  };

  switch (row.status) {
    case "PROCESSING":
      return { ...base, status: "PROCESSING", completedAt: null, processingDurationMs: null };
    case "SUCCEEDED": {
      const { width, height, format, caption, thumb_small_ref, thumb_medium_ref, processed_at, processing_ms } = row;
      if (
        width == null ||
        height == null ||
        format == null ||
        caption == null ||
        thumb_small_ref == null ||
        thumb_medium_ref == null ||
        processed_at == null ||
        processing_ms == null
      ) {
        throw corrupt(row, "succeeded without its derived fields");
      }
      return {
        ...base,
        status: "SUCCEEDED",
        width,
        height,
        format,
        caption,
        thumbnailRefs: { small: thumb_small_ref, medium: thumb_medium_ref },
        completedAt: processed_at,
        processingDurationMs: processing_ms,
      };
    }
    case "FAILED":
      if (!row.error || row.processed_at == null || row.processing_ms == null) {
        throw corrupt(row, "failed without an error message");
      }
      return {
        ...base,
        status: "FAILED",
        error: row.error,
        completedAt: row.processed_at,
        processingDurationMs: row.processing_ms,
      };
    default:
      throw corrupt(row, `unknown status ${row.status}`);
  }
}

/**
 * Durable item records. Every method is one synchronous statement, so a
 * reader sees a row either before or after a write, never in between.
 */
export class ItemRepository {
  constructor(private readonly db: Database.Database) {}

  private guard<T>(action: string, work: () => T): T {
    try {
      return work();
    } catch (err) {
      if (err instanceof RepositoryError) throw err;
      throw new RepositoryError(`Image repository ${action} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  insert(item: NewItem): void {
    try {
      this.db
        .prepare(
          `
          INSERT INTO images(id, original_filename, stored_filename, mime_type, size_bytes, created_at, status)
          VALUES(?, ?, ?, ?, ?, ?, 'PROCESSING')
          `,
        )
        .run(item.id, item.originalName, item.storedRef, item.mimeType, item.sizeBytes, item.createdAt);
    } catch (err) {
      if (isPrimaryKeyViolation(err)) {
        throw new RepositoryError(`Image id already exists: ${item.id}`, {
          details: { image_id: item.id, reason: "DUPLICATE_ID" },
          cause: err,
        });
      }
      throw new RepositoryError(`Image repository insert failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  exists(id: string): boolean {
    return this.guard("lookup", () => this.db.prepare("SELECT 1 AS found FROM images WHERE id = ?").get(id) !== undefined);
  }

  get(id: string): Item | undefined {
    return this.guard("read", () => {
      const row = this.db.prepare("SELECT * FROM images WHERE id = ?").get(id) as DbImageRow | undefined;
      return row ? rowToItem(row) : undefined;
    });
  }

  list(): Item[] {
    return this.guard("list", () => {
      const rows = this.db.prepare("SELECT * FROM images ORDER BY created_at DESC, rowid DESC").all() as DbImageRow[];
      return rows.map(rowToItem);
    });
  }

  /**
   * Moves a `PROCESSING` item to its terminal state in one statement.
   * Returns false, changing nothing, when the item is missing or already terminal.
   */
  complete(id: string, update: TerminalUpdate): boolean {
    return this.guard("terminal write", () => {
      const succeeded = update.status === "SUCCEEDED" ? update : undefined;
      const result = this.db
        .prepare(
          `
          UPDATE images
          SET status = ?, width = ?, height = ?, format = ?, caption = ?,
              thumb_small_ref = ?, thumb_medium_ref = ?, error = ?,
              processing_ms = ?, processed_at = ?
          WHERE id = ? AND status = 'PROCESSING'
          `,
        )
        .run(
          update.status,
          succeeded?.width ?? null,
          succeeded?.height ?? null,
          succeeded?.format ?? null,
          succeeded?.caption ?? null,
          succeeded?.thumbnailRefs.small ?? null,
          succeeded?.thumbnailRefs.medium ?? null,
          update.status === "FAILED" ? update.error : null,
          update.processingDurationMs,
          update.completedAt,
          id,
        );
      return result.changes === 1;
    });
  }

  stats(): RepositoryStats {
    return this.guard("stats", () => {
      const rows = this.db
        .prepare("SELECT status, COUNT(1) AS count FROM images GROUP BY status")
        .all() as Array<{ status: string; count: number }>;
      const counts = rows.reduce<Record<string, number>>((acc, row) => {
        acc[row.status] = row.count;
        return acc;
      }, {});
      const avgRow = this.db
        .prepare("SELECT AVG(processing_ms) AS avg_ms FROM images WHERE processing_ms IS NOT NULL")
        .get() as { avg_ms: number | null };
      const processing = counts.PROCESSING ?? 0;
      const succeeded = counts.SUCCEEDED ?? 0;
      const failed = counts.FAILED ?? 0;
      return {
        total: processing + succeeded + failed,
        processing,
        succeeded,
        failed,
        averageDurationMs: avgRow.avg_ms,
      };
    });
  }

  countProcessingSince(cutoffIso: string): number {
    return this.guard("stuck count", () => {
      const row = this.db
        .prepare("SELECT COUNT(1) AS count FROM images WHERE status = 'PROCESSING' AND created_at < ?")
        .get(cutoffIso) as { count: number };
      return row.count;
    });
  }

  close(): void {
    this.db.close();
  }
}
