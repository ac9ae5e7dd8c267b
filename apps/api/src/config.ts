import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

export type CaptionProvider = "openai" | "heuristic";

export type AppConfig = {
  port: number;
  dataDir: string;
  dbPath: string;
  concurrency: number;
  maxUploadBytes: number;
  stuckAfterMs: number;
  captionProvider: CaptionProvider;
  captionModel: string;
  captionBaseUrl: string | undefined;
  logLevel: string;
};

export type ConfigOverrides = {
  port?: number;
  dataDir?: string;
  dbPath?: string;
  concurrency?: number;
  maxUploadBytes?: number;
  stuckAfterMs?: number;
  captionProvider?: CaptionProvider;
  captionModel?: string;
  logLevel?: string;
};

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function repoRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "../../..");
}

function positiveInt(rawValue: string | undefined, fallback: number): number {
  const parsed = Number(rawValue);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function nonEmpty(rawValue: string | undefined): string | undefined {
  const trimmed = rawValue?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = resolve(repoRoot(), overrides.dataDir ?? nonEmpty(env.DATA_DIR) ?? "apps/api/data");
  const dbPath = resolve(dataDir, overrides.dbPath ?? nonEmpty(env.DB_PATH) ?? "imagepipe.db");

  const providerInput = nonEmpty(env.CAPTION_PROVIDER)?.toLowerCase();
  const captionProvider: CaptionProvider =
    overrides.captionProvider ??
    (providerInput === "openai" || providerInput === "heuristic"
      ? providerInput
      : nonEmpty(env.OPENAI_API_KEY)
        ? "openai"
        : "heuristic");

  const logLevelInput = nonEmpty(env.LOG_LEVEL)?.toLowerCase() ?? "";
  const logLevel = overrides.logLevel ?? (LOG_LEVELS.includes(logLevelInput) ? logLevelInput : "info");

  return {
    port: overrides.port ?? positiveInt(env.API_PORT, 8000),
    dataDir,
    dbPath,
    concurrency: overrides.concurrency ?? positiveInt(env.PIPELINE_CONCURRENCY, 2),
    maxUploadBytes: overrides.maxUploadBytes ?? positiveInt(env.MAX_UPLOAD_BYTES, 20 * 1024 * 1024),
    stuckAfterMs: overrides.stuckAfterMs ?? positiveInt(env.STUCK_AFTER_MS, 10 * 60 * 1000),
    captionProvider,
    captionModel: overrides.captionModel ?? nonEmpty(env.CAPTION_MODEL) ?? "gpt-4o-mini",
    captionBaseUrl: nonEmpty(env.CAPTION_BASE_URL),
    logLevel,
  };
}
