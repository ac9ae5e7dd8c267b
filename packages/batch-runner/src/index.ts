import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, relative, resolve } from "node:path";
import { performance } from "node:perf_hooks";
import { fileURLToPath } from "node:url";
import { ensureSchema } from "@imagepipe/contracts";
import {
  type DerivationEngine,
  type Describer,
  type ImageMetadata,
  createHeuristicDescriber,
  createOpenAiDescriber,
  runStages,
  serializeDescriber,
  sharpCodec,
} from "@imagepipe/core";
import { type StageName, StageFailure, errorMessage } from "@imagepipe/shared";
import fg from "fast-glob";

type Captioner = "heuristic" | "openai";

type CliOptions = {
  images: string;
  out: string;
  format: "json" | "text";
  captioner: Captioner;
  failOnError: boolean;
};

type FileReport = {
  file: string;
  ok: boolean;
  duration_ms: number;
  metadata?: ImageMetadata;
  thumbnails?: { small_bytes: number; medium_bytes: number };
  caption?: string;
  stage?: StageName;
  error?: string;
};

type BatchReport = {
  run: {
    timestamp: string;
    captioner: Captioner;
    model_id: string;
    files: number;
  };
  totals: { succeeded: number; failed: number };
  files: FileReport[];
};

export function parseCliOptions(args: string[] = process.argv.slice(2)): CliOptions {
  const values = new Map<string, string>();
  for (let i = 0; i < args.length; i += 1) {
    const current = args[i];
    const next = args[i + 1];
    if (current?.startsWith("--") && next && !next.startsWith("--")) {
      values.set(current.slice(2), next);
      i += 1;
    }
  }

  const format = values.get("format") === "json" ? "json" : "text";
  const captioner: Captioner = values.get("captioner") === "openai" ? "openai" : "heuristic";
  const failOnError = values.get("fail-on-error") !== "false";

  return {
    images: values.get("images") ?? "samples/*.{jpg,jpeg,png}",
    out: values.get("out") ?? "reports/batch-latest.json",
    format,
    captioner,
    failOnError,
  };
}

function buildDescriber(captioner: Captioner): Describer {
  if (captioner === "openai") {
    return serializeDescriber(
      createOpenAiDescriber({
        model: process.env.CAPTION_MODEL ?? "gpt-4o-mini",
        ...(process.env.CAPTION_BASE_URL ? { baseURL: process.env.CAPTION_BASE_URL } : {}),
      }),
    );
  }
  return createHeuristicDescriber();
}

export async function runFile(file: string, bytes: Buffer, engine: DerivationEngine): Promise<FileReport> {
  const started = performance.now();
  try {
    const result = await runStages(bytes, bytes.length, engine);
    return {
      file,
      ok: true,
      duration_ms: Math.round(performance.now() - started),
      metadata: result.metadata,
      thumbnails: {
        small_bytes: result.thumbnails.small.length,
        medium_bytes: result.thumbnails.medium.length,
      },
      caption: result.caption,
    };
  } catch (err) {
    const report: FileReport = {
      file,
      ok: false,
      duration_ms: Math.round(performance.now() - started),
      error: errorMessage(err),
    };
    return err instanceof StageFailure ? { ...report, stage: err.stage } : report;
  }
}

export function buildReport(captioner: Captioner, modelId: string, files: FileReport[], timestamp: string): BatchReport {
  const succeeded = files.filter((x) => x.ok).length;
  return ensureSchema("batchReport", {
    run: {
      timestamp,
      captioner,
      model_id: modelId,
      files: files.length,
    },
    totals: { succeeded, failed: files.length - succeeded },
    files,
  });
}

async function main(): Promise<void> {
  const opts = parseCliOptions();
  const cwd = process.cwd();
  const files = fg.sync(resolve(cwd, opts.images), { onlyFiles: true, absolute: true, caseSensitiveMatch: false }).sort();
  if (!files.length) {
    throw new Error(`No images matched: ${opts.images}`);
  }

  const engine: DerivationEngine = { codec: sharpCodec, describer: buildDescriber(opts.captioner) };
  const reports: FileReport[] = [];
  for (const file of files) {
    // eslint-disable-next-line no-await-in-loop
    reports.push(await runFile(relative(cwd, file), readFileSync(file), engine));
  }

  const report = buildReport(opts.captioner, engine.describer.modelId, reports, new Date().toISOString());

  const reportPath = resolve(cwd, opts.out);
  mkdirSync(dirname(reportPath), { recursive: true });
  writeFileSync(reportPath, JSON.stringify(report, null, 2), "utf-8");

  if (opts.format === "json") {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const entry of reports.filter((x) => !x.ok)) {
      console.log(`FAILED ${entry.file}: ${entry.error ?? "unknown error"}`);
    }
    console.log(
      `Batch finished. files=${report.run.files} succeeded=${report.totals.succeeded} failed=${report.totals.failed} report=${relative(cwd, reportPath)}`,
    );
  }

  if (opts.failOnError && report.totals.failed > 0) {
    process.exitCode = 1;
  }
}

const isEntrypoint = process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1];
if (isEntrypoint) {
  main().catch((err) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
}
