import { resolve } from "node:path";
import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import {
  type DerivationEngine,
  type Describer,
  type ImageCodec,
  createHeuristicDescriber,
  createOpenAiDescriber,
  serializeDescriber,
  sharpCodec,
} from "@imagepipe/core";
import { ServiceError } from "@imagepipe/shared";
import { acceptUpload } from "./acceptance.js";
import { createFileBlobStore } from "./blob-store.js";
import { type AppConfig, type ConfigOverrides, loadConfig } from "./config.js";
import { JobDispatcher } from "./dispatcher.js";
import { PipelineCoordinator } from "./pipeline.js";
import { ItemRepository, openDatabase } from "./repository.js";
import { computeStats, getImageView, listImageViews, resolveThumbnail } from "./views.js";

type ApiError = {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
};

export type CreateAppOptions = ConfigOverrides & {
  describer?: Describer;
  codec?: ImageCodec;
  generateId?: () => string;
  env?: NodeJS.ProcessEnv;
};

function nowIso(): string {
  return new Date().toISOString();
}

function failure(code: string, message: string, details?: Record<string, unknown>): ApiError {
  return details ? { error: { code, message, details } } : { error: { code, message } };
}

function isFastifyError(err: Error): err is FastifyError {
  return "code" in err && typeof err.code === "string";
}

function buildDescriber(config: AppConfig): Describer {
  if (config.captionProvider === "openai") {
    return serializeDescriber(
      createOpenAiDescriber({
        model: config.captionModel,
        ...(config.captionBaseUrl ? { baseURL: config.captionBaseUrl } : {}),
      }),
    );
  }
  return createHeuristicDescriber();
}

function baseUrlOf(request: FastifyRequest): string {
  return `${request.protocol}://${request.headers.host ?? "localhost"}`;
}

export async function createApp(options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const { describer: describerOverride, codec, generateId, env, ...overrides } = options;
  const config = loadConfig(overrides, env);

  const repository = new ItemRepository(openDatabase(config.dbPath));
  const blobs = createFileBlobStore(resolve(config.dataDir, "blobs"));
  const engine: DerivationEngine = {
    codec: codec ?? sharpCodec,
    describer: describerOverride ?? buildDescriber(config),
  };

  const app = Fastify({ logger: { level: config.logLevel }, bodyLimit: config.maxUploadBytes });
  await app.register(cors, { origin: true });

  const coordinator = new PipelineCoordinator({ repository, blobs, engine, logger: app.log });
  const dispatcher = new JobDispatcher({
    concurrency: config.concurrency,
    run: (itemId) => coordinator.run(itemId),
    logger: app.log,
  });

  const leftover = repository.stats().processing;
  if (leftover > 0) {
    app.log.warn({ count: leftover }, "items_left_processing");
  }
  app.log.info({ caption_model: engine.describer.modelId, concurrency: config.concurrency }, "pipeline_ready");

  app.setErrorHandler((err: Error, request, reply) => {
    if (err instanceof ServiceError) {
      if (err.statusCode >= 500) {
        request.log.error({ err }, "request_failed");
      }
      return reply.status(err.statusCode).send({ error: err.toJSON() });
    }
    if (isFastifyError(err) && err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send(failure("VALIDATION_ERROR", err.message, { reason: err.code }));
    }
    request.log.error({ err }, "request_failed");
    return reply.status(500).send(failure("INTERNAL_ERROR", "Internal server error."));
  });

  app.get("/healthz", async () => ({ ok: true }));

  await app.register(async (uploads) => {
    uploads.removeAllContentTypeParsers();
    uploads.addContentTypeParser("*", { parseAs: "buffer", bodyLimit: config.maxUploadBytes }, (_request, body, done) => {
      done(null, body);
    });

    uploads.post<{ Querystring: { filename?: string } }>("/api/images", async (request, reply) => {
      const accepted = await acceptUpload(
        {
          repository,
          blobs,
          submit: (itemId) => dispatcher.submit(itemId),
          isAccepting: () => dispatcher.isAccepting(),
          ...(generateId ? { generateId } : {}),
        },
        {
          bytes: Buffer.isBuffer(request.body) ? request.body : undefined,
          contentType: request.headers["content-type"],
          originalName: request.query.filename ?? request.headers["x-filename"],
        },
      );
      return reply.status(201).send(accepted);
    });
  });

  app.get("/api/images", async (request) => listImageViews(repository, baseUrlOf(request)));

  app.get<{ Params: { id: string } }>("/api/images/:id", async (request) =>
    getImageView(repository, request.params.id, baseUrlOf(request)),
  );

  app.get<{ Params: { id: string; variant: string } }>("/api/images/:id/thumbnails/:variant", async (request, reply) => {
    const bytes = await resolveThumbnail(repository, blobs, request.params.id, request.params.variant);
    return reply.header("content-type", "image/jpeg").send(bytes);
  });

  app.get("/api/stats", async () => computeStats(repository));

  app.get("/api/system/worker", async () => {
    const { processing, succeeded, failed } = repository.stats();
    const stuckCutoff = new Date(Date.now() - config.stuckAfterMs).toISOString();
    return {
      dispatcher: dispatcher.snapshot(),
      items: { PROCESSING: processing, SUCCEEDED: succeeded, FAILED: failed },
      stuck: {
        after_ms: config.stuckAfterMs,
        count: repository.countProcessingSince(stuckCutoff),
      },
      timestamp: nowIso(),
    };
  });

  app.decorate("drainPipeline", () => dispatcher.drain());

  app.addHook("onClose", async () => {
    await dispatcher.close();
    repository.close();
  });

  return app;
}

declare module "fastify" {
  interface FastifyInstance {
    drainPipeline: () => Promise<void>;
  }
}
