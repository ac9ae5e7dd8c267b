import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import assert from "node:assert/strict";
import sharp from "sharp";
import type { Describer } from "@imagepipe/core";
import { type CreateAppOptions, createApp } from "../src/app.js";

type ImageViewBody = {
  status: string;
  data: {
    image_id: string;
    original_name: string | null;
    created_at: string;
    processed_at: string | null;
    metadata: Record<string, unknown>;
    thumbnails: Record<string, string>;
  };
  error: string | null;
};

type ErrorBody = { error: { code: string; message: string; details?: Record<string, unknown> } };

const fixedDescriber: Describer = { modelId: "test", describe: async () => "a small test image" };

async function createTestApp(options: CreateAppOptions = {}) {
  const dataDir = mkdtempSync(join(tmpdir(), "imagepipe-api-"));
  const app = await createApp({ dataDir, logLevel: "silent", describer: fixedDescriber, ...options });
  return { app, dataDir };
}

function jpeg(width = 640, height = 480): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } } }).jpeg().toBuffer();
}

function gate() {
  let release: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { opened, open: () => release() };
}

test("healthz responds ok", async () => {
  const { app } = await createTestApp();
  try {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { ok: true });
  } finally {
    await app.close();
  }
});

test("a valid jpeg is accepted, processed and served", async () => {
  const { app } = await createTestApp();
  try {
    const bytes = await jpeg();
    const uploadRes = await app.inject({
      method: "POST",
      url: "/api/images?filename=holiday.jpg",
      headers: { "content-type": "image/jpeg" },
      payload: bytes,
    });
    assert.equal(uploadRes.statusCode, 201);
    const accepted = uploadRes.json() as { image_id: string; status: string };
    assert.equal(accepted.status, "PROCESSING");
    assert.match(accepted.image_id, /^img_[A-Za-z0-9_-]{12}$/u);

    await app.drainPipeline();

    const detailRes = await app.inject({ method: "GET", url: `/api/images/${accepted.image_id}` });
    assert.equal(detailRes.statusCode, 200);
    const view = detailRes.json() as ImageViewBody;
    assert.equal(view.status, "SUCCEEDED");
    assert.equal(view.error, null);
    assert.equal(view.data.original_name, "holiday.jpg");
    assert.ok(view.data.processed_at);
    assert.deepEqual(view.data.metadata, {
      width: 640,
      height: 480,
      format: "jpg",
      size_bytes: bytes.length,
      caption: "a small test image",
    });

    for (const variant of ["small", "medium"] as const) {
      const url = view.data.thumbnails[variant];
      assert.ok(url);
      const { pathname } = new URL(url);
      assert.equal(pathname, `/api/images/${accepted.image_id}/thumbnails/${variant}`);
      const thumbRes = await app.inject({ method: "GET", url: pathname });
      assert.equal(thumbRes.statusCode, 200);
      assert.equal(thumbRes.headers["content-type"], "image/jpeg");
      const meta = await sharp(thumbRes.rawPayload).metadata();
      assert.deepEqual([meta.format, meta.width, meta.height], ["jpeg", variant === "small" ? 256 : 512, variant === "small" ? 192 : 384]);
    }
  } finally {
    await app.close();
  }
});

test("the upload is PROCESSING until its run finishes", async () => {
  const captionGate = gate();
  const describer: Describer = {
    modelId: "test",
    describe: async () => {
      await captionGate.opened;
      return "a gated image";
    },
  };
  const { app } = await createTestApp({ describer });
  try {
    const uploadRes = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/png", "x-filename": "shots/screen.png" },
      payload: await sharp({ create: { width: 20, height: 20, channels: 4, background: "#00ff00" } }).png().toBuffer(),
    });
    const { image_id: imageId } = uploadRes.json() as { image_id: string };

    const pending = (await app.inject({ method: "GET", url: `/api/images/${imageId}` })).json() as ImageViewBody;
    assert.deepEqual(pending, {
      status: "PROCESSING",
      data: {
        image_id: imageId,
        original_name: "screen.png",
        created_at: pending.data.created_at,
        processed_at: null,
        metadata: {},
        thumbnails: {},
      },
      error: null,
    });

    for (const variant of ["small", "medium", "huge"]) {
      const thumbRes = await app.inject({ method: "GET", url: `/api/images/${imageId}/thumbnails/${variant}` });
      assert.equal(thumbRes.statusCode, 409);
      assert.equal((thumbRes.json() as ErrorBody).error.code, "CONFLICT");
    }

    captionGate.open();
    await app.drainPipeline();

    const doneRes = await app.inject({ method: "GET", url: `/api/images/${imageId}` });
    const done = doneRes.json() as ImageViewBody;
    assert.equal(done.status, "SUCCEEDED");
    assert.equal(done.data.metadata.format, "png");
    assert.equal(done.data.metadata.caption, "a gated image");
  } finally {
    captionGate.open();
    await app.close();
  }
});

test("a text/plain upload is rejected before any id is generated", async () => {
  let generated = 0;
  const { app } = await createTestApp({
    generateId: () => {
      generated += 1;
      return `img_test${generated}`;
    },
  });
  try {
    const res = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "text/plain" },
      payload: "hello",
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), {
      error: {
        code: "VALIDATION_ERROR",
        message: "Only JPG and PNG are allowed.",
        details: { content_type: "text/plain" },
      },
    });
    assert.equal(generated, 0);
    const listRes = await app.inject({ method: "GET", url: "/api/images" });
    assert.deepEqual(listRes.json(), []);
  } finally {
    await app.close();
  }
});

test("an empty payload is rejected", async () => {
  const { app } = await createTestApp();
  try {
    const res = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/jpeg" },
      payload: Buffer.alloc(0),
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), { error: { code: "VALIDATION_ERROR", message: "Empty upload." } });
  } finally {
    await app.close();
  }
});

test("content type parameters and casing are ignored", async () => {
  const { app } = await createTestApp();
  try {
    const res = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "IMAGE/JPEG; charset=binary" },
      payload: await jpeg(32, 32),
    });
    assert.equal(res.statusCode, 201);
    await app.drainPipeline();
  } finally {
    await app.close();
  }
});

test("an oversized payload is rejected with the body limit", async () => {
  const { app } = await createTestApp({ maxUploadBytes: 64 });
  try {
    const res = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/jpeg" },
      payload: Buffer.alloc(128, 1),
    });
    assert.equal(res.statusCode, 413);
    const body = res.json() as ErrorBody;
    assert.equal(body.error.code, "VALIDATION_ERROR");
    assert.deepEqual(body.error.details, { reason: "FST_ERR_CTP_BODY_TOO_LARGE" });
  } finally {
    await app.close();
  }
});

test("an undecodable image ends FAILED without thumbnails", async () => {
  const { app, dataDir } = await createTestApp({ generateId: () => "img_corrupt" });
  try {
    const uploadRes = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/jpeg" },
      payload: Buffer.from("not really a jpeg"),
    });
    assert.equal(uploadRes.statusCode, 201);
    await app.drainPipeline();

    const view = (await app.inject({ method: "GET", url: "/api/images/img_corrupt" })).json() as ImageViewBody;
    assert.equal(view.status, "FAILED");
    assert.match(view.error ?? "", /^metadata stage failed: /u);
    assert.deepEqual(view.data.metadata, {});
    assert.deepEqual(view.data.thumbnails, {});
    assert.equal(existsSync(join(dataDir, "blobs", "thumbs", "img_corrupt_small.jpg")), false);
    assert.equal(existsSync(join(dataDir, "blobs", "thumbs", "img_corrupt_medium.jpg")), false);
    assert.equal(existsSync(join(dataDir, "blobs", "originals", "img_corrupt.jpg")), true);

    const thumbRes = await app.inject({ method: "GET", url: "/api/images/img_corrupt/thumbnails/small" });
    assert.equal(thumbRes.statusCode, 409);
  } finally {
    await app.close();
  }
});

test("stats are zero for an empty store", async () => {
  const { app } = await createTestApp();
  try {
    const res = await app.inject({ method: "GET", url: "/api/stats" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), {
      total: 0,
      failed: 0,
      success_rate: "0.00%",
      average_processing_time_seconds: 0,
    });
  } finally {
    await app.close();
  }
});

test("stats count successes and failures", async () => {
  const { app } = await createTestApp();
  try {
    for (const payload of [await jpeg(40, 40), Buffer.from("broken"), await jpeg(50, 30)]) {
      await app.inject({ method: "POST", url: "/api/images", headers: { "content-type": "image/jpeg" }, payload });
    }
    await app.drainPipeline();

    const stats = (await app.inject({ method: "GET", url: "/api/stats" })).json() as {
      total: number;
      failed: number;
      success_rate: string;
      average_processing_time_seconds: number;
    };
    assert.equal(stats.total, 3);
    assert.equal(stats.failed, 1);
    assert.equal(stats.success_rate, "66.67%");
    assert.ok(stats.average_processing_time_seconds >= 0);
  } finally {
    await app.close();
  }
});

test("unknown ids give 404 for details and every thumbnail variant", async () => {
  const { app } = await createTestApp();
  try {
    const detailRes = await app.inject({ method: "GET", url: "/api/images/img_missing" });
    assert.equal(detailRes.statusCode, 404);
    assert.deepEqual(detailRes.json(), {
      error: { code: "NOT_FOUND", message: "Image not found.", details: { image_id: "img_missing" } },
    });
    for (const variant of ["small", "medium", "large"]) {
      const res = await app.inject({ method: "GET", url: `/api/images/img_missing/thumbnails/${variant}` });
      assert.equal(res.statusCode, 404);
    }
  } finally {
    await app.close();
  }
});

test("thumbnail lookups validate the variant and report missing files", async () => {
  const { app, dataDir } = await createTestApp({ generateId: () => "img_thumbs" });
  try {
    await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/jpeg" },
      payload: await jpeg(100, 100),
    });
    await app.drainPipeline();

    const badVariant = await app.inject({ method: "GET", url: "/api/images/img_thumbs/thumbnails/large" });
    assert.equal(badVariant.statusCode, 400);
    assert.deepEqual(badVariant.json(), {
      error: {
        code: "VALIDATION_ERROR",
        message: "Unknown thumbnail variant: large",
        details: { variant: "large", allowed: ["small", "medium"] },
      },
    });

    rmSync(join(dataDir, "blobs", "thumbs", "img_thumbs_medium.jpg"));
    const missing = await app.inject({ method: "GET", url: "/api/images/img_thumbs/thumbnails/medium" });
    assert.equal(missing.statusCode, 404);
    assert.equal((missing.json() as ErrorBody).error.message, "Thumbnail file is missing.");

    const small = await app.inject({ method: "GET", url: "/api/images/img_thumbs/thumbnails/small" });
    assert.equal(small.statusCode, 200);
  } finally {
    await app.close();
  }
});

test("the list is newest first", async () => {
  const ids = ["img_first", "img_second", "img_third"];
  let next = 0;
  const { app } = await createTestApp({ generateId: () => ids[next++] ?? "img_extra" });
  try {
    for (let i = 0; i < ids.length; i += 1) {
      await app.inject({
        method: "POST",
        url: "/api/images",
        headers: { "content-type": "image/jpeg" },
        payload: await jpeg(16, 16),
      });
    }
    await app.drainPipeline();

    const list = (await app.inject({ method: "GET", url: "/api/images" })).json() as ImageViewBody[];
    assert.deepEqual(
      list.map((view) => view.data.image_id),
      ["img_third", "img_second", "img_first"],
    );
    assert.ok(list.every((view) => view.status === "SUCCEEDED"));
  } finally {
    await app.close();
  }
});

test("terminal items do not change on later reads", async () => {
  const { app } = await createTestApp({ generateId: () => "img_stable" });
  try {
    await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/jpeg" },
      payload: await jpeg(30, 30),
    });
    await app.drainPipeline();
    const first = (await app.inject({ method: "GET", url: "/api/images/img_stable" })).json() as ImageViewBody;
    await new Promise((resolve) => setTimeout(resolve, 20));
    await app.drainPipeline();
    const second = (await app.inject({ method: "GET", url: "/api/images/img_stable" })).json() as ImageViewBody;
    assert.deepEqual(second, first);
  } finally {
    await app.close();
  }
});

test("a repeated id is rejected and keeps the first upload", async () => {
  const { app } = await createTestApp({ generateId: () => "img_fixed" });
  try {
    const first = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/jpeg" },
      payload: await jpeg(20, 20),
    });
    assert.equal(first.statusCode, 201);

    const second = await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/png" },
      payload: await sharp({ create: { width: 8, height: 8, channels: 3, background: "#000000" } }).png().toBuffer(),
    });
    assert.equal(second.statusCode, 500);
    assert.deepEqual(second.json(), {
      error: {
        code: "REPOSITORY_ERROR",
        message: "Image id already exists: img_fixed",
        details: { image_id: "img_fixed", reason: "DUPLICATE_ID" },
      },
    });

    await app.drainPipeline();
    const view = (await app.inject({ method: "GET", url: "/api/images/img_fixed" })).json() as ImageViewBody;
    assert.equal(view.data.metadata.width, 20);
  } finally {
    await app.close();
  }
});

test("worker status reports dispatcher and item counts", async () => {
  const { app } = await createTestApp({ concurrency: 3 });
  try {
    await app.inject({
      method: "POST",
      url: "/api/images",
      headers: { "content-type": "image/jpeg" },
      payload: await jpeg(12, 12),
    });
    await app.drainPipeline();

    const res = await app.inject({ method: "GET", url: "/api/system/worker" });
    assert.equal(res.statusCode, 200);
    const body = res.json() as {
      dispatcher: Record<string, unknown>;
      items: Record<string, number>;
      stuck: { after_ms: number; count: number };
      timestamp: string;
    };
    assert.deepEqual(body.dispatcher, { queued: 0, active: 0, completed: 1, crashed: 0, concurrency: 3, accepting: true });
    assert.deepEqual(body.items, { PROCESSING: 0, SUCCEEDED: 1, FAILED: 0 });
    assert.deepEqual(body.stuck, { after_ms: 600_000, count: 0 });
    assert.ok(!Number.isNaN(Date.parse(body.timestamp)));
  } finally {
    await app.close();
  }
});

test("items survive a restart on the same data directory", async () => {
  const { app, dataDir } = await createTestApp({ generateId: () => "img_durable" });
  await app.inject({
    method: "POST",
    url: "/api/images",
    headers: { "content-type": "image/jpeg" },
    payload: await jpeg(24, 24),
  });
  await app.close();

  const reopened = await createApp({ dataDir, logLevel: "silent", describer: fixedDescriber });
  try {
    const view = (await reopened.inject({ method: "GET", url: "/api/images/img_durable" })).json() as ImageViewBody;
    assert.equal(view.status, "SUCCEEDED");
    assert.equal(view.data.metadata.width, 24);
  } finally {
    await reopened.close();
  }
});
