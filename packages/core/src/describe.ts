import OpenAI from "openai";
import sharp from "sharp";
import { type DecodedImage, mimeTypeForFormat } from "./codec.js";

export const CAPTION_PROMPT = "Describe only what is visually present in this image.";
export const CAPTION_FALLBACK = "No caption generated.";

/**
 * Turns an image into a short description. Implementations must be
 * deterministic for identical input.
 */
export type Describer = {
  readonly modelId: string;
  describe(image: DecodedImage): Promise<string>;
};

export function finalizeCaption(raw: string | null | undefined, prompt: string = CAPTION_PROMPT): string {
  let caption = (raw ?? "").trim();
  if (caption.toLowerCase().startsWith(prompt.toLowerCase())) {
    caption = caption.slice(prompt.length).replace(/^[ .:]+|[ .:]+$/gu, "");
  }
  return caption || CAPTION_FALLBACK;
}

/**
 * Runs calls to `inner` one at a time, in submission order, so a single
 * model instance can be shared by concurrent pipeline runs.
 */
export function serializeDescriber(inner: Describer): Describer {
  let tail: Promise<unknown> = Promise.resolve();
  return {
    modelId: inner.modelId,
    describe(image) {
      const next = tail.then(() => inner.describe(image));
      // the caller observes failures through `next`; the chain only orders calls
      tail = next.catch(() => undefined);
      return next;
    },
  };
}

type CaptionMessage =
  | { role: "system"; content: string }
  | {
      role: "user";
      content: Array<{ type: "text"; text: string } | { type: "image_url"; image_url: { url: string } }>;
    };

type CaptionRequest = {
  model: string;
  messages: CaptionMessage[];
  temperature: number;
  seed: number;
  max_tokens: number;
};

/** The slice of the OpenAI client the describer calls. */
export type CaptionCompletionClient = {
  chat: {
    completions: {
      create(body: CaptionRequest): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
};

type OpenAiDescriberOptions = {
  model: string;
  client?: CaptionCompletionClient;
  apiKey?: string;
  baseURL?: string;
  maxTokens?: number;
};

/**
 * Captions through any OpenAI-compatible chat completions endpoint with
 * vision input. Sampling is disabled (`temperature: 0`, fixed seed).
 */
export function createOpenAiDescriber(options: OpenAiDescriberOptions): Describer {
  const client: CaptionCompletionClient =
    options.client ??
    new OpenAI({
      ...(options.apiKey ? { apiKey: options.apiKey } : {}),
      ...(options.baseURL ? { baseURL: options.baseURL } : {}),
    });
  const maxTokens = options.maxTokens ?? 40;

  return {
    modelId: `openai:${options.model}`,
    async describe(image) {
      const dataUrl = `data:${mimeTypeForFormat(image.format)};base64,${image.bytes.toString("base64")}`;
      const completion = await client.chat.completions.create({
        model: options.model,
        temperature: 0,
        seed: 0,
        max_tokens: maxTokens,
        messages: [
          { role: "system", content: `${CAPTION_PROMPT} Answer with one short sentence.` },
          {
            role: "user",
            content: [
              { type: "text", text: CAPTION_PROMPT },
              { type: "image_url", image_url: { url: dataUrl } },
            ],
          },
        ],
      });
      return finalizeCaption(completion.choices[0]?.message.content);
    },
  };
}

const PALETTE: Array<{ name: string; rgb: [number, number, number] }> = [
  { name: "black", rgb: [0, 0, 0] },
  { name: "white", rgb: [255, 255, 255] },
  { name: "gray", rgb: [128, 128, 128] },
  { name: "red", rgb: [255, 0, 0] },
  { name: "orange", rgb: [255, 140, 0] },
  { name: "yellow", rgb: [255, 220, 0] },
  { name: "green", rgb: [0, 160, 60] },
  { name: "blue", rgb: [0, 70, 255] },
  { name: "purple", rgb: [128, 0, 160] },
  { name: "pink", rgb: [255, 105, 180] },
  { name: "brown", rgb: [130, 80, 40] },
];

export function nearestColorName(r: number, g: number, b: number): string {
  let best = "gray";
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const entry of PALETTE) {
    const [pr, pg, pb] = entry.rgb;
    const distance = (r - pr) ** 2 + (g - pg) ** 2 + (b - pb) ** 2;
    if (distance < bestDistance) {
      best = entry.name;
      bestDistance = distance;
    }
  }
  return best;
}

function orientation(width: number, height: number): string {
  if (width > height) return "landscape";
  if (width < height) return "portrait";
  return "square";
}

/** Model-free describer: orientation plus the dominant colour. */
export function createHeuristicDescriber(): Describer {
  return {
    modelId: "heuristic:local-v1",
    async describe(image) {
      const { dominant } = await sharp(image.bytes).stats();
      const color = nearestColorName(dominant.r, dominant.g, dominant.b);
      return finalizeCaption(`a ${orientation(image.width, image.height)} image dominated by ${color} tones`);
    },
  };
}
