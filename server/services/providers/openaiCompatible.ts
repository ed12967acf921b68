import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  type OpenAI,
} from "openai";
import { z } from "zod";
import { getEnv, type AppEnv } from "../../config/env";
import type { LanguageCode } from "../../config/pipelineConfig";
import { ProviderError, type ProviderErrorKind } from "../../errors";
import { getModelClient } from "../openaiClient";
import type {
  ModelProviders,
  OcrCapability,
  OcrRequest,
  OcrSpan,
  TranslationCapability,
  TranslationRequest,
  TranslationResult,
} from "./capabilities";

type ChatCompletionParams =
  OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

/** The slice of a chat completion response the providers read. */
export interface ChatCompletionLike {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
}

export type ChatCompletionCall = (
  params: ChatCompletionParams,
  options: { signal?: AbortSignal },
) => Promise<ChatCompletionLike>;

export const chatCompletionCall =
  (client: OpenAI): ChatCompletionCall =>
  (params, options) =>
    client.chat.completions.create(params, options);

const LANGUAGE_NAMES: Record<LanguageCode, string> = {
  tr: "Turkish",
  en: "English",
};

function kindFromStatus(status: number | undefined): ProviderErrorKind {
  if (status === undefined) return "connection";
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limit";
  if (status === 401 || status === 403) return "auth";
  if (status >= 500) return "unavailable";
  return "invalid_request";
}

export function toProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) return error;
  if (error instanceof APIConnectionTimeoutError) {
    return new ProviderError("timeout", error.message, provider, { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new ProviderError("connection", error.message, provider, { cause: error });
  }
  if (error instanceof APIError) {
    return new ProviderError(kindFromStatus(error.status), error.message, provider, {
      cause: error,
      status: error.status ?? null,
    });
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new ProviderError("timeout", error.message, provider, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError("unavailable", message, provider, { cause: error });
}

/** Strips a Markdown code fence some models wrap JSON in. */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

async function requestJson(
  call: ChatCompletionCall,
  provider: string,
  params: ChatCompletionParams,
  signal: AbortSignal | undefined,
): Promise<{ payload: unknown; model: string }> {
  let completion: ChatCompletionLike;
  try {
    completion = await call(params, { signal });
  } catch (error) {
    throw toProviderError(error, provider);
  }

  const content = completion.choices[0]?.message.content;
  if (!content || !content.trim()) {
    throw new ProviderError("invalid_response", "Model returned no content", provider);
  }
  try {
    return { payload: JSON.parse(stripCodeFence(content)), model: completion.model };
  } catch (error) {
    throw new ProviderError("invalid_response", "Model returned malformed JSON", provider, {
      cause: error,
    });
  }
}

const TranslationPayloadSchema = z.object({
  translations: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      text: z.string(),
    }),
  ),
  confidence: z.number().min(0).max(1).optional(),
});

const buildTranslationPrompt = (request: TranslationRequest) =>
  [
    `Translate each text segment from ${LANGUAGE_NAMES[request.sourceLang]} to ${LANGUAGE_NAMES[request.targetLang]}.`,
    "Segments are text blocks from one PDF document, in reading order.",
    "Preserve meaning, numbers, special symbols and inline structure. Do not merge or split segments.",
    'Respond with JSON only: {"translations":[{"index":0,"text":"..."}],"confidence":0.0}',
    "where index is the segment index and confidence (0 to 1) is your certainty about the batch.",
  ].join("\n");

export class OpenAICompatibleTranslator implements TranslationCapability {
  constructor(
    private readonly call: ChatCompletionCall,
    readonly provider: string,
  ) {}

  async translate(request: TranslationRequest): Promise<TranslationResult> {
    const { payload, model } = await requestJson(
      this.call,
      this.provider,
      {
        model: request.model,
        temperature: 0,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: "You are a high-precision document translator." },
          { role: "user", content: buildTranslationPrompt(request) },
          {
            role: "user",
            content: JSON.stringify(
              request.segments.map((text, index) => ({ index, text })),
            ),
          },
        ],
      },
      request.signal,
    );

    const parsed = TranslationPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(
        "invalid_response",
        `Translation payload did not match the expected shape: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        this.provider,
      );
    }

    const byIndex = new Map<number, string>();
    for (const entry of parsed.data.translations) {
      if (byIndex.has(entry.index)) {
        throw new ProviderError(
          "invalid_response",
          `Translation index ${entry.index} appears more than once`,
          this.provider,
        );
      }
      byIndex.set(entry.index, entry.text.trim());
    }
    if (byIndex.size !== request.segments.length) {
      throw new ProviderError(
        "invalid_response",
        `Expected ${request.segments.length} translation(s), got ${byIndex.size}`,
        this.provider,
      );
    }
    const segments: string[] = [];
    for (let index = 0; index < request.segments.length; index += 1) {
      const text = byIndex.get(index);
      if (text === undefined) {
        throw new ProviderError(
          "invalid_response",
          `Translation for segment ${index} is missing`,
          this.provider,
        );
      }
      segments.push(text);
    }
    return {
      segments,
      confidence: parsed.data.confidence ?? 1,
      model: model || request.model,
    };
  }
}

const OcrSpanPayloadSchema = z.object({
  text: z.string(),
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
  confidence: z.number().min(0).max(1).optional(),
});

const OcrPayloadSchema = z.union([
  z.array(OcrSpanPayloadSchema),
  z.object({ blocks: z.array(OcrSpanPayloadSchema) }),
]);

const OCR_PROMPT =
  "Extract readable text blocks from this page image. " +
  'Respond with JSON only: {"blocks":[{"text":"...","x0":0,"y0":0,"x1":0,"y1":0,"confidence":0.0}]}. ' +
  "Coordinates are in image pixel space with the origin at the top-left corner. " +
  "Keep reading order; one entry per paragraph, heading or caption.";

export class OpenAICompatibleOcr implements OcrCapability {
  constructor(
    private readonly call: ChatCompletionCall,
    readonly provider: string,
  ) {}

  async recognize(request: OcrRequest): Promise<OcrSpan[]> {
    const { payload } = await requestJson(
      this.call,
      this.provider,
      {
        model: request.model,
        temperature: 0,
        response_format: { type: "json_object" },
        messages: [
          {
            role: "user",
            content: [
              {
                type: "text",
                text: `Source language hint: ${LANGUAGE_NAMES[request.sourceLang]}. ${OCR_PROMPT}`,
              },
              {
                type: "image_url",
                image_url: {
                  url: `data:image/png;base64,${request.image.toString("base64")}`,
                },
              },
            ],
          },
        ],
      },
      request.signal,
    );

    const parsed = OcrPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(
        "invalid_response",
        "OCR payload did not match the expected shape",
        this.provider,
      );
    }
    const spans = Array.isArray(parsed.data) ? parsed.data : parsed.data.blocks;
    return spans.map((span) => ({
      text: span.text,
      bbox: { x0: span.x0, y0: span.y0, x1: span.x1, y1: span.y1 },
      confidence: span.confidence ?? 1,
    }));
  }
}

export function createModelProviders(
  env: AppEnv = getEnv(),
  call: ChatCompletionCall = chatCompletionCall(getModelClient()),
): ModelProviders {
  return {
    translator: new OpenAICompatibleTranslator(call, env.MODEL_PROVIDER),
    ocr: new OpenAICompatibleOcr(call, env.MODEL_PROVIDER),
  };
}
