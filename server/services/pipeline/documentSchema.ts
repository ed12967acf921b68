import { z } from "zod";
import type { ExtractedDocument, JobWarning } from "./types";

const BoundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

const BlockSchema = z.object({
  id: z.string(),
  pageIndex: z.number().int().nonnegative(),
  bbox: BoundingBoxSchema,
  sourceText: z.string(),
  translatedText: z.string().nullable(),
  confidence: z.number(),
  fontHint: z.object({
    size: z.number(),
    name: z.string().nullable(),
    color: z.string().nullable(),
  }),
  origin: z.enum(["text_layer", "ocr"]),
  errorTag: z.enum(["translation_failed"]).nullable(),
});

const PageSchema = z.object({
  index: z.number().int().nonnegative(),
  width: z.number().positive(),
  height: z.number().positive(),
  classification: z.enum(["text", "scan"]),
  textConfidence: z.number(),
  characterCount: z.number().int().nonnegative(),
  ocrStatus: z.enum(["not_needed", "pending", "recognized", "failed"]),
  blocks: z.array(BlockSchema),
});

export const ExtractedDocumentSchema: z.ZodType<ExtractedDocument> = z.object({
  pageCount: z.number().int().nonnegative(),
  pages: z.array(PageSchema),
});

const JobWarningSchema: z.ZodType<JobWarning> = z.object({
  code: z.enum(["ocr_failed", "translation_failed"]),
  pageIndex: z.number().int().nullable(),
  blockIds: z.array(z.string()).optional(),
  message: z.string(),
});

export const JobWarningListSchema = z.array(JobWarningSchema);

export function parseExtractedDocument(payload: unknown): ExtractedDocument {
  return ExtractedDocumentSchema.parse(payload);
}

export function parseWarnings(payload: unknown): JobWarning[] {
  const result = JobWarningListSchema.safeParse(payload ?? []);
  return result.success ? result.data : [];
}
