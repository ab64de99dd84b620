import { z } from "zod";
import { CATEGORIES, Category } from "./types.js";

// Unknown keys are stripped, so artifacts written by a newer stage with extra
// optional fields stay readable.

export const categorySchema = z.enum(CATEGORIES);

export const pageSchema = z.object({
  url: z.string().min(1),
  title: z.string().default(""),
  text: z.string(),
  fetchedAt: z.string(),
  status: z.number().int(),
  links: z.array(z.string()).default([]),
  images: z.array(z.object({ url: z.string(), alt: z.string().default("") })).default([]),
  category: categorySchema.optional(),
});

export const classifiedPageSchema = pageSchema.extend({
  category: categorySchema,
});

export const chunkSchema = z.object({
  id: z.string().min(1),
  sourceUrl: z.string().min(1),
  title: z.string().default(""),
  index: z.number().int().min(0),
  text: z.string().min(1),
  startOffset: z.number().int().min(0),
  endOffset: z.number().int().min(0),
  category: categorySchema.default("unknown"),
});

export const embeddedChunkSchema = chunkSchema.extend({
  vector: z.array(z.number()).min(1),
  embeddingModelId: z.string().min(1),
});

/** Store rows carry categories as plain strings; anything unrecognised reads as "unknown". */
export function parseCategory(value: unknown): Category {
  const parsed = categorySchema.safeParse(value);
  return parsed.success ? parsed.data : "unknown";
}
