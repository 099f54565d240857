import { z } from "zod";

/**
 * Single search hit. Only the fields the pipeline reads are
 * validated; the rest of the payload passes through untouched.
 */
export const SearchItemSchema = z
  .object({
    type: z.string().optional(),
    start: z.string().nullable().optional(),
    slug: z.string(),
    title: z.string().nullable().optional(),
  })
  .passthrough();

export const SearchEnvelopeSchema = z
  .object({
    searchResults: z.array(z.unknown()),
  })
  .passthrough();
