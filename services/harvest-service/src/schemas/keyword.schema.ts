import { z } from "zod";

const activeFlag = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => value.trim().toUpperCase() === "TRUE"),
]);

export const KeywordEntrySchema = z.object({
  category: z.string().trim().min(1),
  keyword: z.string().trim().min(1),
  active: activeFlag.default(true),
});

export const KeywordFileSchema = z.array(KeywordEntrySchema);
