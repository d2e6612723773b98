import { z } from "zod";
import type { ExtractionSpec } from "../pipeline/types.js";

export const DEFAULT_THRESHOLD = 0.5;

const fieldNameSchema = z.string().min(1);

// Registry files are snake_case on disk; entries map onto ExtractionSpec.
export const registryEntrySchema = z
  .object({
    text_field: fieldNameSchema.nullish(),
    label_field: fieldNameSchema.nullish(),
    label_is_score: z.boolean().default(false),
    threshold: z.number().finite().default(DEFAULT_THRESHOLD),
    multilabel_fields: z.record(fieldNameSchema, fieldNameSchema).nullish(),
    join_conversation_turns: z.boolean().default(false),
  })
  .strict()
  .transform(
    (entry): ExtractionSpec => ({
      textField: entry.text_field ?? undefined,
      labelField: entry.label_field ?? undefined,
      labelIsScore: entry.label_is_score,
      threshold: entry.threshold,
      multilabelFields: entry.multilabel_fields ?? undefined,
      joinConversationTurns: entry.join_conversation_turns,
    })
  );

export const registryFileSchema = z.object({
  datasets: z.record(z.string().min(1), registryEntrySchema),
});
