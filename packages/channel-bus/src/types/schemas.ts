/**
 * Schemas for values read back from JSON (channel files, archive files)
 */
import { z } from 'zod';
import type { CategorySettings, JsonObject, JsonValue } from './index.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

// Missing identity fields are filled in, extra ones kept
export const ProjectInfoSchema = z
  .object({
    name: z.string().catch('Unknown'),
    root: z.string().catch(''),
    timestamp: z.string().catch(''),
  })
  .catchall(JsonValueSchema);

// Categories that are not objects are dropped
const CategorySettingsSchema = z.record(JsonValueSchema).transform((entries) => {
  const settings: CategorySettings = {};
  for (const [key, record] of Object.entries(entries)) {
    const parsed = JsonObjectSchema.safeParse(record);
    if (parsed.success) settings[key] = parsed.data;
  }
  return settings;
});

export const MasterRecordSchema = z.object({
  project_info: ProjectInfoSchema,
  settings: CategorySettingsSchema,
});

export const EnvelopeMetadataSchema = z.object({
  channel: z.string(),
  sender: z.string().catch(''),
  timestamp: z.number(),
  format: z.literal('json').catch('json'),
  checksum: z.string().catch(''),
});

export const PackedEnvelopeSchema = z.object({
  metadata: EnvelopeMetadataSchema,
  payload: MasterRecordSchema,
});
