import { z } from "zod";

/**
 * Wire shapes of a single conversation log line.
 *
 * Two writer generations exist:
 * - structured: metadata at the top level, the turn nested under `message`
 * - legacy: a flat record with role and content at the top level
 *
 * Both are normalized into one canonical `Message` (see sync/normalizer.ts).
 */

// JSON null and a missing key read the same way
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

/**
 * One typed part of a structured message body
 */
export const ContentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export type ContentPart = z.infer<typeof ContentPartSchema>;

/**
 * Structured record: `{ uuid, timestamp, type, message: { role, model, content } }`
 *
 * `content` is either plain text or a list of typed parts.
 */
export const StructuredRecordSchema = z
  .object({
    uuid: optionalString,
    timestamp: optionalString,
    type: optionalString,
    message: z
      .object({
        role: optionalString,
        model: optionalString,
        content: z.union([z.string(), z.array(z.unknown())]).nullish(),
      })
      .passthrough(),
  })
  .passthrough();

export type StructuredRecord = z.infer<typeof StructuredRecordSchema>;

/**
 * Legacy flat record: `{ uuid, timestamp, role, content, model?, tokens? }`
 */
export const LegacyRecordSchema = z
  .object({
    uuid: optionalString,
    timestamp: optionalString,
    role: optionalString,
    content: optionalString,
    model: optionalString,
    tokens: z.number().int().nullish(),
  })
  .passthrough();

export type LegacyRecord = z.infer<typeof LegacyRecordSchema>;

/**
 * Canonical message. `uuid` and `role` are never empty.
 */
export interface Message {
  uuid: string;
  timestamp: string;
  role: string;
  content: string;
  model?: string;
  type?: string;
  tokens?: number;
}
