/**
 * Message Normalizer
 *
 * Turns one log line into a canonical Message, or drops it.
 * Tries the structured shape first, then the legacy flat shape.
 * Malformed lines are a tolerance policy, never an error path.
 */

import { readFile } from "fs/promises";
import {
  ContentPartSchema,
  LegacyRecordSchema,
  StructuredRecordSchema,
  type Message,
} from "../schema/message.js";
import { HashError, ParseError } from "./errors.js";

// --- Line Classification ---

type RecordShape = "structured" | "legacy";

export interface NormalizedLine {
  shape: RecordShape;
  message: Message;
}

function parseJsonLine(rawLine: string): unknown {
  try {
    return JSON.parse(rawLine) as unknown;
  } catch (err) {
    throw new ParseError("line is not valid JSON", err);
  }
}

/**
 * First text part wins; later text parts and non-text parts are ignored.
 */
function extractText(content: string | unknown[] | null | undefined): string {
  if (typeof content === "string") return content;
  if (!content) return "";

  for (const part of content) {
    const parsed = ContentPartSchema.safeParse(part);
    if (parsed.success && parsed.data.type === "text") {
      return parsed.data.text ?? "";
    }
  }
  return "";
}

function fromStructured(value: unknown): Message | null {
  const parsed = StructuredRecordSchema.safeParse(value);
  if (!parsed.success) return null;

  const record = parsed.data;
  const message: Message = {
    uuid: record.uuid,
    timestamp: record.timestamp,
    role: record.message.role,
    content: extractText(record.message.content),
  };
  if (record.message.model) message.model = record.message.model;
  if (record.type) message.type = record.type;

  return isComplete(message) ? message : null;
}

function fromLegacy(value: unknown): Message | null {
  const parsed = LegacyRecordSchema.safeParse(value);
  if (!parsed.success) return null;

  const record = parsed.data;
  const message: Message = {
    uuid: record.uuid,
    timestamp: record.timestamp,
    role: record.role,
    content: record.content,
  };
  if (record.model) message.model = record.model;
  if (record.tokens) message.tokens = record.tokens;

  return isComplete(message) ? message : null;
}

function isComplete(message: Message): boolean {
  return message.uuid !== "" && message.role !== "";
}

/**
 * Classify a line and report which shape produced the message.
 */
export function classifyLine(rawLine: string): NormalizedLine | null {
  if (rawLine.trim() === "") return null;

  let value: unknown;
  try {
    value = parseJsonLine(rawLine);
  } catch (err) {
    if (err instanceof ParseError) return null;
    throw err;
  }

  const structured = fromStructured(value);
  if (structured) return { shape: "structured", message: structured };

  const legacy = fromLegacy(value);
  if (legacy) return { shape: "legacy", message: legacy };

  return null;
}

export function normalizeLine(rawLine: string): Message | null {
  return classifyLine(rawLine)?.message ?? null;
}

// --- File Level ---

/**
 * Normalize every line of a log file body, in file order.
 */
export function parseMessages(content: string): Message[] {
  const messages: Message[] = [];
  for (const line of content.split("\n")) {
    const message = normalizeLine(line.endsWith("\r") ? line.slice(0, -1) : line);
    if (message) messages.push(message);
  }
  return messages;
}

/**
 * Read and normalize a session file. The file handle is released before returning.
 */
export async function readSessionMessages(path: string): Promise<Message[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new HashError(path, `opening file ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  return parseMessages(content);
}
