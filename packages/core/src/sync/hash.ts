/**
 * Content Hash
 *
 * SHA-256 over the canonical JSONL rendering of a session:
 * one metadata line, then one line per message, joined by "\n"
 * with no trailing newline.
 *
 * The server computes the same digest independently with
 * JSON.stringify, so key order, omitted fields and the separator
 * here are a wire contract. Do not reorder.
 */

import { createHash } from "crypto";
import type { Message } from "../schema/message.js";
import { EmptyContentError } from "./errors.js";

export interface SessionMetadata {
  sessionId: string;
  userId: string;
  projectPath: string;
  timestamp: string;
  startTime: string;
  endTime: string;
  messageCount: number;
  models: string[];
  totalTokens: number;
}

const UNKNOWN_MODEL = "unknown";

export function calculateContentHash(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Distinct non-empty models in order of first appearance.
 */
export function extractModels(messages: readonly Message[]): string[] {
  const models = new Set<string>();
  for (const msg of messages) {
    if (msg.model) models.add(msg.model);
  }
  return models.size > 0 ? Array.from(models) : [UNKNOWN_MODEL];
}

export function calculateTotalTokens(messages: readonly Message[]): number {
  return messages.reduce((total, msg) => total + (msg.tokens ?? 0), 0);
}

export function buildSessionMetadata(
  sessionId: string,
  projectPath: string,
  messages: readonly Message[]
): SessionMetadata {
  const first = messages[0];
  const last = messages[messages.length - 1];

  return {
    sessionId,
    userId: "", // filled in server-side
    projectPath,
    timestamp: first.timestamp,
    startTime: first.timestamp,
    endTime: last.timestamp,
    messageCount: messages.length,
    models: extractModels(messages),
    totalTokens: calculateTotalTokens(messages),
  };
}

/**
 * `model` is omitted when empty and `tokens` when zero; `type` is not hashed.
 */
export function serializeMessage(msg: Message): string {
  return JSON.stringify({
    uuid: msg.uuid,
    timestamp: msg.timestamp,
    role: msg.role,
    content: msg.content,
    ...(msg.model ? { model: msg.model } : {}),
    ...(msg.tokens ? { tokens: msg.tokens } : {}),
  });
}

export function serializeSession(
  sessionId: string,
  projectPath: string,
  messages: readonly Message[]
): string {
  const metadata = buildSessionMetadata(sessionId, projectPath, messages);
  const lines = [JSON.stringify(metadata), ...messages.map(serializeMessage)];
  return lines.join("\n");
}

/**
 * 64-char lowercase hex digest. Throws EmptyContentError for a session
 * with no valid messages.
 */
export function hashSession(
  sessionId: string,
  projectPath: string,
  messages: readonly Message[],
  path: string = sessionId
): string {
  if (messages.length === 0) {
    throw new EmptyContentError(path);
  }
  return calculateContentHash(serializeSession(sessionId, projectPath, messages));
}

/**
 * No remote hash means the server has never seen the session.
 */
export function conversationNeedsSync(localHash: string, remoteHash: string | undefined): boolean {
  if (!remoteHash) return true;
  return localHash !== remoteHash;
}
