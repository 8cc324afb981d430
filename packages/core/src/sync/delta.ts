/**
 * Delta Extraction
 *
 * The watermark is the uuid of the last delivered message. Everything
 * strictly after it is new. A watermark that no longer appears in the
 * file means the file was rewritten, and the whole file is sent again.
 */

import type { Message } from "../schema/message.js";

export interface Delta {
  sessionId: string;
  projectPath: string;
  messages: Message[];
  /** Always the uuid of the last element of `messages` */
  newLastUuid: string;
}

export interface DeltaSource {
  sessionId: string;
  projectPath: string;
}

export function extractNewMessages(messages: readonly Message[], lastSyncedUuid: string): Message[] {
  if (lastSyncedUuid === "") return [...messages];

  const index = messages.findIndex((msg) => msg.uuid === lastSyncedUuid);
  if (index === -1) {
    // TODO: surface a "conflict" outcome instead of a silent full resync once the server can reconcile batches
    return [...messages];
  }
  return messages.slice(index + 1);
}

/**
 * Returns null when nothing is new, never an empty Delta.
 */
export function extractDelta(
  source: DeltaSource,
  messages: readonly Message[],
  lastSyncedUuid: string
): Delta | null {
  const newMessages = extractNewMessages(messages, lastSyncedUuid);
  const last = newMessages[newMessages.length - 1];
  if (!last) return null;

  return {
    sessionId: source.sessionId,
    projectPath: source.projectPath,
    messages: newMessages,
    newLastUuid: last.uuid,
  };
}
