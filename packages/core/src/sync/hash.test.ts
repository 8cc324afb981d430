import { describe, it, expect } from "vitest";
import {
  buildSessionMetadata,
  calculateContentHash,
  calculateTotalTokens,
  conversationNeedsSync,
  extractModels,
  hashSession,
  serializeMessage,
  serializeSession,
} from "./hash.js";
import { EmptyContentError } from "./errors.js";
import type { Message } from "../schema/message.js";

const messages: Message[] = [
  { uuid: "msg-1", timestamp: "2024-01-01T00:00:00Z", role: "user", content: "Hello", type: "user" },
  {
    uuid: "msg-2",
    timestamp: "2024-01-01T00:00:05Z",
    role: "assistant",
    content: "Hi there",
    model: "model-a",
    tokens: 12,
  },
];

describe("calculateContentHash", () => {
  it("is lowercase hex SHA-256", () => {
    expect(calculateContentHash("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});

describe("serializeSession", () => {
  it("renders metadata then messages, joined without a trailing newline", () => {
    expect(serializeSession("session-1", "/org/project", messages)).toBe(
      [
        '{"sessionId":"session-1","userId":"","projectPath":"/org/project","timestamp":"2024-01-01T00:00:00Z","startTime":"2024-01-01T00:00:00Z","endTime":"2024-01-01T00:00:05Z","messageCount":2,"models":["model-a"],"totalTokens":12}',
        '{"uuid":"msg-1","timestamp":"2024-01-01T00:00:00Z","role":"user","content":"Hello"}',
        '{"uuid":"msg-2","timestamp":"2024-01-01T00:00:05Z","role":"assistant","content":"Hi there","model":"model-a","tokens":12}',
      ].join("\n")
    );
  });
});

describe("serializeMessage", () => {
  it("omits empty model, zero tokens and type", () => {
    const line = serializeMessage({
      uuid: "u",
      timestamp: "t",
      role: "user",
      content: "x",
      model: "",
      tokens: 0,
      type: "user",
    });

    expect(line).toBe('{"uuid":"u","timestamp":"t","role":"user","content":"x"}');
  });
});

describe("hashSession", () => {
  it("produces the digest the server computes", () => {
    expect(hashSession("session-1", "/org/project", messages)).toBe(
      "eee70dda4a92047c6f6a16c1501a030be3587101794f94efcd1c1be4537fac38"
    );
  });

  it("hashes UTF-8 bytes", () => {
    const single: Message[] = [{ uuid: "u", timestamp: "t1", role: "user", content: "héllo" }];

    expect(hashSession("s", "/", single)).toBe("795bd47ddef9632878f9151cd69530f251896407943df86f12b498e32a44f9b5");
  });

  it("is deterministic", () => {
    const first = hashSession("session-1", "/org/project", messages);
    const second = hashSession("session-1", "/org/project", messages.map((m) => ({ ...m })));

    expect(first).toBe(second);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when any message content changes", () => {
    const base = hashSession("session-1", "/org/project", messages);
    const perturbed = messages.map((m, i) => (i === 1 ? { ...m, content: "Hi there!" } : m));

    expect(hashSession("session-1", "/org/project", perturbed)).not.toBe(base);
  });

  it("changes with the project path", () => {
    expect(hashSession("session-1", "/org/other", messages)).not.toBe(
      hashSession("session-1", "/org/project", messages)
    );
  });

  it("ignores the message type", () => {
    const withoutType = messages.map(({ type: _type, ...rest }) => rest);

    expect(hashSession("session-1", "/org/project", withoutType)).toBe(
      hashSession("session-1", "/org/project", messages)
    );
  });

  it("fails with EmptyContentError for no messages", () => {
    expect(() => hashSession("session-1", "/", [], "/data/session-1.jsonl")).toThrow(EmptyContentError);
    expect(() => hashSession("session-1", "/", [], "/data/session-1.jsonl")).toThrow(
      "no valid messages in file /data/session-1.jsonl"
    );
  });
});

describe("metadata", () => {
  it("lists models in order of first appearance", () => {
    const mixed: Message[] = [
      { uuid: "1", timestamp: "t", role: "assistant", content: "", model: "model-b" },
      { uuid: "2", timestamp: "t", role: "assistant", content: "", model: "model-a" },
      { uuid: "3", timestamp: "t", role: "assistant", content: "", model: "model-b" },
    ];

    expect(extractModels(mixed)).toEqual(["model-b", "model-a"]);
  });

  it("uses unknown when no model is present", () => {
    expect(extractModels([messages[0]])).toEqual(["unknown"]);
  });

  it("sums tokens with absent as zero", () => {
    expect(calculateTotalTokens([...messages, { ...messages[1], tokens: 3 }])).toBe(15);
  });

  it("takes timestamps from the first and last message", () => {
    const metadata = buildSessionMetadata("session-1", "/org/project", messages);

    expect(metadata).toEqual({
      sessionId: "session-1",
      userId: "",
      projectPath: "/org/project",
      timestamp: "2024-01-01T00:00:00Z",
      startTime: "2024-01-01T00:00:00Z",
      endTime: "2024-01-01T00:00:05Z",
      messageCount: 2,
      models: ["model-a"],
      totalTokens: 12,
    });
  });
});

describe("conversationNeedsSync", () => {
  it("syncs when the server has no hash", () => {
    expect(conversationNeedsSync("abc", undefined)).toBe(true);
    expect(conversationNeedsSync("abc", "")).toBe(true);
  });

  it("skips when hashes match", () => {
    expect(conversationNeedsSync("abc", "abc")).toBe(false);
  });

  it("syncs when hashes differ", () => {
    expect(conversationNeedsSync("abc", "def")).toBe(true);
  });
});
