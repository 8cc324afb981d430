import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { classifyLine, normalizeLine, parseMessages, readSessionMessages } from "./normalizer.js";
import { HashError } from "./errors.js";

const legacy = (uuid: string, extra: Record<string, unknown> = {}): string =>
  JSON.stringify({ uuid, timestamp: "2024-01-01T00:00:00Z", role: "user", content: `hi from ${uuid}`, ...extra });

describe("normalizeLine", () => {
  describe("structured shape", () => {
    it("uses string content verbatim", () => {
      const line = JSON.stringify({
        uuid: "u1",
        timestamp: "2024-01-01T00:00:00Z",
        type: "assistant",
        message: { role: "assistant", model: "model-a", content: "  plain text  " },
      });

      expect(classifyLine(line)).toEqual({
        shape: "structured",
        message: {
          uuid: "u1",
          timestamp: "2024-01-01T00:00:00Z",
          role: "assistant",
          content: "  plain text  ",
          model: "model-a",
          type: "assistant",
        },
      });
    });

    it("takes only the first text part", () => {
      const line = JSON.stringify({
        uuid: "u2",
        timestamp: "2024-01-01T00:00:01Z",
        type: "assistant",
        message: {
          role: "assistant",
          content: [
            { type: "tool_use", id: "t1", input: {} },
            { type: "text", text: "first" },
            { type: "text", text: "second" },
          ],
        },
      });

      expect(normalizeLine(line)?.content).toBe("first");
    });

    it("yields empty content when no text part exists", () => {
      const line = JSON.stringify({
        uuid: "u3",
        timestamp: "2024-01-01T00:00:02Z",
        type: "user",
        message: { role: "user", content: [{ type: "image", source: {} }] },
      });

      expect(normalizeLine(line)).toEqual({
        uuid: "u3",
        timestamp: "2024-01-01T00:00:02Z",
        role: "user",
        content: "",
        type: "user",
      });
    });

    it("treats null model and content as absent", () => {
      const line = JSON.stringify({
        uuid: "u4",
        timestamp: "2024-01-01T00:00:03Z",
        type: "user",
        message: { role: "user", model: null, content: null },
      });

      expect(normalizeLine(line)).toEqual({
        uuid: "u4",
        timestamp: "2024-01-01T00:00:03Z",
        role: "user",
        content: "",
        type: "user",
      });
    });

    it("falls through to the legacy shape when the nested role is empty", () => {
      const line = JSON.stringify({
        uuid: "u5",
        timestamp: "2024-01-01T00:00:04Z",
        role: "user",
        content: "flat content",
        message: { role: "" },
      });

      expect(classifyLine(line)).toEqual({
        shape: "legacy",
        message: { uuid: "u5", timestamp: "2024-01-01T00:00:04Z", role: "user", content: "flat content" },
      });
    });
  });

  describe("legacy shape", () => {
    it("reads model and tokens from the top level", () => {
      expect(normalizeLine(legacy("m1", { model: "model-b", tokens: 42 }))).toEqual({
        uuid: "m1",
        timestamp: "2024-01-01T00:00:00Z",
        role: "user",
        content: "hi from m1",
        model: "model-b",
        tokens: 42,
      });
    });

    it("omits zero tokens", () => {
      expect(normalizeLine(legacy("m2", { tokens: 0 }))).not.toHaveProperty("tokens");
    });
  });

  describe("discarded lines", () => {
    it.each([
      ["empty", ""],
      ["whitespace", "   "],
      ["not json", "not json"],
      ["json array", "[1,2,3]"],
      ["json string", '"hello"'],
      ["missing uuid", JSON.stringify({ timestamp: "t", role: "user", content: "x" })],
      ["missing role", JSON.stringify({ uuid: "x", timestamp: "t", content: "x" })],
      ["empty uuid", JSON.stringify({ uuid: "", timestamp: "t", role: "user", content: "x" })],
    ])("drops %s", (_label, line) => {
      expect(normalizeLine(line)).toBeNull();
    });
  });
});

describe("parseMessages", () => {
  it("skips a malformed line between two valid ones", () => {
    const content = [legacy("msg-1"), "not json", legacy("msg-2")].join("\n");

    expect(parseMessages(content).map((m) => m.uuid)).toEqual(["msg-1", "msg-2"]);
  });

  it("handles CRLF line endings and a trailing newline", () => {
    const content = `${legacy("a")}\r\n${legacy("b")}\r\n`;

    const messages = parseMessages(content);
    expect(messages.map((m) => m.uuid)).toEqual(["a", "b"]);
    expect(messages[1].content).toBe("hi from b");
  });

  it("mixes both shapes in file order", () => {
    const structured = JSON.stringify({
      uuid: "s1",
      timestamp: "2024-01-01T00:00:05Z",
      type: "assistant",
      message: { role: "assistant", content: "reply" },
    });
    const content = [legacy("l1"), structured, legacy("l2")].join("\n");

    expect(parseMessages(content).map((m) => m.uuid)).toEqual(["l1", "s1", "l2"]);
  });
});

describe("readSessionMessages", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `transcript-sync-normalizer-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("reads and normalizes a file", async () => {
    const path = join(testDir, "session.jsonl");
    writeFileSync(path, [legacy("msg-1"), legacy("msg-2")].join("\n"));

    const messages = await readSessionMessages(path);
    expect(messages.map((m) => m.uuid)).toEqual(["msg-1", "msg-2"]);
  });

  it("fails with HashError for a missing file", async () => {
    const path = join(testDir, "gone.jsonl");

    await expect(readSessionMessages(path)).rejects.toBeInstanceOf(HashError);
  });
});
