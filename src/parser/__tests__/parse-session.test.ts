import { afterEach, describe, expect, it } from "vitest";
import { appendFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { parseSessionFile, parseSessionContent } from "../parse-session";
import {
  createSessionFile,
  makeAssistantRecord,
  makeUserRecord,
  toLine,
  type TempSessionFile,
} from "./helpers";

let temp: TempSessionFile | null = null;

afterEach(async () => {
  await temp?.cleanup();
  temp = null;
});

describe("parseSessionFile", () => {
  it("parses an empty session", async () => {
    temp = await createSessionFile([]);
    const session = await parseSessionFile(temp.path);

    expect(session.sessionId).toBe("session-abc");
    expect(session.projectPath).toBe("-home-user-testproject");
    expect(session.messageCount).toBe(0);
    expect(session.messages).toEqual([]);
    expect(session.contextWindowSize).toBe(200_000);
    expect(session.filePath).toBe(temp.path);
    expect(session.fileSize).toBe(0);
    expect(session.fileMtimeMs).toBeGreaterThan(0);
  });

  it("parses one user and one assistant message", async () => {
    temp = await createSessionFile([
      '{"type":"user","timestamp":"2025-01-01T00:00:00Z"}',
      '{"type":"assistant","timestamp":"2025-01-01T00:00:05Z","message":{"model":"claude-sonnet-4-5-x","usage":{"input_tokens":1000,"output_tokens":500,"cache_creation_input_tokens":200,"cache_read_input_tokens":100}}}',
    ]);
    const session = await parseSessionFile(temp.path);

    expect(session.messageCount).toBe(2);
    expect(session.userMessageCount).toBe(1);
    expect(session.assistantMessageCount).toBe(1);
    expect(session.totalInputTokens).toBe(1000);
    expect(session.totalOutputTokens).toBe(500);
    expect(session.totalCacheCreationTokens).toBe(200);
    expect(session.totalCacheReadTokens).toBe(100);
    expect(session.model).toBe("claude-sonnet-4-5-x");
    expect(session.startedAt).toBe("2025-01-01T00:00:00Z");
    expect(session.lastActivity).toBe("2025-01-01T00:00:05Z");
    expect(session.latestContextUsed).toBe(1300);
    expect(session.messages).toEqual([
      {
        timestamp: "2025-01-01T00:00:05Z",
        model: "claude-sonnet-4-5-x",
        inputTokens: 1000,
        outputTokens: 500,
        cacheCreationTokens: 200,
        cacheReadTokens: 100,
        messageType: "assistant",
      },
    ]);
  });

  it("skips malformed lines without aborting the rest of the file", async () => {
    temp = await createSessionFile([
      toLine(makeUserRecord("2025-01-01T00:00:00Z")),
      "this is not json",
      toLine(makeAssistantRecord("2025-01-01T00:00:01Z", { input_tokens: 10, output_tokens: 1 })),
      "{truncated",
      "42",
      toLine(makeAssistantRecord("2025-01-01T00:00:02Z", { input_tokens: 20, output_tokens: 2 })),
      toLine({ type: "system", timestamp: "2025-01-01T00:00:03Z" }),
      "",
      toLine(makeAssistantRecord("2025-01-01T00:00:04Z", { input_tokens: 30, output_tokens: 3 })),
    ]);
    const session = await parseSessionFile(temp.path);

    expect(session.messages).toHaveLength(3);
    expect(session.messageCount).toBe(5);
    expect(session.userMessageCount).toBe(1);
    expect(session.assistantMessageCount).toBe(3);
    expect(session.totalInputTokens).toBe(60);
    expect(session.totalOutputTokens).toBe(6);
  });

  it("counts other record types toward the message total only", async () => {
    temp = await createSessionFile([
      toLine({ type: "file-history-snapshot", messageId: "m1" }),
      toLine({ type: "progress", timestamp: "2025-01-01T00:00:00Z" }),
      toLine({ timestamp: "2025-01-01T00:00:09Z" }),
    ]);
    const session = await parseSessionFile(temp.path);

    expect(session.messageCount).toBe(3);
    expect(session.userMessageCount).toBe(0);
    expect(session.assistantMessageCount).toBe(0);
    expect(session.messages).toEqual([]);
    expect(session.startedAt).toBe("2025-01-01T00:00:00Z");
    expect(session.lastActivity).toBe("2025-01-01T00:00:09Z");
  });

  it("takes lastActivity from file order, not from the newest timestamp", async () => {
    temp = await createSessionFile([
      toLine(makeUserRecord("2025-01-02T00:00:00Z")),
      toLine(makeUserRecord("2025-01-01T00:00:00Z")),
    ]);
    const session = await parseSessionFile(temp.path);

    expect(session.startedAt).toBe("2025-01-02T00:00:00Z");
    expect(session.lastActivity).toBe("2025-01-01T00:00:00Z");
  });

  it("overwrites latestContextUsed with the most recent assistant turn", async () => {
    temp = await createSessionFile([
      toLine(
        makeAssistantRecord("2025-01-01T00:00:01Z", {
          input_tokens: 50_000,
          cache_creation_input_tokens: 10_000,
          cache_read_input_tokens: 40_000,
        }),
      ),
      toLine(makeAssistantRecord("2025-01-01T00:00:02Z", { input_tokens: 5, output_tokens: 100 })),
    ]);
    const session = await parseSessionFile(temp.path);

    expect(session.latestContextUsed).toBe(5);
    expect(session.totalInputTokens).toBe(50_005);
  });

  it("defaults missing usage fields to 0 and still records a message stat", async () => {
    temp = await createSessionFile([
      toLine({ type: "assistant", timestamp: "2025-01-01T00:00:01Z", message: { model: "claude-opus-4-6" } }),
      toLine({ type: "assistant", timestamp: "2025-01-01T00:00:02Z" }),
      toLine(makeAssistantRecord("2025-01-01T00:00:03Z", { input_tokens: -5, output_tokens: 7 })),
    ]);
    const session = await parseSessionFile(temp.path);

    expect(session.assistantMessageCount).toBe(3);
    expect(session.messages).toHaveLength(3);
    expect(session.messages[1]).toEqual({
      timestamp: "2025-01-01T00:00:02Z",
      model: "",
      inputTokens: 0,
      outputTokens: 0,
      cacheCreationTokens: 0,
      cacheReadTokens: 0,
      messageType: "assistant",
    });
    expect(session.totalInputTokens).toBe(0);
    expect(session.totalOutputTokens).toBe(7);
  });

  it("keeps the last non-empty model and resolves its context window", async () => {
    temp = await createSessionFile([
      toLine(makeAssistantRecord("2025-01-01T00:00:01Z", {}, "claude-opus-4-6")),
      toLine(makeAssistantRecord("2025-01-01T00:00:02Z", {}, "")),
    ]);
    const session = await parseSessionFile(temp.path);

    expect(session.model).toBe("claude-opus-4-6");
    expect(session.contextWindowSize).toBe(200_000);
  });

  it("parses a final line without a trailing newline", async () => {
    temp = await createSessionFile([toLine(makeUserRecord("2025-01-01T00:00:00Z"))]);
    await appendFile(temp.path, toLine(makeUserRecord("2025-01-01T00:00:30Z")));

    const session = await parseSessionFile(temp.path);
    expect(session.userMessageCount).toBe(2);
    expect(session.lastActivity).toBe("2025-01-01T00:00:30Z");
  });

  it("yields superset totals after more lines are appended", async () => {
    temp = await createSessionFile([
      toLine(makeUserRecord("2025-01-01T00:00:00Z")),
      toLine(
        makeAssistantRecord("2025-01-01T00:00:01Z", {
          input_tokens: 100,
          output_tokens: 10,
          cache_creation_input_tokens: 5,
          cache_read_input_tokens: 1,
        }),
      ),
    ]);
    const before = await parseSessionFile(temp.path);

    await temp.append([
      "not json",
      toLine(
        makeAssistantRecord("2025-01-01T00:00:02Z", {
          input_tokens: 200,
          output_tokens: 20,
          cache_creation_input_tokens: 0,
          cache_read_input_tokens: 50,
        }),
      ),
    ]);
    const after = await parseSessionFile(temp.path);

    expect(after.totalInputTokens).toBeGreaterThanOrEqual(before.totalInputTokens);
    expect(after.totalOutputTokens).toBeGreaterThanOrEqual(before.totalOutputTokens);
    expect(after.totalCacheCreationTokens).toBeGreaterThanOrEqual(before.totalCacheCreationTokens);
    expect(after.totalCacheReadTokens).toBeGreaterThanOrEqual(before.totalCacheReadTokens);
    expect(after.totalInputTokens).toBe(300);
    expect(after.totalCacheReadTokens).toBe(51);
    expect(after.messages.slice(0, before.messages.length)).toEqual(before.messages);
    expect(after.fileSize).toBeGreaterThan(before.fileSize);
  });

  it("returns an empty record for a missing file", async () => {
    const path = join(tmpdir(), "tokentally-does-not-exist", "proj", "ghost.jsonl");
    const session = await parseSessionFile(path);

    expect(session.sessionId).toBe("ghost");
    expect(session.projectPath).toBe("proj");
    expect(session.messageCount).toBe(0);
    expect(session.fileSize).toBe(0);
    expect(session.fileMtimeMs).toBe(0);
  });

  it("returns an empty record when the path cannot be read as a file", async () => {
    temp = await createSessionFile([toLine(makeUserRecord("2025-01-01T00:00:00Z"))]);
    // stat succeeds on a directory; reading it fails with EISDIR
    const dirPath = join(dirname(temp.path), "folder.jsonl");
    await mkdir(dirPath);

    const session = await parseSessionFile(dirPath);

    expect(session.sessionId).toBe("folder");
    expect(session.projectPath).toBe("-home-user-testproject");
    expect(session.messageCount).toBe(0);
    expect(session.messages).toEqual([]);
    expect(session.fileMtimeMs).toBeGreaterThan(0);
  });
});

describe("parseSessionContent", () => {
  it("applies the same folding rules to in-memory content", () => {
    const content = [
      toLine(makeUserRecord("2025-01-01T00:00:00Z")),
      "garbage",
      toLine(makeAssistantRecord("2025-01-01T00:00:05Z", { input_tokens: 7, output_tokens: 3 })),
    ].join("\n");
    const session = parseSessionContent(content, "/data/projects/p/s1.jsonl");

    expect(session.sessionId).toBe("s1");
    expect(session.projectPath).toBe("p");
    expect(session.messageCount).toBe(2);
    expect(session.totalInputTokens).toBe(7);
    expect(session.fileSize).toBe(Buffer.byteLength(content));
  });
});
