import { describe, it, expect, vi } from "vitest";
import { PassThrough } from "node:stream";
import { silentLogger } from "../../logging/logger";
import { createMonitor } from "../../monitor";
import { createSessionRecord } from "../../parser";
import { runLiveView } from "../live-view";
import { captureStream } from "./helpers";

const sessions = ["a", "b"].map((id) =>
  createSessionRecord(`/data/projects/-p/${id}.jsonl`, { size: 0, mtimeMs: 0 }),
);

function start() {
  const stdin = new PassThrough();
  const { stream, output } = captureStream();
  const collect = vi.fn(async () => sessions);
  const monitor = createMonitor({ dataDir: "/data", collect });
  const done = runLiveView({
    monitor,
    stdin,
    stdout: stream,
    refreshIntervalMs: 60_000,
    logger: silentLogger(),
    render: (snapshot) => `[selected=${snapshot.selected?.sessionId ?? "none"}]`,
  });
  return { stdin, output, collect, done };
}

describe("runLiveView", () => {
  it("draws on start and redraws when the selection moves", async () => {
    const { stdin, output, done } = start();
    await vi.waitFor(() => expect(output()).toContain("[selected=a]"));

    stdin.write("j");
    await vi.waitFor(() => expect(output()).toContain("[selected=b]"));

    stdin.write("q");
    await done;
    expect(output().endsWith("\u001b[?25h\u001b[?1049l")).toBe(true);
  });

  it("refreshes on r", async () => {
    const { stdin, output, collect, done } = start();
    // The first refresh has finished once its frame is on screen
    await vi.waitFor(() => expect(output()).toContain("[selected=a]"));
    expect(collect).toHaveBeenCalledTimes(1);

    stdin.write("r");
    await vi.waitFor(() => expect(collect).toHaveBeenCalledTimes(2));

    stdin.write("q");
    await done;
  });

  it("keeps running when a refresh fails", async () => {
    const stdin = new PassThrough();
    const { stream } = captureStream();
    const collect = vi.fn().mockRejectedValueOnce(new Error("disk gone")).mockResolvedValue(sessions);
    const logger = silentLogger();
    const error = vi.spyOn(logger, "error");
    const done = runLiveView({
      monitor: createMonitor({ dataDir: "/data", collect }),
      stdin,
      stdout: stream,
      refreshIntervalMs: 60_000,
      logger,
      render: () => "frame",
    });

    await vi.waitFor(() => expect(error).toHaveBeenCalledTimes(1));
    stdin.write("r");
    await vi.waitFor(() => expect(collect).toHaveBeenCalledTimes(2));

    stdin.write("\u0003");
    await done;
  });
});
