import type { Readable, Writable } from "node:stream";
import { ReadStream, WriteStream } from "node:tty";
import type { Logger } from "../logging/logger";
import type { Monitor, MonitorSnapshot } from "../monitor";
import { keyActions } from "./keys";

const ENTER_ALT_SCREEN = "\u001b[?1049h\u001b[?25l";
const LEAVE_ALT_SCREEN = "\u001b[?25h\u001b[?1049l";
const CLEAR = "\u001b[H\u001b[2J";

export interface LiveViewOptions {
  monitor: Monitor;
  stdin: Readable;
  stdout: Writable;
  refreshIntervalMs: number;
  render: (snapshot: MonitorSnapshot, width: number) => string;
  logger: Logger;
}

/**
 * Redraw the dashboard on every refresh tick and react to keys until the
 * user quits. Resolves once the terminal has been restored.
 */
export function runLiveView(options: LiveViewOptions): Promise<void> {
  const { monitor, stdin, stdout, logger } = options;
  const width = () => (stdout instanceof WriteStream ? stdout.columns : 80);
  const terminal = stdin instanceof ReadStream && stdin.isTTY ? stdin : null;

  let refreshing = false;
  let stopped = false;

  function draw(snapshot: MonitorSnapshot | null): void {
    if (!snapshot || stopped) return;
    stdout.write(CLEAR + options.render(snapshot, width()));
  }

  async function tick(): Promise<void> {
    if (refreshing || stopped) return;
    refreshing = true;
    try {
      draw(await monitor.refresh());
    } catch (err) {
      // Keep the last frame on screen and try again next tick
      logger.error({ err }, "refresh failed");
    } finally {
      refreshing = false;
    }
  }

  return new Promise<void>((resolve) => {
    const timer = setInterval(() => void tick(), options.refreshIntervalMs);

    function stop(): void {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
      stdin.off("data", onData);
      process.off("SIGINT", stop);
      terminal?.setRawMode(false);
      stdin.pause();
      stdout.write(LEAVE_ALT_SCREEN);
      resolve();
    }

    function onData(chunk: Buffer | string): void {
      for (const action of keyActions(String(chunk))) {
        switch (action) {
          case "quit":
            stop();
            return;
          case "refresh":
            void tick();
            break;
          case "next":
            draw(monitor.selectNext());
            break;
          case "previous":
            draw(monitor.selectPrevious());
            break;
        }
      }
    }

    stdout.write(ENTER_ALT_SCREEN);
    terminal?.setRawMode(true);
    stdin.setEncoding("utf-8");
    stdin.on("data", onData);
    stdin.resume();
    process.once("SIGINT", stop);
    void tick();
  });
}
