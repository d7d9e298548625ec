import { Command, Option } from "clipanion";
import { ZodError } from "zod";
import { loadConfig, type ConfigOverrides, type MonitorConfig } from "../../config";
import { createLogger, type Logger } from "../../logging/logger";
import { createMonitor } from "../../monitor";
import { createPlanUsagePoller, fetchPlanUsage, type PlanUsageResult } from "../../plan";
import { renderDashboard, renderSnapshot } from "../../render";
import { collectSessions, defaultDataDirCandidates, findDataDir } from "../../scanner";
import { summarizeUsage } from "../../usage";
import { runLiveView } from "../live-view";

type PlanFetch = () => Promise<PlanUsageResult>;

export function describeConfigError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

export class MonitorCommand extends Command {
  static override paths = [Command.Default];

  static override usage = Command.Usage({
    description: "Monitor token usage, cost and context fill of local assistant sessions",
    details: `
      Reads the session logs under \`<claude-dir>/projects\` and shows per-session
      and overall token usage with estimated cost. Without \`--snapshot\` a live
      dashboard redraws every refresh interval; press \`j\`/\`k\` to change the
      selected session, \`r\` to refresh and \`q\` to quit.
    `,
    examples: [
      ["Open the live dashboard", "tokentally"],
      ["Print a one-time usage snapshot", "tokentally --snapshot"],
      ["Use another data directory and refresh every 5 seconds", "tokentally --claude-dir ~/work/.claude --refresh 5"],
    ],
  });

  claudeDir = Option.String("--claude-dir", {
    description: "Data directory holding projects/ (default: first of ~/.config/claude, /root/.claude, ~/.claude)",
  });

  refresh = Option.String("--refresh", {
    description: "Refresh interval in seconds (default: 2)",
  });

  snapshot = Option.Boolean("--snapshot", false, {
    description: "Print a one-time usage snapshot and exit",
  });

  plan = Option.Boolean("--plan", true, {
    description: "Query subscription plan usage (--no-plan to skip)",
  });

  async execute(): Promise<number> {
    let config: MonitorConfig;
    try {
      config = loadConfig(this.context.env, this.overrides());
    } catch (err) {
      this.context.stderr.write(`Invalid configuration: ${describeConfigError(err)}\n`);
      return 1;
    }

    const logger = createLogger(config.logging);
    const dataDir = config.dataDir ?? findDataDir(defaultDataDirCandidates());
    logger.debug({ dataDir }, "using data directory");

    const fetchPlan: PlanFetch | null = this.plan
      ? () =>
          fetchPlanUsage({
            credentials: config.credentials,
            baseUrl: config.baseUrl,
            timeoutMs: config.requestTimeoutMs,
            logger,
          })
      : null;

    if (this.snapshot) {
      return this.printSnapshot(dataDir, fetchPlan);
    }
    return this.runLive(config, dataDir, fetchPlan, logger);
  }

  private overrides(): ConfigOverrides {
    return {
      dataDir: this.claudeDir,
      // NaN and non-positive values are rejected by the config schema
      refreshIntervalMs: this.refresh === undefined ? undefined : Math.round(Number(this.refresh) * 1000),
    };
  }

  private async printSnapshot(dataDir: string, fetchPlan: PlanFetch | null): Promise<number> {
    const now = Date.now();
    const sessions = await collectSessions(dataDir);
    const plan = fetchPlan ? await fetchPlan() : null;

    this.context.stdout.write(
      renderSnapshot({ sessions, summary: summarizeUsage(sessions, now), plan, now }),
    );
    return 0;
  }

  private async runLive(
    config: MonitorConfig,
    dataDir: string,
    fetchPlan: PlanFetch | null,
    logger: Logger,
  ): Promise<number> {
    const monitor = createMonitor({
      dataDir,
      planPoller: fetchPlan ? createPlanUsagePoller({ fetch: fetchPlan, logger }) : undefined,
      planRefreshIntervalMs: config.planRefreshIntervalMs,
      rateLimits: config.rateLimits,
      logger,
    });

    await runLiveView({
      monitor,
      stdin: this.context.stdin,
      stdout: this.context.stdout,
      refreshIntervalMs: config.refreshIntervalMs,
      logger,
      render: (snapshot, width) =>
        renderDashboard(snapshot, {
          width,
          refreshIntervalMs: config.refreshIntervalMs,
          rateLimits: config.rateLimits,
        }),
    });
    return 0;
  }
}
