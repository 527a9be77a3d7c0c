import readline from "node:readline";
import chalk from "chalk";
import { renderInstanceTable } from "../commands/ls";
import { resolveFleetConfig } from "../lib/config";
import { AuthError, describeError } from "../lib/errors";
import type { FleetEvent } from "../lib/events";
import { createLogger, type Logger, type LogLevel } from "../lib/logger";
import { formatAge } from "../lib/utils";
import { FleetSession } from "./fleet-session";

export interface WatchSessionOptions {
  interval?: string;
  auto?: boolean;
  region?: string[];
  verbose?: boolean;
}

export interface WatchEventLine {
  level: LogLevel;
  message: string;
}

// Events that change what the table shows.
const RENDER_EVENTS = new Set<FleetEvent["type"]>([
  "region-merged",
  "region-seeded",
  "optimistic-applied",
  "pin-changed",
  "scan-completed",
  "halted"
]);

export async function runWatchSession(options: WatchSessionOptions): Promise<void> {
  const config = resolveFleetConfig({
    intervalSeconds: options.interval,
    regions: options.region,
    verbose: options.verbose
  });
  const logger = createLogger({ debug: config.debug });
  const session = new FleetSession({ config, logger });
  await session.init();

  const controller = new AbortController();
  const halt: { reason?: string } = {};
  const notices: string[] = [];

  const render = () => {
    if (process.stdout.isTTY) {
      console.clear();
    }
    console.log(renderInstanceTable(session.cache, {}) || "No instances yet.");
    console.log("");
    console.log(chalk.dim(statusLine(session, config.refreshIntervalMs)));
    for (const notice of notices.slice(-5)) {
      console.log(notice);
    }
  };

  const consume = (async () => {
    for await (const event of session.changes(controller.signal)) {
      const line = formatWatchEvent(event);
      if (line) {
        logEventLine(logger, line, notices);
      }
      if (event.type === "halted") {
        halt.reason = event.reason;
        controller.abort();
      }
      if (RENDER_EVENTS.has(event.type)) {
        render();
      }
    }
  })();

  render();
  if (options.auto !== false) {
    session.setAutoRefresh(true);
  }
  refreshInBackground(session, logger);
  const detachKeys = bindKeys(session, logger, controller);

  try {
    await waitForShutdown(controller.signal);
  } finally {
    controller.abort();
    detachKeys();
    await consume;
    await session.teardown();
  }

  if (halt.reason !== undefined) {
    throw new AuthError(halt.reason);
  }
}

export function formatWatchEvent(event: FleetEvent): WatchEventLine | null {
  switch (event.type) {
    case "region-unavailable":
      return { level: "warn", message: `${event.region}: ${event.reason}` };
    case "scan-failed":
      return { level: "warn", message: `Refresh failed: ${event.reason}` };
    case "halted":
      return { level: "error", message: `Refreshing stopped: ${event.reason}` };
    case "tick-skipped":
      return { level: "debug", message: `Tick skipped at ${event.tick}: previous refresh still running.` };
    case "region-merged": {
      const changes = [
        event.added.length > 0 ? `+${event.added.length}` : "",
        event.evicted.length > 0 ? `-${event.evicted.length}` : "",
        event.reverted.length > 0 ? `${event.reverted.length} reverted` : ""
      ].filter(Boolean);
      return changes.length > 0 ? { level: "debug", message: `${event.region}: ${changes.join(", ")}` } : null;
    }
    case "optimistic-applied":
      return { level: "info", message: `${event.id}: ${event.targetState} requested.` };
    default:
      return null;
  }
}

function logEventLine(logger: Logger, line: WatchEventLine, notices: string[]): void {
  if (line.level === "debug") {
    logger.debug(line.message);
    return;
  }
  // Warnings and errors are kept so they survive the next redraw.
  if (line.level === "warn") {
    notices.push(chalk.yellow(line.message));
  } else if (line.level === "error") {
    notices.push(chalk.red(line.message));
  } else {
    notices.push(line.message);
  }
}

function statusLine(session: FleetSession, intervalMs: number): string {
  const ages = session.cache
    .knownRegions()
    .map((region) => session.regionStatus(region).asOf)
    .filter((asOf): asOf is number => asOf !== undefined);
  const newest = ages.length > 0 ? Math.max(...ages) : undefined;
  const stale = session.cache.knownRegions().filter((region) => session.isStale(region));
  const parts = [
    `refresh: ${session.schedulerState === "scanning" ? `every ${Math.round(intervalMs / 1000)}s` : session.schedulerState}`,
    `updated ${formatAge(newest)}`,
    stale.length > 0 ? `stale: ${stale.join(", ")}` : "",
    process.stdin.isTTY ? "keys: r refresh, a auto on/off, q quit" : "Ctrl+C to quit"
  ];
  return parts.filter(Boolean).join(" | ");
}

function refreshInBackground(session: FleetSession, logger: Logger): void {
  session.manualRefresh().catch((error: unknown) => {
    logger.error(`Refresh failed: ${describeError(error)}`);
  });
}

function bindKeys(session: FleetSession, logger: Logger, controller: AbortController): () => void {
  const input = process.stdin;
  if (!input.isTTY) {
    return () => undefined;
  }

  readline.emitKeypressEvents(input);
  input.setRawMode(true);
  input.resume();

  const onKeypress = (_text: string | undefined, key: readline.Key | undefined) => {
    if (!key) {
      return;
    }
    if (key.name === "q" || (key.ctrl && key.name === "c")) {
      controller.abort();
    } else if (key.name === "r") {
      refreshInBackground(session, logger);
    } else if (key.name === "a") {
      const enable = session.schedulerState !== "scanning";
      session.setAutoRefresh(enable);
      logger.info(enable ? "Auto refresh on." : "Auto refresh paused.");
    }
  };
  input.on("keypress", onKeypress);

  return () => {
    input.off("keypress", onKeypress);
    input.setRawMode(false);
    input.pause();
  };
}

async function waitForShutdown(signal: AbortSignal): Promise<void> {
  await new Promise<void>((resolve) => {
    const finish = () => {
      process.off("SIGINT", finish);
      process.off("SIGTERM", finish);
      signal.removeEventListener("abort", finish);
      resolve();
    };

    process.on("SIGINT", finish);
    process.on("SIGTERM", finish);
    if (signal.aborted) {
      finish();
    } else {
      signal.addEventListener("abort", finish);
    }
  });
}
