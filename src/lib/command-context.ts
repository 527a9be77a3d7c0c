import ora from "ora";
import { FleetSession } from "../services/fleet-session";
import { resolveFleetConfig, type ConfigOverrides, type FleetConfig } from "./config";
import { AuthError } from "./errors";
import { createLogger, type Logger } from "./logger";
import type { ScanReport } from "./types";

export interface CommandContext {
  config: FleetConfig;
  logger: Logger;
  session: FleetSession;
}

/** Opens a session for one command and always tears it down afterwards. */
export async function withCommandContext<T>(
  overrides: ConfigOverrides,
  run: (context: CommandContext) => Promise<T>
): Promise<T> {
  const config = resolveFleetConfig(overrides);
  const logger = createLogger({ debug: config.debug });
  const session = new FleetSession({ config, logger });
  await session.init();
  try {
    return await run({ config, logger, session });
  } finally {
    await session.teardown();
  }
}

/** One refresh with a spinner; per-region failures are reported as warnings. */
export async function refreshWithSpinner(context: CommandContext, label = "Refreshing instances..."): Promise<ScanReport> {
  const spinner = ora(label).start();
  let report: ScanReport;
  try {
    report = await context.session.manualRefresh();
  } catch (error) {
    spinner.fail("Refresh failed.");
    throw error;
  }

  if (report.catalogError) {
    spinner.fail("Could not list regions.");
  } else if (report.failed.length > 0) {
    spinner.warn(`Refreshed ${report.refreshed.length} region(s); ${report.failed.length} failed.`);
  } else {
    spinner.succeed(`Refreshed ${report.refreshed.length} region(s).`);
  }

  if (report.halted) {
    throw new AuthError(report.haltReason ?? "Credentials were rejected.");
  }
  for (const failure of report.failed) {
    context.logger.warn(`${failure.region}: ${failure.reason}`);
  }
  if (report.catalogError) {
    context.logger.warn(report.catalogError);
  }
  return report;
}
