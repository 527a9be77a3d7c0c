import { Command } from "commander";
import { refreshWithSpinner, withCommandContext } from "../lib/command-context";
import { NetworkError } from "../lib/errors";
import { displayState } from "../lib/lifecycle";
import { colorState } from "../lib/table";
import type { Instance, StatusChecks } from "../lib/types";
import { formatAge } from "../lib/utils";

interface InspectOptions {
  region?: string;
}

export function registerInspectCommand(program: Command): void {
  program
    .command("inspect <id>")
    .description("Show detailed info and status checks for an instance")
    .option("-r, --region <code>", "Region of the instance")
    .action(async (id: string, options: InspectOptions, command: Command) => {
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
      const regions = options.region ? [options.region] : undefined;

      await withCommandContext({ regions, verbose }, async (context) => {
        await refreshWithSpinner(context, `Looking up '${id}'...`);
        const instance = context.session.requireInstance(id, options.region);

        let checks: StatusChecks | undefined;
        try {
          checks = await context.session.describeStatus(instance.region, instance.id);
        } catch (error) {
          if (!(error instanceof NetworkError)) {
            throw error;
          }
          context.logger.warn(`Status checks unavailable: ${error.message}`);
        }

        for (const line of describeInstance(instance, checks, context.session.isStale(instance.region))) {
          console.log(line);
        }
      });
    });
}

export function describeInstance(instance: Instance, checks: StatusChecks | undefined, stale: boolean, now = Date.now()): string[] {
  const state = displayState(instance);
  const lines = [
    `id: ${instance.id}`,
    `name: ${instance.name}`,
    `region: ${instance.region}`,
    `type: ${instance.instanceType}`,
    `state: ${colorState(state)(state)}${instance.optimistic ? ` (requested; confirmed ${instance.state})` : ""}`,
    `public ip: ${instance.publicIp ?? "-"}`,
    `private ip: ${instance.privateIp ?? "-"}`,
    `launched: ${instance.launchTime ?? "-"}`,
    `uptime: ${computeUptime(instance.launchTime, instance.state, now)}`,
    `pinned: ${instance.pinned ? "yes" : "no"}`,
    `last confirmed: ${formatAge(instance.lastConfirmed, now)}${stale ? " (stale)" : ""}`
  ];
  if (checks) {
    lines.push(`system status: ${checks.systemStatus}`, `instance status: ${checks.instanceStatus}`);
  }
  return lines;
}

function computeUptime(launchTime: string | undefined, state: string, now: number): string {
  if (!launchTime || state !== "running") {
    return "-";
  }
  const started = Date.parse(launchTime);
  if (Number.isNaN(started)) {
    return "-";
  }

  const seconds = Math.max(0, Math.floor((now - started) / 1000));
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (days > 0) {
    return `${days}d ${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}
