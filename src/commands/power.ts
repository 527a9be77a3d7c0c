import inquirer from "inquirer";
import ora from "ora";
import { Command } from "commander";
import { refreshWithSpinner, withCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import type { ActionOutcome, InstanceAction } from "../lib/types";

interface ActionOptions {
  region?: string;
  yes?: boolean;
}

const ACTION_DESCRIPTIONS: Record<InstanceAction, string> = {
  start: "Start a stopped instance",
  stop: "Stop a running instance",
  reboot: "Reboot a running instance"
};

const NEEDS_CONFIRMATION: Record<InstanceAction, boolean> = {
  start: false,
  stop: true,
  reboot: true
};

export function registerPowerCommands(program: Command): void {
  for (const action of ["start", "stop", "reboot"] as const) {
    program
      .command(`${action} <id>`)
      .description(ACTION_DESCRIPTIONS[action])
      .option("-r, --region <code>", "Region of the instance")
      .option("-y, --yes", "Skip interactive confirmation")
      .action(async (id: string, options: ActionOptions, command: Command) => {
        const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
        await runAction(action, id, options, verbose);
      });
  }
}

async function runAction(action: InstanceAction, id: string, options: ActionOptions, verbose?: boolean): Promise<void> {
  const regions = options.region ? [options.region] : undefined;
  await withCommandContext({ regions, verbose }, async (context) => {
    await refreshWithSpinner(context, `Looking up '${id}'...`);
    const instance = context.session.requireInstance(id, options.region);

    if (NEEDS_CONFIRMATION[action] && !options.yes) {
      if (!process.stdout.isTTY) {
        throw new CliError({
          kind: "validation",
          message: `Confirmation to ${action} '${id}' requires a TTY.`,
          hint: "Re-run with --yes."
        });
      }

      const confirm = await inquirer.prompt<{ proceed: boolean }>([
        {
          type: "confirm",
          name: "proceed",
          message: `${capitalize(action)} '${instance.name}' (${id}) in ${instance.region}?`,
          default: false
        }
      ]);
      if (!confirm.proceed) {
        console.log("Cancelled.");
        return;
      }
    }

    const spinner = ora(`Requesting ${action} of '${id}'...`).start();
    let outcome: ActionOutcome;
    try {
      outcome = await context.session.requestAction(instance.region, id, action);
    } catch (error) {
      spinner.fail(`${capitalize(action)} failed.`);
      throw error;
    }

    if (outcome.status === "rejected") {
      spinner.stop();
      throw new CliError({
        kind: "validation",
        message: `Cannot ${action} '${id}': ${outcome.reason}.`
      });
    }
    spinner.succeed(`${capitalize(action)} accepted for '${id}'; now ${outcome.targetState}.`);
  });
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
