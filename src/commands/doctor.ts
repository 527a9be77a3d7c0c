import chalk from "chalk";
import { Command } from "commander";
import { resolveFleetConfig } from "../lib/config";
import { CLI_NAME } from "../lib/constants";
import { Ec2ComputeApi } from "../lib/ec2-api";
import { CliError } from "../lib/errors";
import { runPreflight, type PreflightReport } from "../lib/preflight";

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check Node.js, AWS credentials and region access")
    .action(async () => {
      const config = resolveFleetConfig();
      const api = new Ec2ComputeApi({ homeRegion: config.homeRegion });
      let report: PreflightReport;
      try {
        report = await runPreflight({ api, homeRegion: config.homeRegion });
      } finally {
        api.destroy();
      }
      const suggestedCommands = new Set<string>();

      for (const check of report.checks) {
        const symbol = check.ok ? chalk.green("✔") : chalk.red("✖");
        console.log(`${symbol} ${check.message}`);
        if (!check.ok && check.fix) {
          console.log(`  fix: ${check.fix}`);
        }
        if (!check.ok && check.suggestedCommands && check.suggestedCommands.length > 0) {
          for (const command of check.suggestedCommands) {
            console.log(`  please run: ${chalk.bold(command)}`);
            suggestedCommands.add(command);
          }
        }
      }

      if (!report.ok) {
        if (suggestedCommands.size > 0) {
          console.log("");
          console.log(chalk.yellow(`Action required: run the command(s) above, then re-run \`${CLI_NAME} doctor\`.`));
        }
        throw new CliError({ kind: "dependency", message: "Preflight failed." });
      }
    });
}
