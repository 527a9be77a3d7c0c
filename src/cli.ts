import chalk from "chalk";
import { Command } from "commander";
import { registerDoctorCommand } from "./commands/doctor";
import { registerInspectCommand } from "./commands/inspect";
import { registerLsCommand } from "./commands/ls";
import { registerPinCommands } from "./commands/pin";
import { registerPowerCommands } from "./commands/power";
import { registerRegionsCommand } from "./commands/regions";
import { registerWatchCommand } from "./commands/watch";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("Watch and control cloud instances across every region")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number")
  .option("--verbose", "Print debug output");

registerDoctorCommand(program);
registerRegionsCommand(program);
registerLsCommand(program);
registerWatchCommand(program);
registerPowerCommands(program);
registerInspectCommand(program);
registerPinCommands(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
