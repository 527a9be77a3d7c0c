import ora from "ora";
import { Command } from "commander";
import { withCommandContext } from "../lib/command-context";
import { renderTable } from "../lib/table";
import type { Region } from "../lib/types";

export function registerRegionsCommand(program: Command): void {
  program
    .command("regions")
    .description("List the regions the account can see")
    .action(async (_options: unknown, command: Command) => {
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();

      await withCommandContext({ verbose }, async (context) => {
        const spinner = ora("Listing regions...").start();
        let regions: Region[];
        try {
          regions = await context.session.regions();
          spinner.stop();
        } catch (error) {
          spinner.fail("Could not list regions.");
          throw error;
        }

        if (regions.length === 0) {
          console.log("No regions available.");
          return;
        }
        const rows = regions.map((region) => [region.code, region.displayName, region.enabled ? "yes" : "no"]);
        console.log(renderTable(["CODE", "NAME", "ENABLED"], rows));
      });
    });
}
