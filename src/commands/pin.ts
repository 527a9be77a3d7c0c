import { Command } from "commander";
import { refreshWithSpinner, withCommandContext } from "../lib/command-context";

interface PinOptions {
  region?: string;
}

export function registerPinCommands(program: Command): void {
  for (const pinned of [true, false]) {
    const name = pinned ? "pin" : "unpin";
    program
      .command(`${name} <id>`)
      .description(pinned ? "Keep an instance at the top of listings" : "Remove an instance's pin")
      .option("-r, --region <code>", "Region of the instance")
      .action(async (id: string, options: PinOptions, command: Command) => {
        const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
        const regions = options.region ? [options.region] : undefined;

        await withCommandContext({ regions, verbose }, async (context) => {
          await refreshWithSpinner(context, `Looking up '${id}'...`);
          const instance = context.session.requireInstance(id, options.region);
          if (instance.pinned === pinned) {
            console.log(`Instance '${id}' is already ${pinned ? "pinned" : "unpinned"}.`);
            return;
          }
          await context.session.togglePin(instance.region, id);
          context.logger.success(`${pinned ? "Pinned" : "Unpinned"} '${id}'.`);
        });
      });
  }
}
