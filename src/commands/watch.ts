import { Command } from "commander";
import { runWatchSession, type WatchSessionOptions } from "../services/watch-session";

export function registerWatchCommand(program: Command): void {
  program
    .command("watch")
    .description("Keep a live instance table, refreshing on an interval")
    .option("-i, --interval <seconds>", "Seconds between refreshes")
    .option("--no-auto", "Only refresh on demand (press r)")
    .option("-r, --region <code...>", "Only these regions")
    .action(async (options: WatchSessionOptions, command: Command) => {
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
      await runWatchSession({ ...options, verbose });
    });
}
