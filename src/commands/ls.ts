import { Command } from "commander";
import { refreshWithSpinner, withCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import { DISPLAY_STATES, isDisplayState } from "../lib/lifecycle";
import type { StateCache } from "../lib/state-cache";
import { INSTANCE_HEADERS, instanceRow, renderTable } from "../lib/table";
import type { ReadFilter, SortColumn } from "../lib/types";

const SORT_COLUMNS: readonly SortColumn[] = ["region", "name", "id", "state", "type"];

export interface LsOptions {
  region?: string[];
  state?: string[];
  sort?: string;
  desc?: boolean;
}

export function registerLsCommand(program: Command): void {
  program
    .command("ls")
    .description("Refresh and list instances across regions")
    .option("-r, --region <code...>", "Only these regions")
    .option("-s, --state <state...>", `Only these states (${DISPLAY_STATES.join(", ")})`)
    .option("--sort <column>", `Sort by ${SORT_COLUMNS.join(", ")}`)
    .option("--desc", "Sort descending")
    .action(async (options: LsOptions, command: Command) => {
      const filter = parseListOptions(options);
      const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();

      await withCommandContext({ regions: options.region, verbose }, async (context) => {
        await refreshWithSpinner(context);
        const output = renderInstanceTable(context.session.cache, filter);
        console.log(output || "No instances found.");
      });
    });
}

export function parseListOptions(options: LsOptions): ReadFilter {
  const filter: ReadFilter = {
    regions: options.region,
    descending: options.desc === true
  };

  if (options.state) {
    filter.states = options.state.map((state) => {
      const normalized = state.trim().toLowerCase();
      if (!isDisplayState(normalized)) {
        throw new CliError({
          kind: "validation",
          message: `Unknown state '${state}'. Expected one of: ${DISPLAY_STATES.join(", ")}.`
        });
      }
      return normalized;
    });
  }

  if (options.sort !== undefined) {
    const column = SORT_COLUMNS.find((item) => item === options.sort?.trim().toLowerCase());
    if (!column) {
      throw new CliError({
        kind: "validation",
        message: `Unknown sort column '${options.sort}'. Expected one of: ${SORT_COLUMNS.join(", ")}.`
      });
    }
    filter.sortBy = column;
  }

  return filter;
}

export function renderInstanceTable(cache: StateCache, filter: ReadFilter): string {
  const rows = cache.read(filter).map((instance) => instanceRow(instance, cache.isStale(instance.region)));
  return renderTable(INSTANCE_HEADERS, rows);
}
