import chalk from "chalk";
import { displayState } from "./lifecycle";
import type { DisplayState, Instance } from "./types";

export const INSTANCE_HEADERS = ["", "REGION", "ID", "NAME", "TYPE", "STATE", "PUBLIC IP", "PRIVATE IP"];

export function renderTable(headers: string[], rows: string[][]): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => (row[idx] ?? "").length);
    return Math.max(header.length, ...cellLengths);
  });

  const headerLine = headers.map((header, idx) => header.padEnd(widths[idx])).join("  ");
  const divider = widths.map((width) => "-".repeat(width)).join("  ");
  const body = rows
    .map((row) => row.map((cell, idx) => (cell ?? "").padEnd(widths[idx])).join("  "))
    .join("\n");

  return `${headerLine}\n${divider}\n${body}`.replace(/ +$/gm, "");
}

/**
 * Plain cells for one instance. An in-flight action shows as `<target>*` and
 * rows from a stale region get a trailing `?` on the state.
 */
export function instanceRow(instance: Instance, stale: boolean): string[] {
  const state = displayState(instance);
  const marker = instance.optimistic ? "*" : "";
  return [
    instance.pinned ? "pin" : "",
    instance.region,
    instance.id,
    instance.name,
    instance.instanceType,
    `${state}${marker}${stale ? "?" : ""}`,
    instance.publicIp ?? "-",
    instance.privateIp ?? "-"
  ];
}

export function colorState(state: DisplayState): (text: string) => string {
  switch (state) {
    case "running":
      return chalk.green;
    case "stopped":
    case "terminated":
      return chalk.red;
    case "pending":
    case "stopping":
    case "rebooting":
    case "shutting-down":
      return chalk.yellow;
  }
}
