import type { DisplayState, Instance, InstanceAction, InstanceState, OptimisticTarget } from "./types";

export const INSTANCE_STATES: readonly InstanceState[] = [
  "pending",
  "running",
  "stopping",
  "stopped",
  "shutting-down",
  "terminated"
];

export const DISPLAY_STATES: readonly DisplayState[] = [...INSTANCE_STATES, "rebooting"];

// States a fresh snapshot may report that corroborate an overlay. Reboot has no
// observable end state, so its hint only ends by expiry.
const CONFIRMING_STATES: Record<OptimisticTarget, readonly InstanceState[]> = {
  pending: ["pending", "running"],
  stopping: ["stopping", "stopped"],
  rebooting: []
};

const STATE_SORT_PRIORITY: Record<DisplayState, number> = {
  running: 1,
  rebooting: 2,
  pending: 3,
  stopping: 4,
  stopped: 5,
  "shutting-down": 6,
  terminated: 7
};

export function isInstanceState(value: string): value is InstanceState {
  return (INSTANCE_STATES as readonly string[]).includes(value);
}

export function isDisplayState(value: string): value is DisplayState {
  return (DISPLAY_STATES as readonly string[]).includes(value);
}

export function confirmsOverlay(target: OptimisticTarget, fresh: InstanceState): boolean {
  return CONFIRMING_STATES[target].includes(fresh);
}

export function targetStateFor(action: InstanceAction): OptimisticTarget {
  switch (action) {
    case "start":
      return "pending";
    case "stop":
      return "stopping";
    case "reboot":
      return "rebooting";
  }
}

/** Returns null when the action is legal from the confirmed state, else the rejection reason. */
export function rejectionReason(action: InstanceAction, state: InstanceState): string | null {
  switch (action) {
    case "start":
      if (state === "stopped") {
        return null;
      }
      if (state === "running" || state === "pending") {
        return `already ${state}`;
      }
      return `cannot start a ${state} instance`;
    case "stop":
      if (state === "running" || state === "pending") {
        return null;
      }
      if (state === "stopped" || state === "stopping") {
        return `already ${state}`;
      }
      return `cannot stop a ${state} instance`;
    case "reboot":
      return state === "running" ? null : `cannot reboot a ${state} instance`;
  }
}

export function displayState(instance: Instance): DisplayState {
  return instance.optimistic?.targetState ?? instance.state;
}

export function stateSortPriority(state: DisplayState): number {
  return STATE_SORT_PRIORITY[state];
}
