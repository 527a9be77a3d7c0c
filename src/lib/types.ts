export type InstanceState =
  | "pending"
  | "running"
  | "stopping"
  | "stopped"
  | "shutting-down"
  | "terminated";

export type InstanceAction = "start" | "stop" | "reboot";

// "rebooting" never appears as a confirmed state; it only exists as a hint.
export type OptimisticTarget = "pending" | "stopping" | "rebooting";

export type DisplayState = InstanceState | "rebooting";

export interface Region {
  code: string;
  displayName: string;
  enabled: boolean;
}

export interface OptimisticOverlay {
  targetState: OptimisticTarget;
  issuedAtTick: number;
  expiresAfterTicks: number;
}

export interface Instance {
  id: string;
  region: string;
  name: string;
  instanceType: string;
  publicIp?: string;
  privateIp?: string;
  state: InstanceState;
  pinned: boolean;
  lastConfirmed: number;
  optimistic?: OptimisticOverlay;
  launchTime?: string;
  missedFetches: number;
}

/** What a fetch reports for one instance, before the cache adds local fields. */
export interface InstanceSnapshot {
  id: string;
  region: string;
  name: string;
  instanceType: string;
  publicIp?: string;
  privateIp?: string;
  state: InstanceState;
  launchTime?: string;
}

export interface RegionSnapshot {
  region: string;
  instances: InstanceSnapshot[];
  asOf: number;
}

export type SortColumn = "region" | "name" | "id" | "state" | "type";

export interface ReadFilter {
  regions?: string[];
  states?: DisplayState[];
  sortBy?: SortColumn;
  descending?: boolean;
}

export type ActionOutcome =
  | { status: "accepted"; targetState: OptimisticTarget }
  | { status: "rejected"; reason: string };

export interface RegionStatus {
  region: string;
  asOf?: number;
  lastFetchFailed: boolean;
  lastError?: string;
  instanceCount: number;
}

export interface StatusChecks {
  instanceState: string;
  systemStatus: string;
  instanceStatus: string;
}

export type SchedulerState = "idle" | "scanning" | "paused" | "halted";

export interface RegionFailure {
  region: string;
  reason: string;
}

export interface ScanReport {
  tick: number;
  refreshed: string[];
  failed: RegionFailure[];
  halted: boolean;
  /** The credential failure that halted refreshing. */
  haltReason?: string;
  catalogError?: string;
}
