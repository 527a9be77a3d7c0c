import type { StatusChecks } from "./types";

export interface RemoteRegion {
  code: string;
}

export interface RemoteTag {
  key: string;
  value: string;
}

/** One instance record as the remote describe call reports it. */
export interface RemoteInstanceRecord {
  instanceId: string;
  instanceType?: string;
  state?: string;
  tags?: RemoteTag[];
  publicIpAddress?: string;
  privateIpAddress?: string;
  launchTime?: Date;
}

export interface RemoteInstancePage {
  instances: RemoteInstanceRecord[];
  nextToken?: string;
}

/**
 * The remote compute-management contract. Start, stop and reboot resolve when
 * the request is accepted; the state change itself is only visible through
 * later describe calls.
 */
export interface ComputeApi {
  listRegions(): Promise<RemoteRegion[]>;
  /** Should stop work and reject once `signal` aborts. */
  describeInstancesPage(region: string, nextToken?: string, signal?: AbortSignal): Promise<RemoteInstancePage>;
  startInstance(region: string, instanceId: string): Promise<void>;
  stopInstance(region: string, instanceId: string): Promise<void>;
  rebootInstance(region: string, instanceId: string): Promise<void>;
  describeInstanceStatus(region: string, instanceId: string): Promise<StatusChecks>;
}
