import fs from "node:fs";
import path from "node:path";
import { SNAPSHOT_FILE_NAME } from "./constants";
import { isInstanceState } from "./lifecycle";
import type { StateCache } from "./state-cache";
import type { Instance, InstanceSnapshot, RegionSnapshot } from "./types";
import { isRecord } from "./utils";

const SNAPSHOT_VERSION = 1;

/**
 * Last known instances, written when a session ends so the next one has
 * something to show before its first fetch completes.
 */
export async function loadSnapshots(homeDir: string): Promise<RegionSnapshot[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(snapshotPath(homeDir), "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // A truncated cache file is replaced on the next save.
    return [];
  }
  if (!isRecord(parsed) || parsed.version !== SNAPSHOT_VERSION || !isRecord(parsed.regions)) {
    return [];
  }

  const snapshots: RegionSnapshot[] = [];
  for (const [region, value] of Object.entries(parsed.regions)) {
    if (!isRecord(value) || typeof value.asOf !== "number" || !Array.isArray(value.instances)) {
      continue;
    }
    const instances = value.instances.flatMap((item: unknown) => {
      const snapshot = parseInstanceSnapshot(region, item);
      return snapshot ? [snapshot] : [];
    });
    snapshots.push({ region, asOf: value.asOf, instances });
  }
  return snapshots;
}

/** Regions this cache never loaded keep whatever the file already had for them. */
export async function saveSnapshots(homeDir: string, cache: StateCache): Promise<void> {
  const regions: Record<string, { asOf: number; instances: InstanceSnapshot[] }> = {};
  const known = new Set(cache.knownRegions());
  for (const previous of await loadSnapshots(homeDir)) {
    if (!known.has(previous.region)) {
      regions[previous.region] = { asOf: previous.asOf, instances: previous.instances };
    }
  }

  const instances = cache.read();
  for (const region of known) {
    const asOf = cache.regionStatus(region).asOf;
    if (asOf === undefined) {
      continue;
    }
    regions[region] = {
      asOf,
      instances: instances.filter((instance) => instance.region === region).map(toSnapshot)
    };
  }

  await fs.promises.mkdir(homeDir, { recursive: true });
  const target = snapshotPath(homeDir);
  const temp = `${target}.tmp`;
  await fs.promises.writeFile(temp, `${JSON.stringify({ version: SNAPSHOT_VERSION, regions }, null, 2)}\n`, "utf8");
  await fs.promises.rename(temp, target);
}

export function seedCache(cache: StateCache, snapshots: RegionSnapshot[]): number {
  let seeded = 0;
  for (const snapshot of snapshots) {
    if (cache.seed(snapshot.region, snapshot.instances, snapshot.asOf)) {
      seeded += snapshot.instances.length;
    }
  }
  return seeded;
}

function toSnapshot(instance: Instance): InstanceSnapshot {
  return {
    id: instance.id,
    region: instance.region,
    name: instance.name,
    instanceType: instance.instanceType,
    publicIp: instance.publicIp,
    privateIp: instance.privateIp,
    state: instance.state,
    launchTime: instance.launchTime
  };
}

function parseInstanceSnapshot(region: string, value: unknown): InstanceSnapshot | null {
  if (!isRecord(value)) {
    return null;
  }
  const { id, name, instanceType, state } = value;
  if (typeof id !== "string" || typeof name !== "string" || typeof instanceType !== "string") {
    return null;
  }
  if (typeof state !== "string" || !isInstanceState(state)) {
    return null;
  }
  return {
    id,
    region,
    name,
    instanceType,
    publicIp: optionalString(value.publicIp),
    privateIp: optionalString(value.privateIp),
    state,
    launchTime: optionalString(value.launchTime)
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function snapshotPath(homeDir: string): string {
  return path.join(homeDir, SNAPSHOT_FILE_NAME);
}
