import type { ComputeApi, RemoteInstanceRecord } from "./compute-api";
import { DEFAULT_FETCH_TIMEOUT_MS, NAME_TAG_KEY } from "./constants";
import { AuthError, RegionUnavailableError } from "./errors";
import { isInstanceState } from "./lifecycle";
import type { InstanceSnapshot, RegionSnapshot } from "./types";
import { withTimeout } from "./utils";

export interface InstanceFetcherOptions {
  timeoutMs?: number;
  now?: () => number;
}

export class InstanceFetcher {
  private readonly timeoutMs: number;
  private readonly now: () => number;
  // Drains that outlived their timeout; one region never has two at once.
  private readonly draining = new Map<string, Promise<void>>();

  constructor(private readonly api: ComputeApi, options: InstanceFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Drains every page for one region. The timeout covers the whole drain and
   * aborts it. While an earlier drain for the region is still settling, no new
   * describe call is made and the fetch fails at once.
   * AuthError passes through untouched; anything else becomes RegionUnavailableError.
   */
  async fetchInstances(region: string): Promise<RegionSnapshot> {
    try {
      if (this.draining.has(region)) {
        throw new Error("previous fetch is still in flight");
      }
      const records = await withTimeout(
        (signal) => this.trackDrain(region, signal),
        this.timeoutMs,
        `Describe instances in ${region}`
      );
      const instances = records.flatMap((record) => {
        const snapshot = toInstanceSnapshot(region, record);
        return snapshot ? [snapshot] : [];
      });
      return { region, instances, asOf: this.now() };
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      throw new RegionUnavailableError(region, error);
    }
  }

  private trackDrain(region: string, signal: AbortSignal): Promise<RemoteInstanceRecord[]> {
    const drain = this.drainPages(region, signal);
    const settled: Promise<void> = drain.then(
      () => undefined,
      () => undefined
    ).then(() => {
      if (this.draining.get(region) === settled) {
        this.draining.delete(region);
      }
    });
    this.draining.set(region, settled);
    return drain;
  }

  private async drainPages(region: string, signal: AbortSignal): Promise<RemoteInstanceRecord[]> {
    const records: RemoteInstanceRecord[] = [];
    const seenTokens = new Set<string>();
    let nextToken: string | undefined;

    do {
      signal.throwIfAborted();
      const page = await this.api.describeInstancesPage(region, nextToken, signal);
      records.push(...page.instances);
      nextToken = page.nextToken;
      if (nextToken) {
        if (seenTokens.has(nextToken)) {
          throw new Error(`Pagination loop detected (token ${nextToken} repeated)`);
        }
        seenTokens.add(nextToken);
      }
    } while (nextToken);

    return records;
  }
}

export function toInstanceSnapshot(region: string, record: RemoteInstanceRecord): InstanceSnapshot | null {
  const state = record.state ?? "";
  if (!isInstanceState(state)) {
    return null;
  }

  const nameTag = record.tags?.find((tag) => tag.key === NAME_TAG_KEY)?.value.trim();
  return {
    id: record.instanceId,
    region,
    name: nameTag || record.instanceId,
    instanceType: record.instanceType ?? "unknown",
    publicIp: record.publicIpAddress,
    privateIp: record.privateIpAddress,
    state,
    launchTime: record.launchTime?.toISOString()
  };
}
