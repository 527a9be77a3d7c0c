import fs from "node:fs";
import path from "node:path";
import type { ComputeApi } from "./compute-api";
import type { Region } from "./types";
import { isRecord } from "./utils";

export interface RegionCatalogOptions {
  /** When non-empty, every region outside this list starts disabled. */
  restrictTo?: string[];
  displayNames?: Record<string, string>;
}

/**
 * Session-wide region list. The first `listRegions()` goes to the remote API;
 * later calls reuse the result until `invalidate()`.
 */
export class RegionCatalog {
  private cached: Region[] | null = null;
  private pending: Promise<Region[]> | null = null;
  // Bumped by invalidate(); a listing started before the bump is not cached.
  private generation = 0;
  private readonly restrictTo: Set<string>;
  private readonly displayNames: Record<string, string>;
  // Survives invalidate() so toggles are not lost on re-listing.
  private readonly enabledOverrides = new Map<string, boolean>();

  constructor(private readonly api: ComputeApi, options: RegionCatalogOptions = {}) {
    this.restrictTo = new Set(options.restrictTo ?? []);
    this.displayNames = options.displayNames ?? loadRegionDisplayNames();
  }

  async listRegions(): Promise<Region[]> {
    if (this.cached) {
      return this.snapshot(this.cached);
    }
    if (!this.pending) {
      const pending = this.fetchRegions(this.generation).finally(() => {
        if (this.pending === pending) {
          this.pending = null;
        }
      });
      this.pending = pending;
    }
    return this.snapshot(await this.pending);
  }

  async enabledRegions(): Promise<Region[]> {
    const regions = await this.listRegions();
    return regions.filter((region) => region.enabled);
  }

  cachedRegions(): Region[] | null {
    return this.cached ? this.snapshot(this.cached) : null;
  }

  invalidate(): void {
    this.generation += 1;
    this.cached = null;
    this.pending = null;
  }

  setEnabled(code: string, enabled: boolean): boolean {
    this.enabledOverrides.set(code, enabled);
    const region = this.cached?.find((item) => item.code === code);
    if (!region) {
      return false;
    }
    region.enabled = enabled;
    return true;
  }

  private async fetchRegions(generation: number): Promise<Region[]> {
    const remote = await this.api.listRegions();
    const regions = remote
      .map((item) => ({
        code: item.code,
        displayName: this.displayNames[item.code] ?? item.code,
        enabled: this.enabledOverrides.get(item.code) ?? (this.restrictTo.size === 0 || this.restrictTo.has(item.code))
      }))
      .sort((a, b) => a.code.localeCompare(b.code));
    if (generation === this.generation) {
      this.cached = regions;
    }
    return regions;
  }

  private snapshot(regions: Region[]): Region[] {
    return regions.map((region) => ({ ...region }));
  }
}

export function loadRegionDisplayNames(): Record<string, string> {
  const candidates = [
    path.resolve(__dirname, "../../data/region-names.json"),
    path.resolve(__dirname, "../../../data/region-names.json"),
    path.resolve(process.cwd(), "data/region-names.json")
  ];

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const parsed = JSON.parse(fs.readFileSync(candidate, "utf8")) as unknown;
    if (!isRecord(parsed)) {
      continue;
    }
    const names: Record<string, string> = {};
    for (const [code, name] of Object.entries(parsed)) {
      if (typeof name === "string") {
        names[code] = name;
      }
    }
    return names;
  }

  return {};
}
