import fs from "node:fs";
import path from "node:path";
import { PREFERENCES_FILE_NAME } from "./constants";
import { isRecord } from "./utils";

interface PreferenceFile {
  pinnedInstances?: string[];
}

export async function readPinnedKeys(homeDir: string): Promise<string[]> {
  const file = await readPreferenceFile(homeDir);
  return file.pinnedInstances ?? [];
}

export async function writePinnedKeys(homeDir: string, keys: Iterable<string>): Promise<void> {
  const file = await readPreferenceFile(homeDir);
  const pinnedInstances = [...new Set(keys)].sort();
  await writePreferenceFile(homeDir, { ...file, pinnedInstances });
}

async function readPreferenceFile(homeDir: string): Promise<PreferenceFile> {
  try {
    const raw = await fs.promises.readFile(preferencesPath(homeDir), "utf8");
    const parsed = JSON.parse(raw) as unknown;
    if (!isRecord(parsed)) {
      return {};
    }

    const rawPinned = parsed.pinnedInstances;
    if (!Array.isArray(rawPinned)) {
      return {};
    }

    return {
      pinnedInstances: rawPinned.filter((value): value is string => typeof value === "string")
    };
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || error instanceof SyntaxError) {
      return {};
    }
    throw error;
  }
}

async function writePreferenceFile(homeDir: string, file: PreferenceFile): Promise<void> {
  await fs.promises.mkdir(homeDir, { recursive: true });
  await fs.promises.writeFile(preferencesPath(homeDir), `${JSON.stringify(file, null, 2)}\n`, "utf8");
}

function preferencesPath(homeDir: string): string {
  return path.join(homeDir, PREFERENCES_FILE_NAME);
}
