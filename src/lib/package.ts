import fs from "node:fs";
import path from "node:path";
import { isRecord } from "./utils";

interface PackageMeta {
  name?: string;
  version?: string;
}

/** Finds package.json from either the TypeScript sources or the compiled dist/src tree. */
export function readPackageMeta(): PackageMeta {
  const candidates = [
    path.resolve(__dirname, "../../package.json"),
    path.resolve(__dirname, "../../../package.json"),
    path.resolve(process.cwd(), "package.json")
  ];

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }

    try {
      const parsed = JSON.parse(fs.readFileSync(candidate, "utf8")) as unknown;
      if (isRecord(parsed)) {
        return {
          name: typeof parsed.name === "string" ? parsed.name : undefined,
          version: typeof parsed.version === "string" ? parsed.version : undefined
        };
      }
    } catch {
      continue;
    }
  }

  return {};
}
