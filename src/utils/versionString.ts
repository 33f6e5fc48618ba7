import * as fs from "node:fs";
import * as path from "node:path";

export type PackageInfoLike = {
  name?: unknown;
  version?: unknown;
};

// Version tag is like:
// - v1.2.0
// - unknown
export function getVersionTag(info: PackageInfoLike): string {
  if (typeof info.version !== "string" || info.version.length === 0) return "unknown";
  return `v${info.version}`;
}

// package.json sits two levels above both src/utils and dist/utils.
export function readPackageInfo(): PackageInfoLike {
  const packagePath = path.resolve(__dirname, "..", "..", "package.json");
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (parsed !== null && typeof parsed === "object") {
      return parsed;
    }
  } catch {
    return {};
  }
  return {};
}
