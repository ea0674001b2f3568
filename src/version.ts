import { readFileSync } from "node:fs";

function readVersionFromPackageJson(): string | null {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
    return null;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

// Single source of truth for the current version.
// - Bundled builds: env var.
// - Dev/npm builds: package.json (one level above src/ and dist/).
export const VERSION = process.env.INFRAGRAPH_VERSION || readVersionFromPackageJson() || "0.0.0";
