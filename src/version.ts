import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";

// Sources sit one level below package.json; compiled output (dist/src) two.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    if (!existsSync(fileURLToPath(new URL(candidate, import.meta.url)))) continue;
    const pkg: unknown = require(candidate);
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return null;
}

// ECONOMIZER_VERSION overrides for bundled builds.
export const VERSION = process.env.ECONOMIZER_VERSION || readVersionFromPackageJson() || "0.0.0";
