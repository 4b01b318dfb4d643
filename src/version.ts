import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    const pkg: unknown = require("../package.json");
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

// Version of the azdo-access package; AZDO_ACCESS_VERSION overrides it in
// bundled builds that ship without package.json.
export const VERSION = process.env.AZDO_ACCESS_VERSION || readVersionFromPackageJson() || "0.0.0";
