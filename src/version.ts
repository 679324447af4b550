import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

function readVersion(candidate: string): string | null {
  let pkg: unknown;
  try {
    pkg = require(candidate);
  } catch {
    return null;
  }
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return null;
}

// Sources sit one level below the package root, compiled output two.
export const VERSION = readVersion("../package.json") ?? readVersion("../../package.json") ?? "0.0.0";
