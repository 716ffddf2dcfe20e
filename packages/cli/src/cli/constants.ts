/**
 * CLI constants
 */

import { readFileSync } from "node:fs";

const readPackageVersion = (): string => {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
  );
  return typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";
};

export const VERSION = readPackageVersion();
