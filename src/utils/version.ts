/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup for icytune.
 */
import type { Nullable } from "../types/index.js";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

// Cached package version.
let cachedPackageVersion: Nullable<string> = null;

/**
 * Gets the current package version from package.json. This file lives in src/utils/ or dist/utils/, two levels below the package root.
 * @returns The current version string (e.g., "1.0.0"), or "0.0.0" when package.json cannot be read.
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    const packageJson: unknown = JSON.parse(readFileSync(resolve(__dirname, "../../package.json"), "utf-8"));

    if((typeof packageJson === "object") && (packageJson !== null) && ("version" in packageJson) && (typeof packageJson.version === "string")) {

      cachedPackageVersion = packageJson.version;

      return cachedPackageVersion;
    }
  } catch {

    // Fall through to the placeholder version.
  }

  return "0.0.0";
}
