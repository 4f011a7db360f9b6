/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Utility module exports for icytune.
 */
export * from "./debugFilter.js";
export * from "./delay.js";
export * from "./errors.js";
export * from "./format.js";
export * from "./lockFile.js";
export * from "./logger.js";
export * from "./morganStream.js";
export * from "./shutdown.js";
export * from "./version.js";
