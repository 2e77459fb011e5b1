/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Utility module exports for chanledger.
 */
export * from "./atomicWrite.js";
export * from "./debugFilter.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./m3u.js";
export * from "./morganStream.js";
export * from "./runContext.js";
export * from "./version.js";
