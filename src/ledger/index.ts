/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Channel ledger exports.
 */
export * from "./allocator.js";
export * from "./events.js";
export * from "./integrator.js";
export * from "./pipeline.js";
export * from "./store.js";
