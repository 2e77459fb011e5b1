/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * runContext.ts: AsyncLocalStorage-based run context for automatic log correlation.
 */
import { AsyncLocalStorage } from "async_hooks";

/* Every assignment run, whether started from the command line or by a POST to the server, executes inside a run context. Log statements anywhere in the call chain
 * pick up the run ID from here and prefix it, so the lines of two runs in the same log file can be told apart without threading an ID through every function.
 *
 * AsyncLocalStorage context is lost in timer callbacks. Anything scheduled from within a run must call runWithRunContext() again if it logs.
 */

/**
 * Metadata for the current assignment run.
 */
export interface RunContext {

  // Unique run identifier used for log correlation (e.g., "run-3").
  runId: string;

  // Where the discovered channels came from: a file path, or "http" for server requests.
  source?: string;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

// Monotonic counter for run IDs within this process.
let runCounter = 0;

/**
 * Generates the next run ID.
 * @returns A run ID of the form "run-N".
 */
export function nextRunId(): string {

  return "run-" + String(++runCounter);
}

/**
 * Runs a function within a run context. Everything the function awaits sees the context through getRunContext() and getRunId().
 * @param context - The run context.
 * @param fn - The async function to run.
 * @returns The result of the function.
 */
export async function runWithRunContext<T>(context: RunContext, fn: () => Promise<T>): Promise<T> {

  return runContextStorage.run(context, fn);
}

/**
 * Retrieves the full run context for the current async operation.
 * @returns The run context, or undefined outside of a run.
 */
export function getRunContext(): RunContext | undefined {

  return runContextStorage.getStore();
}

/**
 * Retrieves the run ID for the current async operation.
 * @returns The run ID, or undefined outside of a run.
 */
export function getRunId(): string | undefined {

  return runContextStorage.getStore()?.runId;
}
