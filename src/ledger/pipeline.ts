/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pipeline.ts: One complete pass from discovered channels to a saved map and fresh playlists.
 */
import type { AssignmentEvent, Config, DiscoveredChannel, LedgerContext, PlaylistRecord } from "../types/index.js";
import { LOG, nextRunId, runWithRunContext } from "../utils/index.js";
import { type AssignmentResult, runAssignment } from "./integrator.js";
import { getChannelMapFilePath, getPlaylistOutput } from "../config/paths.js";
import { FileMappingStore } from "./store.js";
import { writePlaylists } from "../playlist/index.js";

/**
 * Builds the ledger context for a configuration: a file store at the configured map path, the allocation floor and the resolved playlist settings.
 * @param config - The merged configuration.
 * @returns The context.
 */
export function createLedgerContext(config: Config): LedgerContext {

  return { firstNumber: config.ledger.firstNumber, playlist: getPlaylistOutput(config), store: new FileMappingStore(getChannelMapFilePath(config)) };
}

/**
 * Outcome of a discovery pass.
 */
export interface DiscoveryRunResult extends AssignmentResult {

  // Playlist records written, or null when playlists are disabled.
  playlist: PlaylistRecord[] | null;

  // The run ID used in log lines.
  runId: string;
}

/**
 * Assigns numbers to a scrape's channels and writes the playlists. The pass runs in its own run context, so every log line it produces carries the run ID.
 * @param discovered - Discovered channels, in discovery order.
 * @param context - The store and settings to run against.
 * @param source - Where the channels came from, for log lines.
 * @param notify - Optional notifier, passed through to the integrator.
 * @returns The assignment result and the playlist records.
 */
export async function processDiscovery(discovered: readonly DiscoveredChannel[], context: LedgerContext, source: string,
  notify?: (event: AssignmentEvent) => void): Promise<DiscoveryRunResult> {

  const runId = nextRunId();

  return runWithRunContext({ runId, source }, async () => {

    LOG.info("Processing %d discovered channels from %s.", discovered.length, source);

    const result = await runAssignment(discovered.map((channel) => channel.streamPath), { firstNumber: context.firstNumber, notify, store: context.store });

    if(!result.saved) {

      LOG.info("Channel map unchanged, no new assignments.");
    }

    const playlist = await writePlaylists(discovered, result.mapping, context.playlist);

    return { ...result, playlist, runId };
  });
}

/*
 * RUN QUEUE
 *
 * Two assignment runs against one store must never interleave their load and save. Inside a single process every run goes through a queue that starts each task
 * only after the previous one has settled. A failed task does not block the ones behind it. Separate processes sharing a map file are not coordinated.
 */

/**
 * A serial task queue.
 */
export interface RunQueue {

  // Runs the task after every previously queued task has settled, and resolves or rejects with the task's outcome.
  enqueue<T>(task: () => Promise<T>): Promise<T>;

  // Number of tasks queued or running.
  readonly pending: number;
}

/**
 * Creates a serial task queue.
 * @returns An empty queue.
 */
export function createRunQueue(): RunQueue {

  let tail: Promise<unknown> = Promise.resolve();
  let pending = 0;

  return {

    enqueue<T>(task: () => Promise<T>): Promise<T> {

      pending++;

      const run = tail.then(async () => {

        try {

          return await task();
        } finally {

          pending--;
        }
      });

      tail = run.then(() => undefined, () => undefined);

      return run;
    },

    get pending(): number {

      return pending;
    }
  };
}
