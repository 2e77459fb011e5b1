/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * integrator.ts: Assignment runs that merge discovered stream paths into the channel map.
 */
import type { AssignmentEvent, ChannelAssignment, ChannelMapping, MappingStore } from "../types/index.js";
import { allocateChannelNumbers, usedNumbers } from "./allocator.js";
import { LOG } from "../utils/index.js";
import { emitAssignment } from "./events.js";

/*
 * ASSIGNMENT RUN
 *
 * One run takes the stream paths found by a scrape and returns the channel map that covers them:
 *
 * 1. Load the map. A load failure ends the run here, before anything is allocated.
 * 2. Split the discovered paths into known ones, whose numbers are read and never recomputed, and new ones, kept in discovery order.
 * 3. Allocate numbers for the new paths.
 * 4. Save the merged map, only when something was allocated. A run that finds nothing new never writes.
 * 5. Notify once per new assignment, after the save has succeeded.
 *
 * Known paths that are missing from this scrape keep their entries. Nothing here removes or renumbers an entry.
 *
 * Runs against the same store must not overlap. Two interleaved load/save cycles would each allocate from the same starting point and one run's numbers would be
 * lost or duplicated. Callers serialize runs (see routes/assign.ts for the server's queue).
 */

/**
 * Options for an assignment run.
 */
export interface AssignmentOptions {

  // The lowest channel number to hand out. Defaults to 1.
  firstNumber?: number;

  // Receives one event per new assignment. Defaults to emitAssignment(), which feeds the /events stream.
  notify?: (event: AssignmentEvent) => void;

  // The channel map store.
  store: MappingStore;
}

/**
 * Outcome of an assignment run.
 */
export interface AssignmentResult {

  // Newly assigned pairs, in allocation order.
  assigned: ChannelAssignment[];

  // Discovered stream paths that already had a number, each listed once, in discovery order.
  known: string[];

  // The complete map after the run: every previously stored entry plus the new ones.
  mapping: ChannelMapping;

  // Whether the store was written.
  saved: boolean;
}

/**
 * Splits discovered stream paths into those already in the mapping and those that need a number. Empty paths and repeats are dropped; the first occurrence of a
 * path fixes its position.
 * @param mapping - The current mapping.
 * @param discovered - Stream paths in discovery order.
 * @returns The known and new paths, each in discovery order.
 */
export function partitionStreamPaths(mapping: ChannelMapping, discovered: readonly string[]): { known: string[]; unseen: string[] } {

  const known: string[] = [];
  const unseen: string[] = [];
  const seen = new Set<string>();

  for(const streamPath of discovered) {

    if((streamPath.length === 0) || seen.has(streamPath)) {

      continue;
    }

    seen.add(streamPath);

    if(mapping.has(streamPath)) {

      known.push(streamPath);
    } else {

      unseen.push(streamPath);
    }
  }

  return { known, unseen };
}

/**
 * Runs one assignment pass.
 * @param discovered - Stream paths from the current scrape, known and new mixed, in discovery order.
 * @param options - The store and optional allocation floor and notifier.
 * @returns The merged mapping and what changed.
 * @throws MappingStoreError (or a subclass) if the store cannot be loaded or saved.
 */
export async function runAssignment(discovered: readonly string[], options: AssignmentOptions): Promise<AssignmentResult> {

  const { firstNumber = 1, notify = emitAssignment, store } = options;
  const existing = await store.load();
  const { known, unseen } = partitionStreamPaths(existing, discovered);

  LOG.debug("assign", "%d discovered stream paths: %d known, %d new.", discovered.length, known.length, unseen.length);

  if(unseen.length === 0) {

    return { assigned: [], known, mapping: existing, saved: false };
  }

  const { assignments } = allocateChannelNumbers(usedNumbers(existing), unseen, firstNumber);
  const mapping = new Map(existing);

  for(const { channelNumber, streamPath } of assignments) {

    mapping.set(streamPath, channelNumber);
  }

  await store.save(mapping);

  const timestamp = new Date().toISOString();

  for(const assignment of assignments) {

    LOG.info("Assigned channel %d to %s.", assignment.channelNumber, assignment.streamPath);

    notify({ ...assignment, timestamp });
  }

  return { assigned: assignments, known, mapping, saved: true };
}
