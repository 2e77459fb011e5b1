/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * allocator.ts: Channel number allocation for newly discovered stream paths.
 */
import type { ChannelAssignment, ChannelMapping } from "../types/index.js";
import { ChannelNumberExhaustedError, LOG } from "../utils/index.js";

/*
 * CHANNEL NUMBER ALLOCATION
 *
 * Numbers only ever go up. Each new stream path receives the next integer above the highest number in use, so a number freed by an operator deleting an entry is
 * never handed out again, and gaps left by hand-assigned numbers are never filled:
 *
 *   in use {1, 150}, new [C]        ->  C = 151
 *   in use {},       new [A, B, C]  ->  A = 1, B = 2, C = 3
 *
 * A number joins the in-use set as soon as it is assigned, so paths in the same batch never collide. The allocator is a pure function of its inputs: the same
 * numbers in use and the same discovery order always produce the same assignments.
 *
 * The optional firstNumber floor raises the starting point for lineups that begin at a fixed base (e.g., 100). It never lowers it.
 *
 * Numbers stop at Number.MAX_SAFE_INTEGER. Allocating past it throws ChannelNumberExhaustedError, and the whole batch fails.
 */

/**
 * Result of an allocation.
 */
export interface AllocationResult {

  // One assignment per input stream path, in input order.
  assignments: ChannelAssignment[];

  // The numbers in use after allocation: the input set plus every assigned number.
  used: Set<number>;
}

/**
 * Returns the highest number in a set, or zero for an empty set.
 * @param numbers - The numbers to scan.
 * @returns The maximum.
 */
export function highestNumber(numbers: Iterable<number>): number {

  // A loop rather than Math.max(...numbers), which overflows the call stack on very large sets.
  let highest = 0;

  for(const value of numbers) {

    if(value > highest) {

      highest = value;
    }
  }

  return highest;
}

/**
 * Collects the numbers in use by a mapping.
 * @param mapping - The channel mapping.
 * @returns A new set of every channel number in the mapping.
 */
export function usedNumbers(mapping: ChannelMapping): Set<number> {

  return new Set(mapping.values());
}

/**
 * Assigns a channel number to each stream path, in order.
 * @param used - Numbers already in use. Not modified.
 * @param streamPaths - Stream paths absent from the mapping, in discovery order. Callers pass each path once.
 * @param firstNumber - The lowest number to hand out.
 * @returns The assignments and the updated set of numbers in use.
 * @throws ChannelNumberExhaustedError if a number would exceed Number.MAX_SAFE_INTEGER.
 */
export function allocateChannelNumbers(used: ReadonlySet<number>, streamPaths: readonly string[], firstNumber = 1): AllocationResult {

  const nextUsed = new Set(used);
  const assignments: ChannelAssignment[] = [];
  let next = Math.max(highestNumber(used) + 1, firstNumber);

  if(streamPaths.length > 0) {

    LOG.debug("allocator", "Allocating %d channel numbers starting at %d.", streamPaths.length, next);
  }

  for(const streamPath of streamPaths) {

    // Above MAX_SAFE_INTEGER, next++ rounds and two paths would share a number.
    if(!Number.isSafeInteger(next)) {

      throw new ChannelNumberExhaustedError(streamPath, highestNumber(nextUsed));
    }

    assignments.push({ channelNumber: next, streamPath });
    nextUsed.add(next);

    LOG.debug("allocator", "Allocated %d to %s.", next, streamPath);

    next++;
  }

  return { assignments, used: nextUsed };
}
