/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * events.ts: New-assignment notifications.
 */
import type { AssignmentEvent } from "../types/index.js";
import { EventEmitter } from "events";

/* A singleton EventEmitter that broadcasts one event per newly assigned channel number. The integrator publishes here by default, and the /events endpoint relays
 * each event to connected Server-Sent Events clients.
 */

const assignmentEmitter = new EventEmitter();

// Each SSE connection holds one listener.
assignmentEmitter.setMaxListeners(100);

/**
 * Publishes a new-assignment event to all subscribers.
 * @param event - The assignment that was just persisted.
 */
export function emitAssignment(event: AssignmentEvent): void {

  assignmentEmitter.emit("assignment", event);
}

/**
 * Subscribes a callback to new-assignment events.
 * @param callback - Function to call for each event.
 * @returns A function that removes the subscription.
 */
export function subscribeToAssignments(callback: (event: AssignmentEvent) => void): () => void {

  assignmentEmitter.on("assignment", callback);

  return (): void => {

    assignmentEmitter.off("assignment", callback);
  };
}
