import type { ConversationState } from "../types.js";

const TRANSITIONS: Record<ConversationState, readonly ConversationState[]> = {
  idle: ["collecting_intent", "cancel_flow", "handoff_to_admin"],
  collecting_intent: [
    "browsing_schedule",
    "collecting_group",
    // slot skipping: the extractor may capture several slots in one turn
    "collecting_datetime",
    "collecting_contact",
    "idle",
    "cancel_flow",
    "handoff_to_admin"
  ],
  browsing_schedule: ["collecting_group", "idle", "cancel_flow", "handoff_to_admin"],
  collecting_group: ["collecting_datetime", "idle", "cancel_flow", "handoff_to_admin"],
  collecting_datetime: ["collecting_contact", "idle", "cancel_flow", "handoff_to_admin"],
  collecting_contact: ["confirm_booking", "idle", "cancel_flow", "handoff_to_admin"],
  confirm_booking: ["booking_in_progress", "idle", "cancel_flow", "handoff_to_admin"],
  booking_in_progress: ["booking_done", "idle", "handoff_to_admin"],
  booking_done: ["idle", "serial_booking"],
  cancel_flow: ["idle", "handoff_to_admin"],
  serial_booking: ["collecting_group", "idle", "handoff_to_admin"],
  handoff_to_admin: ["admin_responding", "idle"],
  admin_responding: ["idle"]
};

const TIMEOUTS_SECONDS: Partial<Record<ConversationState, number>> = {
  confirm_booking: 3 * 3600,
  booking_in_progress: 30,
  admin_responding: 4 * 3600
};

/** Never passed through on an automatic path: escape hatches and the commit itself. */
const NEVER_IMPLICIT: ReadonlySet<ConversationState> = new Set([
  "idle",
  "cancel_flow",
  "handoff_to_admin",
  "booking_in_progress",
  "booking_done"
]);

export function canTransition(from: ConversationState, to: ConversationState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function getTimeoutSeconds(state: ConversationState): number | undefined {
  return TIMEOUTS_SECONDS[state];
}

export function isTerminal(state: ConversationState): boolean {
  return state === "booking_done";
}

export function isPersistent(state: ConversationState): boolean {
  return state === "handoff_to_admin" || state === "admin_responding";
}

/**
 * Shortest chain of legal forward transitions from `from` to `to`, excluding `from`.
 * Returns [] when already there and undefined when `to` is unreachable.
 */
export function findPath(from: ConversationState, to: ConversationState): ConversationState[] | undefined {
  if (from === to) {
    return [];
  }

  const previous = new Map<ConversationState, ConversationState>();
  const queue: ConversationState[] = [from];
  const seen = new Set<ConversationState>([from]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    for (const next of TRANSITIONS[current]) {
      if (seen.has(next) || (NEVER_IMPLICIT.has(next) && next !== to)) {
        continue;
      }
      seen.add(next);
      previous.set(next, current);

      if (next === to) {
        const path: ConversationState[] = [next];
        let cursor = current;
        while (cursor !== from) {
          path.unshift(cursor);
          const before = previous.get(cursor);
          if (before === undefined) break;
          cursor = before;
        }
        return path;
      }
      queue.push(next);
    }
  }

  return undefined;
}
