import { slotKeyId, type PriorStatus, type Slot, type Transition } from "./types";

export type StatusIndex = ReadonlyMap<string, PriorStatus>;

export function indexByKey(stored: Slot[]): Map<string, PriorStatus> {
  const index = new Map<string, PriorStatus>();
  for (const slot of stored) {
    // First row wins if the store ever returns duplicates
    if (!index.has(slotKeyId(slot))) {
      index.set(slotKeyId(slot), slot.status);
    }
  }
  return index;
}

/**
 * Pair every scraped slot with the status stored for its key ("unknown" when
 * the key has never been seen).
 */
export function computeTransitions(previous: StatusIndex, scraped: Slot[]): Transition[] {
  return scraped.map((slot) => ({
    key: { date: slot.date, passNo: slot.passNo },
    oldStatus: previous.get(slotKeyId(slot)) ?? "unknown",
    newStatus: slot.status,
  }));
}

// Newly freed: was own or busy last time, free now
export function isNotifyWorthy(transition: Transition): boolean {
  return (
    transition.newStatus === "free" &&
    (transition.oldStatus === "own" || transition.oldStatus === "busy")
  );
}

export function freedSlots(previous: StatusIndex, scraped: Slot[]): Transition[] {
  return computeTransitions(previous, scraped).filter(isNotifyWorthy);
}
