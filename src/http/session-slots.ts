import {
  evictExpiredSessions,
  evictOldestSession,
} from './session-cleanup.js';
import type { SessionStore, SessionTransport } from './sessions.js';

/**
 * Counts sessions between `initialize` and the SDK assigning an id. They
 * are not in the store yet but still count toward `maxSessions`.
 */
export interface SessionSlots {
  reserve: (
    store: Pick<SessionStore, 'size'>,
    maxSessions: number
  ) => boolean;
  release: () => void;
  inFlight: () => number;
}

/** One reserved slot; releasing it more than once is a no-op. */
export interface SlotTracker {
  readonly releaseSlot: () => void;
  readonly markInitialized: () => void;
  readonly isInitialized: () => boolean;
}

export function createSessionSlots(): SessionSlots {
  let inFlightSessions = 0;
  return {
    reserve: (store, maxSessions) => {
      if (store.size() + inFlightSessions >= maxSessions) return false;
      inFlightSessions += 1;
      return true;
    },
    release: () => {
      if (inFlightSessions > 0) inFlightSessions -= 1;
    },
    inFlight: () => inFlightSessions,
  };
}

export function createSlotTracker(slots: SessionSlots): SlotTracker {
  let slotReleased = false;
  let initialized = false;
  return {
    releaseSlot: () => {
      if (slotReleased) return;
      slotReleased = true;
      slots.release();
    },
    markInitialized: () => {
      initialized = true;
    },
    isInitialized: () => initialized,
  };
}

/**
 * Expired sessions are dropped first. When the store alone fills the limit
 * the least recently seen session is evicted to make room; in-flight
 * initializations are never evicted.
 */
export function hasCapacity<T extends SessionTransport>(
  store: SessionStore<T>,
  maxSessions: number,
  slots: SessionSlots
): boolean {
  evictExpiredSessions(store);

  const currentSize = store.size();
  if (currentSize + slots.inFlight() < maxSessions) return true;

  const canFreeSlot =
    currentSize >= maxSessions &&
    currentSize - 1 + slots.inFlight() < maxSessions;
  return canFreeSlot && evictOldestSession(store);
}
