/**
 * Source of "now". Injected wherever time matters so that schedule
 * matching can be tested at fixed instants.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A clock pinned to one instant, movable by hand.
 */
export function fixedClock(start: Date | string): Clock & {
  set(instant: Date | string): void;
  advance(ms: number): void;
} {
  let current = new Date(start);
  return {
    now: () => new Date(current),
    set(instant) {
      current = new Date(instant);
    },
    advance(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}
