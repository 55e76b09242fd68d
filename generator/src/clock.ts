import type { Clock } from "./types.js";

export const systemClock: Clock = () => new Date();

export function fixedClock(instant: Date): Clock {
  return () => new Date(instant.getTime());
}
