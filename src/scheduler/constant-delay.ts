import { SECOND_MS, floorMod } from "../utils/zoned-time.js";
import type { Schedule } from "./types.js";

/**
 * Simple recurring duty cycle, e.g. "every 5 minutes". Activations fall on
 * whole seconds.
 */
export class ConstantDelaySchedule implements Schedule {
  readonly delay: number;

  constructor(delay: number) {
    this.delay = delay;
  }

  next(after: Date): Date {
    const t = after.getTime();
    return new Date(t + this.delay - floorMod(t, SECOND_MS));
  }
}

/**
 * Schedule that activates once every `durationMs`. Durations under a second
 * are raised to one second and sub-second remainders are dropped.
 */
export function every(durationMs: number): ConstantDelaySchedule {
  const duration = Math.max(durationMs, SECOND_MS);
  return new ConstantDelaySchedule(duration - floorMod(duration, SECOND_MS));
}
