import type { Clock, SimTick } from "./types";
import { DAYS_PER_YEAR, tickToDay, tickToTimeOfDay } from "./types";

export function createClock(startYear: number, startOrdinalDate = 0): Clock {
  if (!Number.isInteger(startYear)) throw new Error("startYear must be an integer");
  return { tick: 0, eventCounter: 0, startOrdinalDate, startYear };
}

/**
 * Consume the next simulation-wide event number. Every piece of evidence takes
 * exactly one; numbers are never reused.
 */
export function nextEventNumber(clock: Clock): number {
  clock.eventCounter += 1;
  return clock.eventCounter;
}

export function advanceClock(clock: Clock): SimTick {
  clock.tick += 1;
  return clock.tick;
}

export function tickToOrdinalDate(clock: Clock, tick: SimTick): number {
  return clock.startOrdinalDate + tickToDay(tick);
}

export function currentYear(clock: Clock): number {
  return clock.startYear + Math.floor(tickToDay(clock.tick) / DAYS_PER_YEAR);
}

export function describeTimestep(tick: SimTick): string {
  return `day ${tickToDay(tick)} (${tickToTimeOfDay(tick)})`;
}

export function makeEventId(prefix: string, tick: SimTick, seq: number): string {
  return `${prefix}:${tick}:${seq}`;
}
