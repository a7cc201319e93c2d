import type { DailySummary, SimEvent, World } from "../sim/types";
import { daysToTicks } from "../sim/types";
import { createTown } from "../sim/worldSeed";
import { tickTimestep } from "../sim/tick";

export type RunOptions = {
  seed: number;
  days: number;
};

export type RunResult = {
  finalWorld: World;
  summaries: DailySummary[];
  events: SimEvent[];
};

export function runSimulation(opts: RunOptions): RunResult {
  if (!Number.isInteger(opts.seed)) throw new Error("seed must be an integer");
  if (!Number.isInteger(opts.days) || opts.days < 0) throw new Error("days must be >= 0");

  const world = createTown(opts.seed);
  const summaries: DailySummary[] = [];
  const events: SimEvent[] = [];

  const totalTimesteps = daysToTicks(opts.days);
  for (let i = 0; i < totalTimesteps; i++) {
    const res = tickTimestep(world);
    if (res.dailySummary) summaries.push(res.dailySummary);
    events.push(...res.events);
  }

  return { finalWorld: world, summaries, events };
}
