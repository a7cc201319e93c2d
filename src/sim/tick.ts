import type { DailySummary, SimEvent, TickResult, World } from "./types";
import { tickToDay, tickToTimeOfDay } from "./types";
import { advanceClock, describeTimestep, makeEventId } from "./clock";
import { getConfig } from "./config";
import { rngForTick } from "./rng";
import { moveByRoutine } from "./routine";
import { isInTown } from "./world";
import { entityName } from "./epistemics/evidence";
import { facetIsAccurate } from "./epistemics/facet";
import { decayAll } from "./epistemics/mind";
import { observe, reflect } from "./epistemics/perception";
import { distortMemories } from "./epistemics/distortion";
import { socializeAtLocation } from "./epistemics/transmission";

function summarizeDay(world: World): DailySummary {
  let facets = 0;
  let accurateFacets = 0;
  let forgottenFacets = 0;
  let people = 0;
  for (const person of Object.values(world.people)) {
    if (person.status !== "alive") continue;
    people++;
    for (const facet of person.mind.facets) {
      facets++;
      if (facet.value === null) forgottenFacets++;
      else if (facetIsAccurate(world, facet)) accurateFacets++;
    }
  }
  return {
    tick: world.clock.tick,
    day: tickToDay(world.clock.tick),
    people,
    facets,
    accurateFacets,
    forgottenFacets,
    ...world.tally
  };
}

/**
 * Advance one timestep (day or night).
 *
 * Order: clock, routine movement, then per person in id order reflect, observe and
 * socialize; then memory noise; then the batched decay pass, so decay only ever
 * sees beliefs after every transmission of the timestep has settled.
 */
export function tickTimestep(world: World): TickResult {
  const { debug } = getConfig();
  const nextTick = world.clock.tick + 1;
  const rng = rngForTick(world.seed, nextTick);

  let eventSeq = 0;
  const events: SimEvent[] = [];
  const emit = (e: Omit<SimEvent, "id">) => {
    events.push({ id: makeEventId("evt", e.tick, ++eventSeq), ...e });
  };
  const name = (id: string) => entityName(world, id);

  if (world.clock.tick === 0) {
    emit({
      tick: 0,
      kind: "sim.started",
      visibility: "system",
      message: `Simulation started (seed=${world.seed})`,
      data: { seed: world.seed, people: Object.keys(world.people).length, places: Object.keys(world.places).length }
    });
  }

  const firstEvidence = world.clock.eventCounter + 1;
  const tick = advanceClock(world.clock);
  moveByRoutine(world, rng);

  const people = Object.values(world.people)
    .filter(isInTown)
    .sort((a, b) => a.id.localeCompare(b.id));

  for (const person of people) {
    reflect(world, person);
    observe(world, person, rng);

    for (const c of socializeAtLocation(world, person, rng)) {
      world.tally.conversations++;
      if (debug.logConversations) {
        emit({
          tick,
          kind: "conversation.held",
          visibility: "public",
          ...(c.locationId ? { locationId: c.locationId } : {}),
          message: `${name(c.a)} and ${name(c.b)} talked about ${c.topics.length} subject(s)`,
          data: { a: c.a, b: c.b, topics: c.topics, turns: c.exchanges.length }
        });
      }
      for (const ex of c.exchanges) {
        if (!ex.lie) continue;
        world.tally.lies++;
        const told = Object.fromEntries(ex.conveyed.filter((f) => f.lie).map((f) => [f.feature, f.value]));
        emit({
          tick,
          kind: "lie.told",
          visibility: "private",
          message: `${name(ex.talker)} lied to ${name(ex.listener)} about ${name(ex.subject)}`,
          data: { liar: ex.talker, listener: ex.listener, subject: ex.subject, told, eventNumber: ex.lie.eventNumber }
        });
      }
    }
  }

  for (const person of people) {
    for (const d of distortMemories(world, person, rng)) {
      world.tally.distortions++;
      if (!debug.logDistortions) continue;
      emit({
        tick,
        kind: "memory.distorted",
        visibility: "private",
        message: `${name(d.owner)} now believes ${name(d.subject)}'s ${d.feature} is ${d.to} (${d.kind})`,
        data: { owner: d.owner, subject: d.subject, feature: d.feature, kind: d.kind, from: d.from, to: d.to }
      });
    }
  }

  const owners = Object.values(world.people)
    .filter((p) => p.status === "alive")
    .sort((a, b) => a.id.localeCompare(b.id));
  for (const owner of owners) {
    for (const outcome of decayAll(world, owner.id)) {
      if (!debug.logForgetting) continue;
      const f = outcome.facet;
      emit({
        tick,
        kind: "belief.forgotten",
        visibility: "private",
        message: `${name(f.owner)} forgot ${name(f.subject)}'s ${f.feature}`,
        data: { owner: f.owner, subject: f.subject, feature: f.feature, forgotten: outcome.previousValue }
      });
    }
  }

  if (debug.logEvidence && world.clock.eventCounter >= firstEvidence) {
    emit({
      tick,
      kind: "evidence.recorded",
      visibility: "system",
      message: `${world.clock.eventCounter - firstEvidence + 1} pieces of evidence recorded on ${describeTimestep(tick)}`,
      data: { first: firstEvidence, last: world.clock.eventCounter }
    });
  }

  let dailySummary: DailySummary | undefined;
  if (tickToTimeOfDay(tick) === "night") {
    dailySummary = summarizeDay(world);
    emit({
      tick,
      kind: "sim.day.ended",
      visibility: "system",
      message: `Day ${dailySummary.day} ended`,
      data: { summary: dailySummary }
    });
    world.tally = { conversations: 0, lies: 0, distortions: 0 };
  }

  return { world, events, dailySummary };
}
