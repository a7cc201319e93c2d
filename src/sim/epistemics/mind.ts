import type { EntityId, PersonId, World } from "../types";
import { decayFacet } from "./facet";
import type { BeliefFacet, IngestOutcome, MentalModel, Mind } from "./types";

export function createMind(owner: PersonId): Mind {
  return { owner, models: {}, facets: [], distrust: {} };
}

export function getMentalModel(mind: Mind, subject: EntityId): MentalModel | null {
  return mind.models[subject] ?? null;
}

export function allFacets(mind: Mind): readonly BeliefFacet[] {
  return mind.facets;
}

/** Entities the owner holds at least one value for, in the order they were first modelled. */
export function knownEntities(mind: Mind): EntityId[] {
  const out: EntityId[] = [];
  for (const model of Object.values(mind.models)) {
    if (Object.values(model.facets).some((f) => f !== undefined && f.value !== null)) out.push(model.subject);
  }
  return out;
}

/**
 * Batched decay over the flat facet list. Run once per timestep, after every
 * transmission of that timestep. Returns the facets that were forgotten.
 */
export function decayAll(world: World, owner: PersonId): IngestOutcome[] {
  const person = world.people[owner];
  if (!person) return [];
  const tick = world.clock.tick;
  const forgotten: IngestOutcome[] = [];
  for (const facet of person.mind.facets) {
    const outcome = decayFacet(world, facet, tick);
    if (outcome) forgotten.push(outcome);
  }
  return forgotten;
}
