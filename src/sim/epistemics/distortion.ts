/**
 * Memory noise and forgetting. These are source-only events: no one else is
 * involved, and each one is recorded as evidence in the owner's own facet.
 */

import type { EntityId, Person, PersonId, World } from "../types";
import { getConfig } from "../config";
import type { RandomSource } from "../rng";
import { clamp } from "../util";
import { recordEvidence } from "./evidence";
import { considerNewEvidence } from "./facet";
import type { FeatureType } from "./features";
import { getMentalModel } from "./mind";
import type { BeliefFacet, Evidence, FeatureValue, IngestOutcome } from "./types";
import { alternativeValue, referentFor } from "./variants";

export type Distortion = {
  kind: "mutation" | "transference" | "confabulation";
  owner: PersonId;
  subject: EntityId;
  feature: FeatureType;
  from: FeatureValue;
  to: string;
  piece: Evidence;
  outcome: IngestOutcome;
};

function facetsForPass(person: Person, rng: RandomSource): BeliefFacet[] {
  const all = person.mind.facets;
  const max = getConfig().limits.maxFacetsPerDistortionPass;
  if (all.length <= max) return [...all];
  // A window starting at a random offset, wrapping around.
  const start = rng.int(0, all.length - 1);
  const out: BeliefFacet[] = [];
  for (let i = 0; i < max; i++) out.push(all[(start + i) % all.length]);
  return out;
}

function mutate(world: World, person: Person, facet: BeliefFacet, rng: RandomSource): Distortion | null {
  const from = facet.value;
  if (from === null) return null;
  const to = alternativeValue(world, person.id, facet.subject, facet.feature, from, rng);
  if (to === null) return null;
  const piece = recordEvidence(world, { kind: "mutation", subject: facet.subject, source: person.id, mutatedFrom: from });
  const outcome = considerNewEvidence(world, facet, to, referentFor(world, facet.feature, to), piece);
  return { kind: "mutation", owner: person.id, subject: facet.subject, feature: facet.feature, from, to, piece, outcome };
}

/** Cross-apply what the owner believes about someone else's same feature. */
function transfer(world: World, person: Person, facet: BeliefFacet, rng: RandomSource): Distortion | null {
  const from = facet.value;
  const donors = person.mind.facets.filter(
    (f) => f.feature === facet.feature && f.subject !== facet.subject && f.value !== null && f.value !== from
  );
  const donor = rng.pick(donors);
  if (!donor || donor.value === null) return null;
  const piece = recordEvidence(world, {
    kind: "transference",
    subject: facet.subject,
    source: person.id,
    transferredFrom: { owner: person.id, subject: donor.subject, feature: donor.feature }
  });
  const to = donor.value;
  const outcome = considerNewEvidence(world, facet, to, donor.objectId, piece);
  return { kind: "transference", owner: person.id, subject: facet.subject, feature: facet.feature, from, to, piece, outcome };
}

function confabulate(world: World, person: Person, facet: BeliefFacet, rng: RandomSource): Distortion | null {
  const to = alternativeValue(world, person.id, facet.subject, facet.feature, null, rng);
  if (to === null) return null;
  const piece = recordEvidence(world, { kind: "confabulation", subject: facet.subject, source: person.id });
  const outcome = considerNewEvidence(world, facet, to, referentFor(world, facet.feature, to), piece);
  return { kind: "confabulation", owner: person.id, subject: facet.subject, feature: facet.feature, from: null, to, piece, outcome };
}

/**
 * One pass of memory noise over a person's facets. Each chance is scaled by
 * `1 - memory`; known values may mutate or be transferred, unknown ones may be
 * confabulated.
 */
export function distortMemories(world: World, person: Person, rng: RandomSource): Distortion[] {
  const t = getConfig().tuning;
  const frailty = 1 - clamp(person.memory, 0, 1);
  if (frailty <= 0) return [];

  const out: Distortion[] = [];
  for (const facet of facetsForPass(person, rng)) {
    let d: Distortion | null = null;
    if (facet.value === null) {
      if (rng.chance(t.confabulationChance * frailty)) d = confabulate(world, person, facet, rng);
    } else if (rng.chance(t.mutationChance * frailty)) {
      d = mutate(world, person, facet, rng);
    } else if (rng.chance(t.transferenceChance * frailty)) {
      d = transfer(world, person, facet, rng);
    }
    if (d) out.push(d);
  }
  return out;
}

/** Explicitly forget a belief. Null when there is nothing to forget. */
export function forget(world: World, owner: PersonId, subject: EntityId, feature: FeatureType): IngestOutcome | null {
  const person = world.people[owner];
  if (!person) return null;
  const facet = getMentalModel(person.mind, subject)?.facets[feature];
  if (!facet || facet.value === null) return null;
  const piece = recordEvidence(world, { kind: "forgetting", subject, source: owner });
  return considerNewEvidence(world, facet, null, null, piece);
}
