import type { Person, World } from "../types";
import { getConfig } from "../config";
import type { RandomSource } from "../rng";
import { peopleAt } from "../world";
import { recordEvidence } from "./evidence";
import { buildUp } from "./mentalModel";
import type { EvidenceOf, IngestOutcome } from "./types";

/** A person takes stock of their own features. */
export function reflect(world: World, person: Person): IngestOutcome[] {
  const piece = recordEvidence(world, { kind: "reflection", subject: person.id, source: person.id });
  return buildUp(world, person.mind, piece);
}

export type Observation = {
  piece: EvidenceOf<"observation">;
  outcomes: IngestOutcome[];
};

/**
 * Look around: the current place, then everyone else present in id order, each
 * noticed with `chanceSomeoneObservesNearbyEntity`.
 */
export function observe(world: World, person: Person, rng: RandomSource): Observation[] {
  if (person.locationId === null) return [];
  const chance = getConfig().tuning.chanceSomeoneObservesNearbyEntity;
  const subjects = [person.locationId, ...peopleAt(world, person.locationId).filter((p) => p.id !== person.id).map((p) => p.id)];

  const out: Observation[] = [];
  for (const subject of subjects) {
    if (!rng.chance(chance)) continue;
    const piece = recordEvidence(world, { kind: "observation", subject, source: person.id });
    out.push({ piece, outcomes: buildUp(world, person.mind, piece) });
  }
  return out;
}
