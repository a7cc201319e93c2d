/**
 * Plausible wrong values for a feature, used by lies and by memory noise.
 */

import variantPools from "../../../data/featureVariants.json";
import type { EntityId, PersonId, World } from "../types";
import type { RandomSource } from "../rng";
import { placeByName } from "../world";
import type { FeatureType } from "./features";
import type { FeatureValue } from "./types";

const POOLS: Partial<Record<FeatureType, readonly string[]>> = variantPools;

export function variantPool(feature: FeatureType): readonly string[] {
  return POOLS[feature] ?? [];
}

/** Values the owner currently holds for this feature about anyone else. */
export function heldValues(world: World, owner: PersonId, feature: FeatureType, exceptSubject: EntityId): string[] {
  const person = world.people[owner];
  if (!person) return [];
  const out: string[] = [];
  for (const facet of person.mind.facets) {
    if (facet.feature !== feature || facet.subject === exceptSubject || facet.value === null) continue;
    out.push(facet.value);
  }
  return out;
}

/**
 * A value other than `current`, drawn from the feature's pool or, when it has
 * none, from what the owner believes about others. Null when nothing differs.
 */
export function alternativeValue(
  world: World,
  owner: PersonId,
  subject: EntityId,
  feature: FeatureType,
  current: FeatureValue,
  rng: RandomSource
): string | null {
  const pool = variantPool(feature);
  const source = pool.length ? pool : heldValues(world, owner, feature, subject);
  const candidates = [...new Set(source)].filter((v) => v !== current).sort();
  return rng.pick(candidates);
}

/** Entity a value names, for features whose values are place names. */
export function referentFor(world: World, feature: FeatureType, value: string): EntityId | null {
  if (feature !== "workplace" && feature !== "home") return null;
  return placeByName(world, value)?.id ?? null;
}
