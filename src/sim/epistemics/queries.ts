/**
 * Read-only questions about what someone believes and why.
 * Unknown owners, entities and features answer with null, [] or false.
 */

import type { EntityId, PersonId, PlaceId, Sex, World } from "../types";
import { salienceOf } from "../salience";
import { facetIsAccurate } from "./facet";
import { FEATURE_TYPES } from "./features";
import type { FeatureType } from "./features";
import { believedEmployees } from "./mentalModel";
import { getMentalModel } from "./mind";
import type { BeliefFacet, FacetEvidence, FeatureValue, MentalModel } from "./types";

function modelOf(world: World, owner: PersonId, entity: EntityId): MentalModel | null {
  const person = world.people[owner];
  return person ? getMentalModel(person.mind, entity) : null;
}

export function beliefFacet(world: World, owner: PersonId, entity: EntityId, feature: FeatureType): BeliefFacet | null {
  return modelOf(world, owner, entity)?.facets[feature] ?? null;
}

export function belief(world: World, owner: PersonId, entity: EntityId, feature: FeatureType): FeatureValue {
  return beliefFacet(world, owner, entity, feature)?.value ?? null;
}

export function accurateBelief(world: World, owner: PersonId, entity: EntityId, feature: FeatureType): boolean {
  const facet = beliefFacet(world, owner, entity, feature);
  return facet !== null && facet.value !== null && facetIsAccurate(world, facet);
}

export function inaccurateBelief(world: World, owner: PersonId, entity: EntityId, feature: FeatureType): boolean {
  const facet = beliefFacet(world, owner, entity, feature);
  return facet !== null && facet.value !== null && !facetIsAccurate(world, facet);
}

/**
 * Everyone who supplied evidence for the owner's beliefs about an entity (or one
 * feature of it), most frequent first; ties keep order of first appearance.
 */
export function sources(world: World, owner: PersonId, entity: EntityId, feature?: FeatureType): PersonId[] {
  const model = modelOf(world, owner, entity);
  if (!model) return [];
  const features = feature ? [feature] : FEATURE_TYPES;

  const entries: FacetEvidence[] = [];
  for (const f of features) {
    const facet = model.facets[f];
    if (facet) entries.push(...facet.evidence);
  }
  entries.sort((a, b) => a.piece.eventNumber - b.piece.eventNumber);

  const counts = new Map<PersonId, number>();
  for (const entry of entries) counts.set(entry.piece.source, (counts.get(entry.piece.source) ?? 0) + 1);
  // Array.prototype.sort is stable, so first appearance breaks ties.
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).map(([id]) => id);
}

export function topSource(world: World, owner: PersonId, entity: EntityId, feature?: FeatureType): PersonId | null {
  return sources(world, owner, entity, feature)[0] ?? null;
}

/** People the owner believes work at a business, most salient to the owner first. */
export function peopleIBelieveWorkAt(world: World, owner: PersonId, companyId: PlaceId): PersonId[] {
  const person = world.people[owner];
  if (!person) return [];
  return believedEmployees(person.mind, companyId).sort(
    (a, b) => salienceOf(person, b) - salienceOf(person, a) || a.localeCompare(b)
  );
}

export function mostSalientPersonIBelieveWorksAt(world: World, owner: PersonId, companyId: PlaceId): PersonId | null {
  return peopleIBelieveWorkAt(world, owner, companyId)[0] ?? null;
}

export type NameQuery = {
  firstName?: string;
  lastName?: string;
  sex?: Sex;
};

/** People the owner believes match every given criterion, in the order they were first modelled. */
export function peopleIBelieveAreNamed(world: World, owner: PersonId, query: NameQuery): PersonId[] {
  const person = world.people[owner];
  if (!person) return [];
  const out: PersonId[] = [];
  for (const model of Object.values(person.mind.models)) {
    if (model.subjectKind !== "person") continue;
    if (query.firstName && model.facets["first name"]?.value !== query.firstName) continue;
    if (query.lastName && model.facets["last name"]?.value !== query.lastName) continue;
    if (query.sex && model.facets.sex?.value !== query.sex) continue;
    out.push(model.subject);
  }
  return out;
}
