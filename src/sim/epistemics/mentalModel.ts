/**
 * Mental models: everything one person believes about one subject.
 *
 * Models and facets are created lazily on first evidence and registered once in the
 * owner's mind, so there is never more than one model per (owner, subject) or one
 * facet per (owner, subject, feature).
 */

import type { EntityId, Person, PersonId, PlaceId, World } from "../types";
import { tickToTimeOfDay } from "../types";
import { ContractViolation } from "./errors";
import { createFacet, considerNewEvidence } from "./facet";
import { appliesTo, featureReferent, featuresOf, findEntity, isPerceptible, readFeature } from "./features";
import type { FeatureType } from "./features";
import { getMentalModel } from "./mind";
import type { BeliefFacet, Evidence, EvidenceOf, FeatureValue, IngestOutcome, MentalModel, Mind } from "./types";

export type FirstHandEvidence = EvidenceOf<"reflection" | "observation" | "implant">;

export function getOrCreateMentalModel(world: World, mind: Mind, subject: EntityId): MentalModel {
  const existing = getMentalModel(mind, subject);
  if (existing) return existing;
  const entity = findEntity(world, subject);
  if (!entity) throw new ContractViolation(`${mind.owner} cannot model ${subject}, which does not exist`);
  const model: MentalModel = { owner: mind.owner, subject, subjectKind: entity.kind, facets: {} };
  mind.models[subject] = model;
  return model;
}

export function getOrCreateFacet(world: World, mind: Mind, model: MentalModel, feature: FeatureType): BeliefFacet {
  const existing = model.facets[feature];
  if (existing) return existing;
  if (!appliesTo(feature, model.subjectKind)) {
    throw new ContractViolation(`${feature} is not a feature of a ${model.subjectKind}`);
  }
  const facet = createFacet(mind.owner, model.subject, feature, world.clock.tick);
  model.facets[feature] = facet;
  mind.facets.push(facet);
  return facet;
}

/** Hand one asserted value to the owner's facet for (subject, feature). */
export function receive(
  world: World,
  owner: PersonId,
  subject: EntityId,
  feature: FeatureType,
  value: FeatureValue,
  objectId: EntityId | null,
  piece: Evidence
): IngestOutcome {
  const person = world.people[owner];
  if (!person) throw new ContractViolation(`${owner} is not a person in this world`);
  const model = getOrCreateMentalModel(world, person.mind, subject);
  const facet = getOrCreateFacet(world, person.mind, model, feature);
  return considerNewEvidence(world, facet, value, objectId, piece);
}

function atWorkOnShift(world: World, p: Person): boolean {
  if (!p.occupation || p.locationId !== p.occupation.workplaceId) return false;
  return p.occupation.shift === tickToTimeOfDay(world.clock.tick);
}

/** Features a piece of first-hand evidence tells its source about. */
export function featuresTouched(world: World, piece: FirstHandEvidence): FeatureType[] {
  const subject = findEntity(world, piece.subject);
  if (!subject) return [];
  if (piece.kind !== "observation" || subject.kind === "place") return [...featuresOf(subject.kind)];

  const features = featuresOf("person").filter(isPerceptible);
  if (atWorkOnShift(world, subject)) features.push("workplace", "job title", "job shift");
  if (subject.locationId === subject.homeId) features.push("home", "home address");
  return features;
}

/** Route a reflection, observation or implant to every facet it touches. */
export function buildUp(world: World, mind: Mind, piece: FirstHandEvidence): IngestOutcome[] {
  if (piece.source !== mind.owner) {
    throw new ContractViolation(`${piece.kind} #${piece.eventNumber} belongs to ${piece.source}, not ${mind.owner}`);
  }
  const subject = findEntity(world, piece.subject);
  if (!subject) return [];
  const outcomes: IngestOutcome[] = [];
  for (const feature of featuresTouched(world, piece)) {
    const value = readFeature(world, subject, feature);
    if (value === null) continue;
    outcomes.push(receive(world, mind.owner, piece.subject, feature, value, featureReferent(subject, feature), piece));
  }
  return outcomes;
}

/** People the owner believes work at the given business. */
export function believedEmployees(mind: Mind, companyId: PlaceId): PersonId[] {
  const out: PersonId[] = [];
  for (const model of Object.values(mind.models)) {
    if (model.subjectKind !== "person") continue;
    const workplace = model.facets.workplace;
    if (workplace && workplace.value !== null && workplace.objectId === companyId) out.push(model.subject);
  }
  return out;
}
