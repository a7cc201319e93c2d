/**
 * Feature registry.
 *
 * Every believable attribute of a person or place is a member of FeatureType.
 * Ground truth is read through a dispatch table built once at load time, so adding
 * a feature without an accessor is a compile error.
 */

import type { Entity, EntityId, EntityKind, Person, Place, World } from "../types";
import { currentYear } from "../clock";

export const PERSON_FEATURES = [
  "first name",
  "middle name",
  "last name",
  "sex",
  "status",
  "marital status",
  "approximate age",
  "workplace",
  "job title",
  "job shift",
  "home",
  "home address",
  "hair color",
  "hair length",
  "eye color",
  "skin color",
  "facial hair",
  "glasses",
  "tattoo"
] as const;

export const PLACE_FEATURES = ["address", "block", "apartment"] as const;

export type PersonFeature = (typeof PERSON_FEATURES)[number];
export type PlaceFeature = (typeof PLACE_FEATURES)[number];
export type FeatureType = PersonFeature | PlaceFeature;

export const FEATURE_TYPES: readonly FeatureType[] = [...PERSON_FEATURES, ...PLACE_FEATURES];

function listed(list: readonly string[], x: string): boolean {
  return list.includes(x);
}

export function isFeatureType(x: string): x is FeatureType {
  return listed(FEATURE_TYPES, x);
}

export function isPersonFeature(f: FeatureType): f is PersonFeature {
  return listed(PERSON_FEATURES, f);
}

export function isPlaceFeature(f: FeatureType): f is PlaceFeature {
  return listed(PLACE_FEATURES, f);
}

type FeatureSpec<E extends Entity> = {
  read: (entity: E, world: World) => string | null;
  // Seen at a glance whenever the entity is observed.
  perceptible: boolean;
  // For values that name another entity (a workplace, a home).
  refersTo?: (entity: E) => EntityId | null;
};

const NONE = "none";

function placeName(world: World, id: EntityId | undefined): string | null {
  if (!id) return null;
  return world.places[id]?.name ?? null;
}

function appearance(feature: keyof Person["appearance"]): FeatureSpec<Person> {
  return { read: (p) => p.appearance[feature], perceptible: true };
}

const PERSON_TABLE: { [F in PersonFeature]: FeatureSpec<Person> } = {
  "first name": { read: (p) => p.firstName, perceptible: false },
  "middle name": { read: (p) => p.middleName ?? NONE, perceptible: false },
  "last name": { read: (p) => p.lastName, perceptible: false },
  sex: { read: (p) => p.sex, perceptible: true },
  status: { read: (p) => p.status, perceptible: false },
  "marital status": { read: (p) => p.maritalStatus, perceptible: false },
  "approximate age": {
    read: (p, world) => {
      const age = Math.max(0, currentYear(world.clock) - p.birthYear);
      return `${Math.floor(age / 10) * 10}s`;
    },
    perceptible: true
  },
  workplace: {
    read: (p, world) => (p.occupation ? placeName(world, p.occupation.workplaceId) : NONE),
    perceptible: false,
    refersTo: (p) => p.occupation?.workplaceId ?? null
  },
  "job title": { read: (p) => p.occupation?.jobTitle ?? NONE, perceptible: false },
  "job shift": { read: (p) => p.occupation?.shift ?? NONE, perceptible: false },
  home: {
    read: (p, world) => placeName(world, p.homeId),
    perceptible: false,
    refersTo: (p) => p.homeId
  },
  "home address": { read: (p, world) => world.places[p.homeId]?.address ?? null, perceptible: false },
  "hair color": appearance("hair color"),
  "hair length": appearance("hair length"),
  "eye color": appearance("eye color"),
  "skin color": appearance("skin color"),
  "facial hair": appearance("facial hair"),
  glasses: appearance("glasses"),
  tattoo: appearance("tattoo")
};

const PLACE_TABLE: { [F in PlaceFeature]: FeatureSpec<Place> } = {
  address: { read: (p) => p.address, perceptible: true },
  block: { read: (p) => p.block, perceptible: true },
  apartment: { read: (p) => (p.apartment ? "yes" : "no"), perceptible: true }
};

export function featuresOf(kind: EntityKind): readonly FeatureType[] {
  return kind === "person" ? PERSON_FEATURES : PLACE_FEATURES;
}

export function appliesTo(feature: FeatureType, kind: EntityKind): boolean {
  return kind === "person" ? isPersonFeature(feature) : isPlaceFeature(feature);
}

/** Live ground truth for an entity's feature; null when the feature does not apply. */
export function readFeature(world: World, entity: Entity, feature: FeatureType): string | null {
  if (entity.kind === "person") {
    return isPersonFeature(feature) ? PERSON_TABLE[feature].read(entity, world) : null;
  }
  return isPlaceFeature(feature) ? PLACE_TABLE[feature].read(entity, world) : null;
}

export function featureReferent(entity: Entity, feature: FeatureType): EntityId | null {
  if (entity.kind === "person") {
    if (!isPersonFeature(feature)) return null;
    return PERSON_TABLE[feature].refersTo?.(entity) ?? null;
  }
  return null;
}

export function isPerceptible(feature: FeatureType): boolean {
  return isPersonFeature(feature) ? PERSON_TABLE[feature].perceptible : PLACE_TABLE[feature].perceptible;
}

export function findEntity(world: World, id: EntityId): Entity | null {
  return world.people[id] ?? world.places[id] ?? null;
}
