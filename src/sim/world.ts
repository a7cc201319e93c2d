/**
 * World construction and lookups shared by the engine, the town fixture and tests.
 */

import type {
  Appearance,
  LifeStatus,
  MaritalStatus,
  Occupation,
  Person,
  PersonId,
  Personality,
  Place,
  PlaceId,
  PlaceKind,
  Sex,
  World
} from "./types";
import { createClock, currentYear } from "./clock";
import { createMind } from "./epistemics/mind";

export const DEFAULT_START_YEAR = 1979;

export function createEmptyWorld(seed: number, startYear = DEFAULT_START_YEAR, startOrdinalDate = 0): World {
  if (!Number.isInteger(seed)) throw new Error("seed must be an integer");
  return {
    seed,
    clock: createClock(startYear, startOrdinalDate),
    people: {},
    places: {},
    tally: { conversations: 0, lies: 0, distortions: 0 }
  };
}

export const defaultAppearance: Appearance = {
  "hair color": "brown",
  "hair length": "short",
  "eye color": "brown",
  "skin color": "beige",
  "facial hair": "none",
  glasses: "no",
  tattoo: "no"
};

export const defaultPersonality: Personality = {
  openness: 0,
  conscientiousness: 0,
  extroversion: 0,
  agreeableness: 0,
  neuroticism: 0,
  interestInHistory: 0.5
};

export type PersonInit = {
  id: PersonId;
  firstName: string;
  lastName: string;
  sex: Sex;
  birthYear: number;
  homeId: PlaceId;
  middleName?: string | null;
  status?: LifeStatus;
  maritalStatus?: MaritalStatus;
  appearance?: Partial<Appearance>;
  occupation?: Occupation | null;
  locationId?: PlaceId | null;
  memory?: number;
  personality?: Partial<Personality>;
  friendIds?: PersonId[];
  bestFriendId?: PersonId | null;
  immediateFamilyIds?: PersonId[];
  extendedFamilyIds?: PersonId[];
};

export type PlaceInit = {
  id: PlaceId;
  kind: PlaceKind;
  name: string;
  address: string;
  block: string;
  apartment?: boolean;
  ownerIds?: PersonId[];
};

/** Add a person with an empty mind. New arrivals start at home. */
export function addPerson(world: World, init: PersonInit): Person {
  if (world.people[init.id] || world.places[init.id]) throw new Error(`duplicate entity id: ${init.id}`);
  const person: Person = {
    kind: "person",
    id: init.id,
    firstName: init.firstName,
    middleName: init.middleName ?? null,
    lastName: init.lastName,
    sex: init.sex,
    birthYear: init.birthYear,
    status: init.status ?? "alive",
    maritalStatus: init.maritalStatus ?? "single",
    appearance: { ...defaultAppearance, ...init.appearance },
    occupation: init.occupation ?? null,
    homeId: init.homeId,
    locationId: init.locationId === undefined ? init.homeId : init.locationId,
    memory: init.memory ?? 0.5,
    personality: { ...defaultPersonality, ...init.personality },
    friendIds: init.friendIds ?? [],
    bestFriendId: init.bestFriendId ?? null,
    immediateFamilyIds: init.immediateFamilyIds ?? [],
    extendedFamilyIds: init.extendedFamilyIds ?? [],
    relationships: {},
    salience: {},
    mind: createMind(init.id)
  };
  world.people[person.id] = person;
  return person;
}

export function addPlace(world: World, init: PlaceInit): Place {
  if (world.people[init.id] || world.places[init.id]) throw new Error(`duplicate entity id: ${init.id}`);
  const place: Place = {
    kind: init.kind,
    id: init.id,
    name: init.name,
    address: init.address,
    block: init.block,
    apartment: init.apartment ?? false,
    ownerIds: init.ownerIds ?? []
  };
  world.places[place.id] = place;
  return place;
}

export function ageOf(world: World, person: Person): number {
  return Math.max(0, currentYear(world.clock) - person.birthYear);
}

export function isInTown(person: Person): boolean {
  return person.status === "alive" && person.locationId !== null;
}

/** People in town at a place, in id order. */
export function peopleAt(world: World, placeId: PlaceId): Person[] {
  return Object.values(world.people)
    .filter((p) => isInTown(p) && p.locationId === placeId)
    .sort((a, b) => a.id.localeCompare(b.id));
}

/** Other living residents of a person's home, wherever they are right now. */
export function housemates(world: World, person: Person): Person[] {
  return Object.values(world.people)
    .filter((p) => p.id !== person.id && p.status === "alive" && p.homeId === person.homeId)
    .sort((a, b) => a.id.localeCompare(b.id));
}

export function placeByName(world: World, name: string): Place | null {
  for (const place of Object.values(world.places)) if (place.name === name) return place;
  return null;
}

export function isRelative(person: Person, otherId: PersonId): boolean {
  return person.immediateFamilyIds.includes(otherId) || person.extendedFamilyIds.includes(otherId);
}
