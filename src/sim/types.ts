/**
 * Core simulation types.
 *
 * NOTE: The town is plain data keyed by string ids. Ground truth about people and
 * places lives on the entities themselves; what anyone *believes* lives only in that
 * person's Mind (see ./epistemics). Nothing outside a Mind points into it.
 *
 * Tick cadence: 1 tick = 1 timestep, 2 timesteps per day (day, then night).
 */

import type { Mind } from "./epistemics/types";

export type SimTick = number;

export type EntityId = string;
export type PersonId = EntityId;
export type PlaceId = EntityId;

export type TimeOfDay = "day" | "night";

export const TIMESTEPS_PER_DAY = 2;
export const DAYS_PER_YEAR = 365;

export function tickToDay(tick: SimTick): number {
  return Math.floor(tick / TIMESTEPS_PER_DAY);
}

export function tickToTimeOfDay(tick: SimTick): TimeOfDay {
  return tick % TIMESTEPS_PER_DAY === 0 ? "day" : "night";
}

export function daysToTicks(days: number): number {
  return days * TIMESTEPS_PER_DAY;
}

/**
 * Global clock. `eventCounter` is the simulation-wide monotonic counter that
 * orders evidence created within the same timestep.
 */
export type Clock = {
  tick: SimTick;
  eventCounter: number;
  startOrdinalDate: number;
  startYear: number;
};

export type Sex = "m" | "f";
export type LifeStatus = "alive" | "dead" | "departed";
export type MaritalStatus = "single" | "married" | "divorced" | "widowed";
export type Shift = "day" | "night";

export const APPEARANCE_FEATURES = [
  "hair color",
  "hair length",
  "eye color",
  "skin color",
  "facial hair",
  "glasses",
  "tattoo"
] as const;

export type AppearanceFeature = (typeof APPEARANCE_FEATURES)[number];

export type Appearance = Record<AppearanceFeature, string>;

// Big Five components are -1..1; interestInHistory is 0..1.
export type Personality = {
  openness: number;
  conscientiousness: number;
  extroversion: number;
  agreeableness: number;
  neuroticism: number;
  interestInHistory: number;
};

export type Occupation = {
  workplaceId: PlaceId;
  jobTitle: string;
  shift: Shift;
};

export type Relationship = {
  totalInteractions: number;
  lastInteractionTick: SimTick | null;
};

export type Person = {
  kind: "person";
  id: PersonId;
  firstName: string;
  middleName: string | null;
  lastName: string;
  sex: Sex;
  birthYear: number;
  status: LifeStatus;
  maritalStatus: MaritalStatus;
  appearance: Appearance;
  occupation: Occupation | null;
  homeId: PlaceId;
  // null while outside town (departed, dead).
  locationId: PlaceId | null;

  memory: number; // 0..1
  personality: Personality;

  friendIds: PersonId[];
  bestFriendId: PersonId | null;
  immediateFamilyIds: PersonId[];
  extendedFamilyIds: PersonId[];
  relationships: Record<PersonId, Relationship>;

  // How much each entity matters to this person (>= 0).
  salience: Record<EntityId, number>;

  mind: Mind;
};

export type PlaceKind = "residence" | "business";

export type Place = {
  kind: PlaceKind;
  id: PlaceId;
  name: string;
  address: string;
  block: string;
  apartment: boolean;
  ownerIds: PersonId[];
};

export type Entity = Person | Place;
export type EntityKind = Entity["kind"];

// Running counts for the current day, reset when the day ends.
export type DayTally = {
  conversations: number;
  lies: number;
  distortions: number;
};

export type World = {
  seed: number;
  clock: Clock;
  people: Record<PersonId, Person>;
  places: Record<PlaceId, Place>;
  tally: DayTally;
};

export type EventKind =
  | "sim.started"
  | "sim.day.ended"
  | "conversation.held"
  | "lie.told"
  | "memory.distorted"
  | "belief.forgotten"
  | "evidence.recorded";

export type EventVisibility = "public" | "private" | "system";

export type SimEvent = {
  id: string;
  tick: SimTick;
  kind: EventKind;
  visibility: EventVisibility;
  locationId?: PlaceId;
  message: string;
  data?: Record<string, unknown>;
};

export type DailySummary = {
  tick: SimTick;
  day: number;
  people: number;
  facets: number;
  accurateFacets: number;
  forgottenFacets: number;
  conversations: number;
  lies: number;
  distortions: number;
};

export type TickResult = {
  world: World;
  events: SimEvent[];
  dailySummary?: DailySummary; // only emitted at end-of-day
};
