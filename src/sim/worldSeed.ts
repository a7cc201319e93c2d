import town from "../../data/town.json";
import { Rng } from "./rng";
import { seedSalience } from "./salience";
import type { LifeStatus, MaritalStatus, Occupation, PlaceKind, Sex, Shift, World } from "./types";
import { addPerson, addPlace, createEmptyWorld } from "./world";
import { implantKnowledge } from "./epistemics/implant";

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, field: string): T | undefined {
  if (value === undefined) return undefined;
  const found = allowed.find((a) => a === value);
  if (found === undefined) throw new Error(`town.json: invalid ${field} "${value}"`);
  return found;
}

function required<T>(value: T | undefined, field: string): T {
  if (value === undefined) throw new Error(`town.json: missing ${field}`);
  return value;
}

const SEXES: readonly Sex[] = ["m", "f"];
const STATUSES: readonly LifeStatus[] = ["alive", "dead", "departed"];
const MARITAL: readonly MaritalStatus[] = ["single", "married", "divorced", "widowed"];
const PLACE_KINDS: readonly PlaceKind[] = ["residence", "business"];
const SHIFTS: readonly Shift[] = ["day", "night"];

function occupationOf(raw: { workplaceId: string; jobTitle: string; shift: string } | undefined): Occupation | null {
  if (!raw) return null;
  return { workplaceId: raw.workplaceId, jobTitle: raw.jobTitle, shift: required(oneOf(SHIFTS, raw.shift, "shift"), "shift") };
}

/**
 * Create the town from data/town.json, then fast-forward backstory: everyone
 * gets initial salience and implanted knowledge, drawn from `seed`.
 *
 * Tick cadence: 1 tick = 1 timestep (day or night).
 */
export function createTown(seed: number): World {
  const world = createEmptyWorld(seed, town.startYear, town.startOrdinalDate);

  for (const p of town.places) {
    addPlace(world, { ...p, kind: required(oneOf(PLACE_KINDS, p.kind, "place kind"), "place kind") });
  }

  for (const p of town.people) {
    addPerson(world, {
      ...p,
      sex: required(oneOf(SEXES, p.sex, "sex"), "sex"),
      status: oneOf(STATUSES, p.status, "status"),
      maritalStatus: oneOf(MARITAL, p.maritalStatus, "marital status"),
      occupation: occupationOf(p.occupation)
    });
  }

  const people = Object.values(world.people).sort((a, b) => a.id.localeCompare(b.id));
  for (const person of people) seedSalience(person);

  const rng = new Rng(seed >>> 0);
  for (const person of people) {
    if (person.status === "alive") implantKnowledge(world, person, rng);
  }
  return world;
}
