import type { Person, PlaceId, World } from "./types";
import { tickToTimeOfDay } from "./types";
import { getConfig } from "./config";
import type { RandomSource } from "./rng";

/**
 * Where a person spends the current timestep: at work during their shift, otherwise
 * at home, except that people free during the day sometimes run an errand at a
 * business.
 */
export function routineLocation(world: World, person: Person, rng: RandomSource): PlaceId {
  const timeOfDay = tickToTimeOfDay(world.clock.tick);
  if (person.occupation && person.occupation.shift === timeOfDay) return person.occupation.workplaceId;
  if (timeOfDay === "day" && rng.chance(getConfig().tuning.chanceOfErrandWhenFree)) {
    const businesses = Object.values(world.places)
      .filter((p) => p.kind === "business")
      .map((p) => p.id)
      .sort();
    return rng.pick(businesses) ?? person.homeId;
  }
  return person.homeId;
}

/** Move everyone in town by routine, in id order. */
export function moveByRoutine(world: World, rng: RandomSource): void {
  const people = Object.values(world.people).sort((a, b) => a.id.localeCompare(b.id));
  for (const person of people) {
    if (person.status !== "alive" || person.locationId === null) continue;
    person.locationId = routineLocation(world, person, rng);
  }
}
