import type { EntityId, Person } from "./types";
import type { SalienceChange } from "./config";
import { getConfig } from "./config";

/** Add to a salience value; never below zero. */
export function updateSalienceOf(person: Person, entity: EntityId, change: SalienceChange | number, times = 1): number {
  const delta = typeof change === "number" ? change : getConfig().tuning.salienceIncrements[change];
  const next = Math.max(0, (person.salience[entity] ?? 0) + delta * times);
  person.salience[entity] = next;
  return next;
}

export function salienceOf(person: Person, entity: EntityId): number {
  return person.salience[entity] ?? 0;
}

/** Salience a person starts with: self, family, friends, home and workplace. */
export function seedSalience(person: Person): void {
  updateSalienceOf(person, person.id, "self");
  for (const id of person.immediateFamilyIds) updateSalienceOf(person, id, "immediateFamily");
  for (const id of person.extendedFamilyIds) updateSalienceOf(person, id, "extendedFamily");
  for (const id of person.friendIds) updateSalienceOf(person, id, "friend");
  if (person.bestFriendId) updateSalienceOf(person, person.bestFriendId, "friend");
  updateSalienceOf(person, person.homeId, "immediateFamily");
  if (person.occupation) updateSalienceOf(person, person.occupation.workplaceId, "acquaintance");
}
