/**
 * Backstory knowledge. Before the full simulation starts, people are given what
 * years of living in town would have taught them about the people and places
 * that matter to them.
 */

import type { EntityId, Person, World } from "../types";
import { getConfig } from "../config";
import type { RandomSource } from "../rng";
import { ageOf, isRelative } from "../world";
import { recordEvidence } from "./evidence";
import { buildUp } from "./mentalModel";
import type { EvidenceOf } from "./types";

function implantWillHappen(world: World, owner: Person, subjectId: EntityId, salience: number, rng: RandomSource): boolean {
  if (subjectId === owner.id || owner.immediateFamilyIds.includes(subjectId) || owner.friendIds.includes(subjectId)) {
    return true;
  }
  if (subjectId === owner.homeId || subjectId === owner.occupation?.workplaceId) return true;
  if (salience <= 0) return false;

  let chance = 1 - 1 / Math.max(1.01, salience);
  const subject = world.people[subjectId];
  // Townsfolk who are gone matter more to people interested in history.
  if (subject && subject.status !== "alive") chance *= 1 + owner.personality.interestInHistory;
  return rng.chance(chance);
}

/**
 * Implant knowledge about everyone the owner has a relationship with or any
 * salience for. Returns the implants recorded, in subject id order.
 */
export function implantKnowledge(world: World, owner: Person, rng: RandomSource): EvidenceOf<"implant">[] {
  if (ageOf(world, owner) < getConfig().tuning.minimumAgeForImplant) return [];

  const subjects = [...new Set([...Object.keys(owner.relationships), ...Object.keys(owner.salience)])].sort();
  const out: EvidenceOf<"implant">[] = [];
  for (const subjectId of subjects) {
    if (!world.people[subjectId] && !world.places[subjectId]) continue;
    const totalInteractions = owner.relationships[subjectId]?.totalInteractions ?? 0;
    let salience = owner.salience[subjectId] ?? 0;
    if (owner.relationships[subjectId] || isRelative(owner, subjectId)) salience += 1;
    if (!implantWillHappen(world, owner, subjectId, salience, rng)) continue;

    const piece = recordEvidence(world, {
      kind: "implant",
      subject: subjectId,
      source: owner.id,
      totalInteractions,
      salienceOfSubject: salience
    });
    buildUp(world, owner.mind, piece);
    out.push(piece);
  }
  return out;
}
