/**
 * Transmission: what people tell each other, and what bystanders overhear.
 *
 * A conversation picks the subjects most salient to both parties, then each party
 * takes a turn per subject. On a turn every feature rolls to come up; the talker
 * conveys what they believe (or lies about it), the listener ingests it, the talker
 * reinforces their own belief by having said it, and an eavesdropper may overhear.
 */

import type { EntityId, Person, PlaceId, World } from "../types";
import { getConfig } from "../config";
import type { RandomSource } from "../rng";
import { updateSalienceOf, salienceOf } from "../salience";
import { clamp } from "../util";
import { ageOf, housemates, isInTown, peopleAt } from "../world";
import { ContractViolation } from "./errors";
import { recordEvidence } from "./evidence";
import { appliesTo, featuresOf, findEntity, isFeatureType } from "./features";
import type { FeatureType } from "./features";
import { receive } from "./mentalModel";
import { getMentalModel, knownEntities } from "./mind";
import type { EvidenceOf, IngestOutcome, TellerStrengths } from "./types";
import { alternativeValue, referentFor } from "./variants";

export type ConveyedFeature = {
  feature: FeatureType;
  value: string;
  objectId: EntityId | null;
  // Strength put behind the value: the talker's own, or the sold strength of a lie.
  strength: number;
  lie: boolean;
};

export type TopicExchange = {
  talker: string;
  listener: string;
  subject: EntityId;
  conveyed: ConveyedFeature[];
  statement: EvidenceOf<"statement"> | null;
  declaration: EvidenceOf<"declaration"> | null;
  lie: EvidenceOf<"lie"> | null;
  eavesdropping: EvidenceOf<"eavesdropping"> | null;
  // The listener's facets, in conveyed order.
  outcomes: IngestOutcome[];
};

export type Conversation = {
  a: string;
  b: string;
  locationId: PlaceId | null;
  topics: EntityId[];
  exchanges: TopicExchange[];
};

// -----------------------------------------------------------------------------
// Topics
// -----------------------------------------------------------------------------

export function topicCount(a: Person, b: Person): number {
  const { tuning, limits } = getConfig();
  const raw =
    a.personality.extroversion +
    b.personality.extroversion +
    (a.friendIds.includes(b.id) ? 2 : 0) +
    (b.friendIds.includes(a.id) ? 2 : 0) +
    (a.bestFriendId === b.id ? 1 : 0) +
    (b.bestFriendId === a.id ? 1 : 0);
  return clamp(Math.floor(raw), tuning.topicsFloor, Math.max(tuning.topicsFloor, limits.maxTopicsPerConversation));
}

/** Entities either party knows about, most salient to both first, ties by id. */
export function selectTopics(a: Person, b: Person, count: number): EntityId[] {
  const ids = new Set([...knownEntities(a.mind), ...knownEntities(b.mind)]);
  return [...ids]
    .map((id) => ({ id, score: salienceOf(a, id) + salienceOf(b, id) }))
    .sort((x, y) => y.score - x.score || x.id.localeCompare(y.id))
    .slice(0, Math.max(0, count))
    .map((s) => s.id);
}

// -----------------------------------------------------------------------------
// Turns
// -----------------------------------------------------------------------------

function lieChance(talker: Person): number {
  const base = getConfig().tuning.chanceOfLyingPerFeature;
  return clamp(base * (1 - talker.personality.agreeableness), 0, 1);
}

function strengthsOf(conveyed: ConveyedFeature[]): TellerStrengths {
  const out: TellerStrengths = {};
  for (const c of conveyed) out[c.feature] = c.strength;
  return out;
}

function pickEavesdropper(world: World, talker: Person, listener: Person, rng: RandomSource): Person | null {
  if (talker.locationId === null) return null;
  const inEarshot = peopleAt(world, talker.locationId).filter((p) => p.id !== talker.id && p.id !== listener.id);
  if (!inEarshot.length || !rng.chance(getConfig().tuning.chanceSomeoneEavesdrops)) return null;
  return rng.pick(inEarshot);
}

/**
 * Record the evidence for one turn and hand it to everyone involved. Strengths are
 * captured in `conveyed` before the talker's declaration reinforces them.
 */
function deliver(
  world: World,
  talker: Person,
  listener: Person,
  subject: EntityId,
  conveyed: ConveyedFeature[],
  rng: RandomSource
): TopicExchange {
  const truthful = conveyed.filter((c) => !c.lie);
  const lied = conveyed.filter((c) => c.lie);
  const parties = { subject, source: talker.id, recipient: listener.id };

  const statement = truthful.length
    ? recordEvidence(world, { kind: "statement", ...parties, tellerBeliefStrength: strengthsOf(truthful) })
    : null;
  const declaration = truthful.length ? recordEvidence(world, { kind: "declaration", ...parties }) : null;
  const lie = lied.length
    ? recordEvidence(world, { kind: "lie", ...parties, tellerBeliefStrength: strengthsOf(lied) })
    : null;
  const eavesdropper = pickEavesdropper(world, talker, listener, rng);
  const eavesdropping = eavesdropper
    ? recordEvidence(world, {
        kind: "eavesdropping",
        ...parties,
        eavesdropper: eavesdropper.id,
        tellerBeliefStrength: strengthsOf(conveyed)
      })
    : null;

  const outcomes: IngestOutcome[] = [];
  for (const c of conveyed) {
    const piece = c.lie ? lie : statement;
    if (!piece) continue;
    outcomes.push(receive(world, listener.id, subject, c.feature, c.value, c.objectId, piece));
    if (!c.lie && declaration) receive(world, talker.id, subject, c.feature, c.value, c.objectId, declaration);
    if (eavesdropper && eavesdropping) {
      receive(world, eavesdropper.id, subject, c.feature, c.value, c.objectId, eavesdropping);
    }
  }

  return { talker: talker.id, listener: listener.id, subject, conveyed, statement, declaration, lie, eavesdropping, outcomes };
}

/** One talker's turn on one subject; null when nothing came up that the talker knows. */
export function takeTurn(
  world: World,
  talker: Person,
  listener: Person,
  subject: EntityId,
  rng: RandomSource
): TopicExchange | null {
  const entity = findEntity(world, subject);
  if (!entity) return null;
  const tuning = getConfig().tuning;
  const model = getMentalModel(talker.mind, subject);

  const conveyed: ConveyedFeature[] = [];
  for (const feature of featuresOf(entity.kind)) {
    if (!rng.chance(tuning.featureComesUpInConversation[feature])) continue;
    const facet = model?.facets[feature];
    if (!facet || facet.value === null) continue;

    if (rng.chance(lieChance(talker))) {
      const fake = alternativeValue(world, talker.id, subject, feature, facet.value, rng);
      if (fake !== null) {
        conveyed.push({
          feature,
          value: fake,
          objectId: referentFor(world, feature, fake),
          strength: Math.max(facet.strength, tuning.lieSoldStrength),
          lie: true
        });
        continue;
      }
    }
    conveyed.push({ feature, value: facet.value, objectId: facet.objectId, strength: facet.strength, lie: false });
  }

  if (!conveyed.length) return null;
  return deliver(world, talker, listener, subject, conveyed, rng);
}

export function exchangeInformation(world: World, a: Person, b: Person, rng: RandomSource): Conversation {
  const topics = selectTopics(a, b, topicCount(a, b));
  const exchanges: TopicExchange[] = [];
  for (const subject of topics) {
    for (const [talker, listener] of [
      [a, b],
      [b, a]
    ] as const) {
      const exchange = takeTurn(world, talker, listener, subject, rng);
      if (exchange) exchanges.push(exchange);
    }
  }
  return { a: a.id, b: b.id, locationId: a.locationId, topics, exchanges };
}

/**
 * Deliberately tell a listener false values about a subject. The lie is sold at
 * `max(liar's own strength, lieSoldStrength)` per feature. At least one value must
 * be given, and none may be what the liar believes.
 */
export function tellLie(
  world: World,
  liar: Person,
  listener: Person,
  subject: EntityId,
  values: Partial<Record<FeatureType, string>>,
  rng: RandomSource
): TopicExchange {
  const entity = findEntity(world, subject);
  if (!entity) throw new ContractViolation(`${liar.id} cannot lie about ${subject}, which does not exist`);
  for (const key of Object.keys(values)) {
    if (!isFeatureType(key) || !appliesTo(key, entity.kind)) {
      throw new ContractViolation(`${key} is not a feature of a ${entity.kind}`);
    }
  }

  const { lieSoldStrength } = getConfig().tuning;
  const model = getMentalModel(liar.mind, subject);
  const conveyed: ConveyedFeature[] = [];
  for (const feature of featuresOf(entity.kind)) {
    const value = values[feature];
    if (value === undefined) continue;
    const held = model?.facets[feature];
    if (held && held.value === value) {
      throw new ContractViolation(`${liar.id} believes ${subject}'s ${feature} is ${value}; saying so is no lie`);
    }
    const own = held?.strength ?? 0;
    conveyed.push({
      feature,
      value,
      objectId: referentFor(world, feature, value),
      strength: Math.max(own, lieSoldStrength),
      lie: true
    });
  }
  if (!conveyed.length) throw new ContractViolation(`${liar.id} told ${listener.id} nothing about ${subject}`);
  return deliver(world, liar, listener, subject, conveyed, rng);
}

// -----------------------------------------------------------------------------
// Social contact
// -----------------------------------------------------------------------------

function progressRelationship(world: World, a: Person, b: Person, missingDays: number): void {
  for (const [self, other] of [
    [a, b],
    [b, a]
  ] as const) {
    let rel = self.relationships[other.id];
    if (!rel) {
      rel = { totalInteractions: 0, lastInteractionTick: null };
      self.relationships[other.id] = rel;
      updateSalienceOf(self, other.id, "acquaintance");
    }
    rel.totalInteractions += missingDays;
    rel.lastInteractionTick = world.clock.tick;
    updateSalienceOf(self, other.id, "interaction", missingDays);
  }
}

export function interactedThisTimestep(world: World, a: Person, b: Person): boolean {
  return a.relationships[b.id]?.lastInteractionTick === world.clock.tick;
}

/**
 * Social contact between two people. Progresses the relationship by `missingDays`
 * interactions; only a live contact (`missingDays === 1`) exchanges information.
 * Null when the pair cannot or already did interact this timestep.
 */
export function socialize(
  world: World,
  a: Person,
  b: Person,
  rng: RandomSource,
  missingDays = 1
): Conversation | null {
  if (!Number.isInteger(missingDays) || missingDays < 1) throw new Error("missingDays must be an integer >= 1");
  if (a.id === b.id || !isInTown(a) || !isInTown(b)) return null;
  if (a.locationId !== b.locationId && a.homeId !== b.homeId) return null;
  if (interactedThisTimestep(world, a, b)) return null;

  progressRelationship(world, a, b, missingDays);
  if (missingDays !== 1) return { a: a.id, b: b.id, locationId: a.locationId, topics: [], exchanges: [] };
  return exchangeInformation(world, a, b, rng);
}

/** Whether `person` starts a conversation with `other`. */
export function decideToInstigate(world: World, person: Person, other: Person, rng: RandomSource): boolean {
  const t = getConfig().tuning;
  if (other.id === person.id || ageOf(world, other) < t.minimumAgeToSocialize) return false;

  const extroversion = clamp(person.personality.extroversion, t.instigationExtroversionFloor, t.instigationExtroversionCap);
  let second: number;
  if (person.relationships[other.id]) {
    second = 0;
    if (person.friendIds.includes(other.id)) second += t.instigationFriendship;
    if (person.bestFriendId === other.id) second += t.instigationBestFriend;
  } else {
    second = clamp(person.personality.openness, t.instigationOpennessFloor, t.instigationOpennessCap);
  }
  return rng.chance(clamp(extroversion + second, t.instigationChanceFloor, t.instigationChanceCap));
}

/**
 * Socialize with whoever is here, then with housemates wherever they are (so that
 * people on opposite shifts still know their own family).
 */
export function socializeAtLocation(world: World, person: Person, rng: RandomSource, missingDays = 1): Conversation[] {
  if (!isInTown(person) || person.locationId === null) return [];
  const out: Conversation[] = [];
  for (const other of peopleAt(world, person.locationId)) {
    if (other.id === person.id || !decideToInstigate(world, person, other, rng)) continue;
    const conversation = socialize(world, person, other, rng, missingDays);
    if (conversation) out.push(conversation);
  }
  for (const mate of housemates(world, person)) {
    const conversation = socialize(world, person, mate, rng, missingDays);
    if (conversation) out.push(conversation);
  }
  return out;
}
