/**
 * Belief facets: one owner's aggregated belief about one feature of one subject.
 *
 * Rules:
 * - the first value-bearing evidence establishes the facet;
 * - agreeing evidence reinforces with diminishing returns, never past the cap;
 * - disagreeing evidence supplants only when its weight beats the current strength
 *   (memory distortions always supplant), otherwise it is logged and slightly
 *   weakens the standing belief;
 * - forgetting supplants with the unknown marker. The strength at the moment a value
 *   is supplanted is frozen so that the value can later be reinstated from there.
 */

import type { EntityId, SimTick, World } from "../types";
import { TIMESTEPS_PER_DAY } from "../types";
import { getConfig } from "../config";
import { clamp } from "../util";
import { ContractViolation } from "./errors";
import { freezeAdjustedStrength, isDistortion, isFirstHand, recordEvidence } from "./evidence";
import { findEntity, readFeature } from "./features";
import type { FeatureType } from "./features";
import { weighEvidence } from "./weighting";
import type { BeliefFacet, Evidence, FacetEffect, FacetEvidence, FeatureValue, IngestOutcome } from "./types";

const SUPPORTING: ReadonlySet<FacetEffect> = new Set(["established", "reinforced", "supplanted", "reinstated", "forgotten"]);

export function createFacet(owner: string, subject: EntityId, feature: FeatureType, tick: SimTick): BeliefFacet {
  return {
    owner,
    subject,
    feature,
    value: null,
    objectId: null,
    strength: getConfig().tuning.strengthFloor,
    decayedThroughTick: tick,
    evidence: []
  };
}

/** Corroboration: `s + w * (1 - s / cap)`, bounded to [floor, cap]. */
export function reinforcedStrength(strength: number, weight: number): number {
  const { strengthFloor, strengthCap } = getConfig().tuning;
  const gained = Math.max(0, weight) * (1 - strength / strengthCap);
  return clamp(strength + gained, strengthFloor, strengthCap);
}

function boundedStrength(weight: number): number {
  const { strengthFloor, strengthCap } = getConfig().tuning;
  return clamp(weight, strengthFloor, strengthCap);
}

/** Latest entry that supports the facet's current value. */
export function latestSupport(facet: BeliefFacet): FacetEvidence | null {
  for (let i = facet.evidence.length - 1; i >= 0; i--) {
    const entry = facet.evidence[i];
    if (entry.value === facet.value && SUPPORTING.has(entry.effect)) return entry;
  }
  return null;
}

/** Strength frozen the last time `value` was supplanted in this facet, if ever. */
export function frozenStrengthFor(facet: BeliefFacet, value: FeatureValue): number | null {
  for (let i = facet.evidence.length - 1; i >= 0; i--) {
    const entry = facet.evidence[i];
    if (entry.value === value && entry.frozenStrength !== null) return entry.frozenStrength;
  }
  return null;
}

function freezeCurrent(facet: BeliefFacet): void {
  const support = latestSupport(facet);
  if (!support) return;
  support.frozenStrength = facet.strength;
  if (support.piece.adjustedStrength === null) freezeAdjustedStrength(support.piece, facet.strength);
}

function push(facet: BeliefFacet, piece: Evidence, value: FeatureValue, effect: FacetEffect): void {
  facet.evidence.push({ piece, value, effect, frozenStrength: null });
}

/** Liars whose lies currently hold the facet's value up. */
function supportingLiars(facet: BeliefFacet): string[] {
  const liars = new Set<string>();
  for (const entry of facet.evidence) {
    if (entry.value === facet.value && SUPPORTING.has(entry.effect) && entry.piece.kind === "lie") {
      liars.add(entry.piece.source);
    }
  }
  return [...liars];
}

function noteCaughtLies(world: World, facet: BeliefFacet, liars: string[], piece: Evidence): void {
  if (!liars.length || !isFirstHand(piece.kind)) return;
  const owner = world.people[facet.owner];
  if (!owner) return;
  for (const liar of liars) owner.mind.distrust[liar] = (owner.mind.distrust[liar] ?? 0) + 1;
}

function forgetFacet(facet: BeliefFacet, piece: Evidence): IngestOutcome {
  const previousValue = facet.value;
  const previousStrength = facet.strength;
  if (facet.value !== null) {
    freezeCurrent(facet);
    facet.value = null;
    facet.objectId = null;
    facet.strength = getConfig().tuning.strengthFloor;
  }
  facet.decayedThroughTick = Math.max(facet.decayedThroughTick, piece.tick);
  push(facet, piece, null, "forgotten");
  return { effect: "forgotten", facet, previousValue, previousStrength, weight: 0 };
}

/**
 * Fold a new piece of evidence asserting `proposed` into the facet. Total for all
 * ordinary data; throws only when a forgetting carries a value or a non-forgetting
 * carries the unknown marker.
 */
export function considerNewEvidence(
  world: World,
  facet: BeliefFacet,
  proposed: FeatureValue,
  objectId: EntityId | null,
  piece: Evidence
): IngestOutcome {
  if (piece.kind === "forgetting") {
    if (proposed !== null) {
      throw new ContractViolation(`forgetting #${piece.eventNumber} may only support the unknown marker`);
    }
    return forgetFacet(facet, piece);
  }
  if (proposed === null) {
    throw new ContractViolation(`${piece.kind} #${piece.eventNumber} must assert a value`);
  }

  const weight = weighEvidence(world, facet.owner, facet.feature, piece);
  const previousValue = facet.value;
  const previousStrength = facet.value === null && facet.evidence.length === 0 ? null : facet.strength;
  const outcome = (effect: FacetEffect): IngestOutcome => ({ effect, facet, previousValue, previousStrength, weight });

  // Unknown (never known, or forgotten): any value establishes, reinstating if it was held before.
  if (facet.value === null) {
    const frozen = frozenStrengthFor(facet, proposed);
    const effect: FacetEffect = frozen === null ? "established" : "reinstated";
    facet.value = proposed;
    facet.objectId = objectId;
    facet.strength = frozen === null ? boundedStrength(weight) : reinforcedStrength(frozen, weight);
    facet.decayedThroughTick = Math.max(facet.decayedThroughTick, piece.tick);
    push(facet, piece, proposed, effect);
    return outcome(effect);
  }

  if (proposed === facet.value) {
    facet.strength = reinforcedStrength(facet.strength, weight);
    facet.objectId = facet.objectId ?? objectId;
    facet.decayedThroughTick = Math.max(facet.decayedThroughTick, piece.tick);
    push(facet, piece, proposed, "reinforced");
    return outcome("reinforced");
  }

  if (isDistortion(piece.kind) || weight > facet.strength) {
    const keptStrength = facet.strength;
    noteCaughtLies(world, facet, supportingLiars(facet), piece);
    freezeCurrent(facet);
    const frozen = frozenStrengthFor(facet, proposed);
    facet.value = proposed;
    facet.objectId = objectId;
    // A distorted memory feels as certain as the memory it replaced.
    if (isDistortion(piece.kind)) facet.strength = keptStrength;
    else facet.strength = frozen === null ? boundedStrength(weight) : reinforcedStrength(frozen, weight);
    facet.decayedThroughTick = Math.max(facet.decayedThroughTick, piece.tick);
    push(facet, piece, proposed, "supplanted");
    return outcome("supplanted");
  }

  const { strengthFloor, contradictionPenalty } = getConfig().tuning;
  facet.strength = Math.max(strengthFloor, facet.strength - weight * contradictionPenalty);
  push(facet, piece, proposed, "contradicted");
  return outcome("contradicted");
}

/**
 * Lose strength for the days elapsed since the facet was last supported or decayed.
 * Reaching the floor forgets the value through an implicit forgetting.
 */
export function decayFacet(world: World, facet: BeliefFacet, tick: SimTick): IngestOutcome | null {
  if (facet.value === null) {
    facet.decayedThroughTick = Math.max(facet.decayedThroughTick, tick);
    return null;
  }
  const elapsedDays = (tick - facet.decayedThroughTick) / TIMESTEPS_PER_DAY;
  if (elapsedDays <= 0) return null;

  const { strengthFloor, strengthDecayPerDay, memoryDecayProtection } = getConfig().tuning;
  const owner = world.people[facet.owner];
  const memory = clamp(owner?.memory ?? 0.5, 0, 1);
  const loss = strengthDecayPerDay * (1 - memory * memoryDecayProtection) * elapsedDays;

  facet.strength = Math.max(strengthFloor, facet.strength - loss);
  facet.decayedThroughTick = tick;
  if (facet.strength > strengthFloor) return null;

  const forgetting = recordEvidence(world, { kind: "forgetting", subject: facet.subject, source: facet.owner });
  return considerNewEvidence(world, facet, null, null, forgetting);
}

/** Compared against the subject's live ground truth at call time. */
export function facetIsAccurate(world: World, facet: BeliefFacet): boolean {
  if (facet.value === null) return false;
  const subject = findEntity(world, facet.subject);
  if (!subject) return false;
  return readFeature(world, subject, facet.feature) === facet.value;
}
