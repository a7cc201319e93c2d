/**
 * Evidence weighting.
 *
 * The weight of a new piece of evidence is what decides whether it founds, reinforces
 * or supplants a belief. It is a single swappable function so the formula can be
 * tuned and tested apart from the aggregation rules in ./facet.
 */

import type { World } from "../types";
import type { SimConfig } from "../config";
import { getConfig } from "../config";
import { clamp } from "../util";
import { isFirstHand, tellerStrengthFor } from "./evidence";
import type { FeatureType } from "./features";
import type { Evidence, EvidenceKind, EvidenceOf } from "./types";

export type WeighingContext = {
  kind: EvidenceKind;
  // 0..1, how believable the owner finds the source.
  credibility: number;
  // Strength carried in with the evidence (a teller's, or a backstory's); null when
  // the owner's own perception is the only basis.
  transmittedStrength: number | null;
  // Owner's memory attribute, 0..1.
  memory: number;
  // Lies the owner has caught from this source.
  distrust: number;
  config: SimConfig;
};

export type EvidenceWeigher = (ctx: WeighingContext) => number;

export const defaultEvidenceWeigher: EvidenceWeigher = (ctx) => {
  const { tuning } = ctx.config;
  const cap = tuning.strengthCap;
  const trust = tuning.evidenceTrust[ctx.kind];
  const basis = ctx.transmittedStrength === null ? 1 : clamp(ctx.transmittedStrength / cap, 0, 1);
  const memoryFactor = 0.5 + 0.5 * clamp(ctx.memory, 0, 1);
  const discount = Math.pow(tuning.liarDiscount, Math.max(0, ctx.distrust));
  return clamp(cap * trust * clamp(ctx.credibility, 0, 1) * basis * memoryFactor * discount, 0, cap);
};

let currentWeigher: EvidenceWeigher = defaultEvidenceWeigher;

export function getEvidenceWeigher(): EvidenceWeigher {
  return currentWeigher;
}

export function setEvidenceWeigher(weigher: EvidenceWeigher): void {
  currentWeigher = weigher;
}

export function resetEvidenceWeigher(): void {
  currentWeigher = defaultEvidenceWeigher;
}

/**
 * Credibility of a source in the owner's eyes. Self-sourced evidence is fully
 * credible; others earn credibility through salience.
 */
export function sourceCredibility(world: World, ownerId: string, sourceId: string, config: SimConfig): number {
  if (ownerId === sourceId) return 1;
  const owner = world.people[ownerId];
  const s = owner?.salience[sourceId] ?? 0;
  const base = config.tuning.baseCredibility;
  return base + (1 - base) * (s / (s + 1));
}

/** Backstory knowledge is as strong as the relationship that would have produced it. */
export function implantStrength(piece: EvidenceOf<"implant">, config: SimConfig): number {
  const fraction = 0.3 + 0.1 * piece.salienceOfSubject + 0.02 * piece.totalInteractions;
  return config.tuning.strengthCap * clamp(fraction, 0, 1);
}

export function buildWeighingContext(
  world: World,
  ownerId: string,
  feature: FeatureType,
  piece: Evidence,
  config: SimConfig = getConfig()
): WeighingContext {
  const owner = world.people[ownerId];
  const kind = piece.kind;
  return {
    kind,
    credibility: isFirstHand(kind) ? 1 : sourceCredibility(world, ownerId, piece.source, config),
    transmittedStrength: piece.kind === "implant" ? implantStrength(piece, config) : tellerStrengthFor(piece, feature),
    memory: owner?.memory ?? 0.5,
    distrust: owner?.mind.distrust[piece.source] ?? 0,
    config
  };
}

export function weighEvidence(world: World, ownerId: string, feature: FeatureType, piece: Evidence): number {
  const config = getConfig();
  return currentWeigher(buildWeighingContext(world, ownerId, feature, piece, config));
}
