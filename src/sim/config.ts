/**
 * Simulation configuration
 * Controls tuning parameters, limits and debug logging
 */

import type { EvidenceKind } from "./epistemics/types";
import type { FeatureType } from "./epistemics/features";

// =============================================================================
// CONFIGURATION TYPE
// =============================================================================

/** Complete simulation configuration */
export type SimConfig = {
  /** Tuning parameters */
  tuning: TuningParams;

  /** Performance limits */
  limits: PerformanceLimits;

  /** Debug options */
  debug: DebugOptions;
};

export type SalienceChange =
  | "self"
  | "immediateFamily"
  | "extendedFamily"
  | "ancestor"
  | "friend"
  | "acquaintance"
  | "interaction";

/** Tuning parameters */
export type TuningParams = {
  // Belief strength (same units as evidence weight)
  strengthFloor: number;
  strengthCap: number;
  strengthDecayPerDay: number;
  // Share of decay a perfect memory (1.0) prevents.
  memoryDecayProtection: number;
  // Fraction of a losing contradiction's weight taken off the standing belief.
  contradictionPenalty: number;

  // Evidence weighting
  evidenceTrust: Record<EvidenceKind, number>;
  baseCredibility: number;
  liarDiscount: number;
  lieSoldStrength: number;

  // Perception
  chanceSomeoneObservesNearbyEntity: number;

  // Daily routine
  chanceOfErrandWhenFree: number;

  // Conversation
  featureComesUpInConversation: Record<FeatureType, number>;
  chanceSomeoneEavesdrops: number;
  chanceOfLyingPerFeature: number;
  topicsFloor: number;
  minimumAgeToSocialize: number;
  instigationExtroversionFloor: number;
  instigationExtroversionCap: number;
  instigationOpennessFloor: number;
  instigationOpennessCap: number;
  instigationFriendship: number;
  instigationBestFriend: number;
  instigationChanceFloor: number;
  instigationChanceCap: number;

  // Memory noise (per facet per timestep, scaled by 1 - memory)
  mutationChance: number;
  transferenceChance: number;
  confabulationChance: number;

  // Salience
  salienceIncrements: Record<SalienceChange, number>;

  // Backstory
  minimumAgeForImplant: number;
};

/** Performance limits */
export type PerformanceLimits = {
  maxTopicsPerConversation: number;
  maxFacetsPerDistortionPass: number;
};

/** Debug options */
export type DebugOptions = {
  logEvidence: boolean;
  logConversations: boolean;
  logDistortions: boolean;
  logForgetting: boolean;
};

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const defaultEvidenceTrust: Record<EvidenceKind, number> = {
  reflection: 1.0,
  observation: 0.9,
  implant: 0.8,
  statement: 0.6,
  // The listener cannot tell a lie from a statement.
  lie: 0.6,
  eavesdropping: 0.45,
  declaration: 0.2,
  confabulation: 0.5,
  mutation: 0.5,
  transference: 0.5,
  forgetting: 0
};

export const defaultFeatureComesUp: Record<FeatureType, number> = {
  "first name": 0.3,
  "middle name": 0.05,
  "last name": 0.3,
  sex: 0.05,
  status: 0.1,
  "marital status": 0.15,
  "approximate age": 0.1,
  workplace: 0.25,
  "job title": 0.2,
  "job shift": 0.05,
  home: 0.15,
  "home address": 0.1,
  "hair color": 0.1,
  "hair length": 0.05,
  "eye color": 0.05,
  "skin color": 0.05,
  "facial hair": 0.05,
  glasses: 0.05,
  tattoo: 0.1,
  address: 0.2,
  block: 0.1,
  apartment: 0.05
};

/** Default tuning parameters */
export const defaultTuning: TuningParams = {
  // Belief strength
  strengthFloor: 5,
  strengthCap: 100,
  strengthDecayPerDay: 0.5,
  memoryDecayProtection: 0.8,
  contradictionPenalty: 0.25,

  // Evidence weighting
  evidenceTrust: defaultEvidenceTrust,
  baseCredibility: 0.6,
  liarDiscount: 0.5,
  lieSoldStrength: 75,

  // Perception
  chanceSomeoneObservesNearbyEntity: 0.5,

  // Daily routine
  chanceOfErrandWhenFree: 0.35,

  // Conversation
  featureComesUpInConversation: defaultFeatureComesUp,
  chanceSomeoneEavesdrops: 0.1,
  chanceOfLyingPerFeature: 0.02,
  topicsFloor: 1,
  minimumAgeToSocialize: 5,
  instigationExtroversionFloor: 0.05,
  instigationExtroversionCap: 0.7,
  instigationOpennessFloor: 0.05,
  instigationOpennessCap: 0.3,
  instigationFriendship: 0.2,
  instigationBestFriend: 0.2,
  instigationChanceFloor: 0.05,
  instigationChanceCap: 0.9,

  // Memory noise
  mutationChance: 0.002,
  transferenceChance: 0.001,
  confabulationChance: 0.002,

  // Salience
  salienceIncrements: {
    self: 5,
    immediateFamily: 2,
    extendedFamily: 1,
    ancestor: 0.3,
    friend: 1,
    acquaintance: 0.5,
    interaction: 0.05
  },

  // Backstory
  minimumAgeForImplant: 4
};

/** Default performance limits */
export const defaultLimits: PerformanceLimits = {
  maxTopicsPerConversation: 8,
  maxFacetsPerDistortionPass: 200
};

/** Default debug options */
export const defaultDebug: DebugOptions = {
  logEvidence: false,
  logConversations: true,
  logDistortions: true,
  logForgetting: true
};

/** Default complete configuration */
export const defaultConfig: SimConfig = {
  tuning: defaultTuning,
  limits: defaultLimits,
  debug: defaultDebug
};

// =============================================================================
// CONFIGURATION HELPERS
// =============================================================================

/** Config override type allowing partial nested objects */
export type SimConfigOverrides = {
  tuning?: Partial<TuningParams>;
  limits?: Partial<PerformanceLimits>;
  debug?: Partial<DebugOptions>;
};

/** Create config with custom overrides */
export function createConfig(overrides: SimConfigOverrides = {}): SimConfig {
  return {
    tuning: { ...defaultTuning, ...overrides.tuning },
    limits: { ...defaultLimits, ...overrides.limits },
    debug: { ...defaultDebug, ...overrides.debug }
  };
}

/**
 * Create config for testing: no random memory noise, no lying, no eavesdropping,
 * so that tests opt into each source of randomness explicitly.
 */
export function createTestConfig(overrides: SimConfigOverrides = {}): SimConfig {
  return createConfig({
    tuning: {
      mutationChance: 0,
      transferenceChance: 0,
      confabulationChance: 0,
      chanceOfLyingPerFeature: 0,
      chanceSomeoneEavesdrops: 0,
      ...overrides.tuning
    },
    limits: overrides.limits,
    debug: {
      logEvidence: true,
      ...overrides.debug
    }
  });
}

// =============================================================================
// GLOBAL CONFIG (mutable singleton)
// =============================================================================

let currentConfig: SimConfig = defaultConfig;

/** Get current configuration */
export function getConfig(): SimConfig {
  return currentConfig;
}

/** Set current configuration */
export function setConfig(config: SimConfig): void {
  currentConfig = config;
}

/** Reset to default configuration */
export function resetConfig(): void {
  currentConfig = defaultConfig;
}
