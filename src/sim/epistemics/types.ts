import type { EntityId, EntityKind, PersonId, PlaceId, SimTick, TimeOfDay } from "../types";
import type { FeatureType } from "./features";

/** Believed value of a feature; null is the empty/unknown marker. */
export type FeatureValue = string | null;

/** Addresses one facet inside one owner's mind without holding the facet itself. */
export type FacetRef = {
  owner: PersonId;
  subject: EntityId;
  feature: FeatureType;
};

export type TellerStrengths = Partial<Record<FeatureType, number>>;

// -----------------------------------------------------------------------------
// Evidence
// -----------------------------------------------------------------------------

export const EVIDENCE_KINDS = [
  "reflection",
  "observation",
  "confabulation",
  "lie",
  "statement",
  "declaration",
  "eavesdropping",
  "mutation",
  "transference",
  "forgetting",
  "implant"
] as const;

export type EvidenceKind = (typeof EVIDENCE_KINDS)[number];

type Base<K extends EvidenceKind> = {
  readonly kind: K;
  readonly subject: EntityId;
  readonly source: PersonId;
};

export type ReflectionInput = Base<"reflection">;
export type ObservationInput = Base<"observation">;
export type ConfabulationInput = Base<"confabulation">;
export type ForgettingInput = Base<"forgetting">;
export type LieInput = Base<"lie"> & {
  readonly recipient: PersonId;
  // How strongly the liar sold each feature.
  readonly tellerBeliefStrength: Readonly<TellerStrengths>;
};
export type StatementInput = Base<"statement"> & {
  readonly recipient: PersonId;
  readonly tellerBeliefStrength: Readonly<TellerStrengths>;
};
export type DeclarationInput = Base<"declaration"> & { readonly recipient: PersonId };
export type EavesdroppingInput = Base<"eavesdropping"> & {
  readonly recipient: PersonId;
  readonly eavesdropper: PersonId;
  readonly tellerBeliefStrength: Readonly<TellerStrengths>;
};
export type MutationInput = Base<"mutation"> & { readonly mutatedFrom: string };
export type TransferenceInput = Base<"transference"> & { readonly transferredFrom: Readonly<FacetRef> };
// Backstory knowledge pre-populated before the full simulation starts.
export type ImplantInput = Base<"implant"> & {
  readonly totalInteractions: number;
  readonly salienceOfSubject: number;
};

export type EvidenceInput =
  | ReflectionInput
  | ObservationInput
  | ConfabulationInput
  | LieInput
  | StatementInput
  | DeclarationInput
  | EavesdroppingInput
  | MutationInput
  | TransferenceInput
  | ForgettingInput
  | ImplantInput;

export type EvidenceStamp = {
  readonly locationId: PlaceId | null;
  readonly tick: SimTick;
  readonly ordinalDate: number;
  readonly timeOfDay: TimeOfDay;
  readonly eventNumber: number;
  // Written once, when this piece's belief is supplanted; seeds reinstatement.
  adjustedStrength: number | null;
};

export type Evidence = EvidenceInput & EvidenceStamp;

export type EvidenceOf<K extends EvidenceKind> = Extract<EvidenceInput, { kind: K }> & EvidenceStamp;

// -----------------------------------------------------------------------------
// Beliefs
// -----------------------------------------------------------------------------

export type FacetEffect = "established" | "reinforced" | "contradicted" | "supplanted" | "reinstated" | "forgotten";

export type FacetEvidence = {
  piece: Evidence;
  // The value this piece asserted for the facet's feature.
  value: FeatureValue;
  effect: FacetEffect;
  // Strength of this facet when this piece's value was supplanted. Kept per facet
  // because one piece (an observation, a statement) can support many facets.
  frozenStrength: number | null;
};

export type BeliefFacet = {
  owner: PersonId;
  subject: EntityId;
  feature: FeatureType;
  value: FeatureValue;
  // Entity the value names, for features like workplace and home.
  objectId: EntityId | null;
  strength: number;
  decayedThroughTick: SimTick;
  // Oldest first, never pruned.
  evidence: FacetEvidence[];
};

export type MentalModel = {
  owner: PersonId;
  subject: EntityId;
  subjectKind: EntityKind;
  facets: Partial<Record<FeatureType, BeliefFacet>>;
};

export type Mind = {
  owner: PersonId;
  models: Record<EntityId, MentalModel>;
  // Flat list of every facet in every model, for batched decay.
  facets: BeliefFacet[];
  // Lies this person has caught, per liar.
  distrust: Record<PersonId, number>;
};

export type IngestOutcome = {
  effect: FacetEffect;
  facet: BeliefFacet;
  previousValue: FeatureValue;
  previousStrength: number | null;
  weight: number;
};
