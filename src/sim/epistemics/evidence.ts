/**
 * Evidence ledger.
 *
 * A piece of evidence records one instance of perceiving, stating, distorting or
 * forgetting something about a subject. Pieces are stamped with the source's
 * location and the clock at creation time, take the next simulation-wide event
 * number, and never change afterwards except for `adjustedStrength`.
 */

import type { Entity, EntityId, Person, World } from "../types";
import { tickToTimeOfDay } from "../types";
import { describeTimestep, nextEventNumber, tickToOrdinalDate } from "../clock";
import { findEntity } from "./features";
import { ContractViolation } from "./errors";
import type { Evidence, EvidenceInput, EvidenceKind, EvidenceStamp, TellerStrengths } from "./types";

/** Kinds whose knowledge the source perceived or produced themselves. */
const FIRST_HAND_KINDS: ReadonlySet<EvidenceKind> = new Set(["reflection", "observation", "implant"]);

/** Kinds produced by memory going wrong rather than by perception or talk. */
const DISTORTION_KINDS: ReadonlySet<EvidenceKind> = new Set(["mutation", "transference", "confabulation"]);

export function isFirstHand(kind: EvidenceKind): boolean {
  return FIRST_HAND_KINDS.has(kind);
}

export function isDistortion(kind: EvidenceKind): boolean {
  return DISTORTION_KINDS.has(kind);
}

function requirePerson(world: World, id: EntityId, role: string): Person {
  const p = world.people[id];
  if (!p) throw new ContractViolation(`${role} ${id} is not a person in this world`);
  return p;
}

function requireEntity(world: World, id: EntityId, role: string): Entity {
  const e = findEntity(world, id);
  if (!e) throw new ContractViolation(`${role} ${id} does not exist in this world`);
  return e;
}

function checkStrengths(strengths: Readonly<TellerStrengths>): void {
  for (const [feature, s] of Object.entries(strengths)) {
    if (typeof s !== "number" || !Number.isFinite(s) || s < 0) {
      throw new ContractViolation(`teller belief strength for ${feature} must be a finite non-negative number`);
    }
  }
}

/** Per-kind structural invariants. Throws ContractViolation on the first failure. */
export function validateEvidence(world: World, input: EvidenceInput): void {
  const source = requirePerson(world, input.source, "source");
  const subject = requireEntity(world, input.subject, "subject");

  switch (input.kind) {
    case "reflection":
      if (input.subject !== input.source) {
        throw new ContractViolation(`${source.id} attempted to reflect about ${subject.id}, who is not themself`);
      }
      return;
    case "observation":
      if (subject.kind === "person") {
        if (!source.locationId || source.locationId !== subject.locationId) {
          throw new ContractViolation(`${source.id} attempted to observe ${subject.id}, who is in a different location`);
        }
      } else if (source.locationId !== subject.id) {
        throw new ContractViolation(`${source.id} attempted to observe ${subject.id}, but they are not located there`);
      }
      return;
    case "statement":
    case "lie":
      requirePerson(world, input.recipient, "recipient");
      if (input.recipient === input.source) {
        throw new ContractViolation(`${source.id} cannot be the recipient of their own ${input.kind}`);
      }
      checkStrengths(input.tellerBeliefStrength);
      return;
    case "declaration":
      requirePerson(world, input.recipient, "recipient");
      return;
    case "eavesdropping":
      requirePerson(world, input.recipient, "recipient");
      requirePerson(world, input.eavesdropper, "eavesdropper");
      if (input.eavesdropper === input.source || input.eavesdropper === input.recipient) {
        throw new ContractViolation(`eavesdropper ${input.eavesdropper} is a party to the conversation`);
      }
      checkStrengths(input.tellerBeliefStrength);
      return;
    case "mutation":
      if (!input.mutatedFrom) throw new ContractViolation("a mutation must name the value it replaced");
      return;
    case "transference":
      if (input.transferredFrom.owner !== input.source) {
        throw new ContractViolation(`${source.id} cannot transfer a facet held by ${input.transferredFrom.owner}`);
      }
      if (input.transferredFrom.subject === input.subject) {
        throw new ContractViolation("a transference must come from a different subject");
      }
      return;
    case "implant":
      if (input.totalInteractions < 0 || input.salienceOfSubject < 0) {
        throw new ContractViolation("implant interactions and salience must be non-negative");
      }
      return;
    case "confabulation":
    case "forgetting":
      return;
  }
}

/**
 * Validate, stamp and number a new piece of evidence. Validation happens before the
 * event number is taken, so rejected evidence never consumes one.
 */
export function recordEvidence<I extends EvidenceInput>(world: World, input: I): I & EvidenceStamp {
  validateEvidence(world, input);
  const source = requirePerson(world, input.source, "source");
  const tick = world.clock.tick;
  const stamp: EvidenceStamp = {
    locationId: source.locationId,
    tick,
    ordinalDate: tickToOrdinalDate(world.clock, tick),
    timeOfDay: tickToTimeOfDay(tick),
    eventNumber: nextEventNumber(world.clock),
    adjustedStrength: null
  };
  return { ...input, ...stamp };
}

export function freezeAdjustedStrength(piece: Evidence, strength: number): void {
  if (piece.adjustedStrength !== null) {
    throw new ContractViolation(`evidence #${piece.eventNumber} already carries an adjusted strength`);
  }
  piece.adjustedStrength = strength;
}

/** Strength the teller put behind a feature, for evidence that carries one. */
export function tellerStrengthFor(piece: Evidence, feature: keyof TellerStrengths): number | null {
  if (piece.kind === "statement" || piece.kind === "lie" || piece.kind === "eavesdropping") {
    return piece.tellerBeliefStrength[feature] ?? null;
  }
  return null;
}

// =============================================================================
// DESCRIPTION
// =============================================================================

export function entityName(world: World, id: EntityId): string {
  const e = findEntity(world, id);
  if (!e) return id;
  return e.kind === "person" ? `${e.firstName} ${e.lastName}` : e.name;
}

function reflexive(world: World, id: EntityId): string {
  const p = world.people[id];
  if (!p) return "themself";
  return p.sex === "m" ? "himself" : "herself";
}

function possessive(world: World, id: EntityId): string {
  const p = world.people[id];
  if (!p) return "their";
  return p.sex === "m" ? "his" : "her";
}

export function describeEvidence(world: World, piece: Evidence): string {
  const name = (id: EntityId) => entityName(world, id);
  const where = piece.locationId ? `at ${name(piece.locationId)}` : "away from town";
  const when = `${where} on ${describeTimestep(piece.tick)}`;

  switch (piece.kind) {
    case "eavesdropping":
      return `${name(piece.eavesdropper)}'s eavesdropping of ${name(piece.source)}'s statement to ${name(
        piece.recipient
      )} about ${name(piece.subject)} ${when}`;
    case "statement":
      return `${name(piece.source)}'s statement to ${name(piece.recipient)} about ${name(piece.subject)} ${when}`;
    case "declaration":
      return `${name(piece.source)}'s own statement (declaration) to ${name(piece.recipient)} about ${name(
        piece.subject
      )} ${when}`;
    case "lie":
      return `${name(piece.source)}'s lie to ${name(piece.recipient)} about ${name(piece.subject)} ${when}`;
    case "reflection":
      return `${name(piece.subject)}'s reflection about ${reflexive(world, piece.subject)} ${when}`;
    case "observation":
      return `${name(piece.source)}'s observation of ${name(piece.subject)} ${when}`;
    case "confabulation":
      return `${name(piece.source)}'s confabulation about ${name(piece.subject)} ${when}`;
    case "mutation":
      return `${name(piece.source)}'s mutation of ${possessive(world, piece.source)} mental model of ${name(
        piece.subject
      )} ${when}`;
    case "transference": {
      const pos = possessive(world, piece.source);
      return `${name(piece.source)}'s transference from ${pos} mental model of ${name(
        piece.transferredFrom.subject
      )} to ${pos} mental model of ${name(piece.subject)} ${when}`;
    }
    case "forgetting":
      return `${name(piece.source)}'s forgetting of knowledge about ${name(piece.subject)} ${when}`;
    case "implant":
      return `${name(piece.source)}'s backstory knowledge of ${name(piece.subject)} ${when}`;
  }
}
