import test, { afterEach, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { createTestConfig, resetConfig, setConfig } from "../src/sim/config";
import { recordEvidence } from "../src/sim/epistemics/evidence";
import { decayFacet } from "../src/sim/epistemics/facet";
import { buildUp, receive } from "../src/sim/epistemics/mentalModel";
import { decayAll } from "../src/sim/epistemics/mind";
import { belief, beliefFacet } from "../src/sim/epistemics/queries";
import type { BeliefFacet } from "../src/sim/epistemics/types";
import type { World } from "../src/sim/types";
import { near, squareWorld } from "./helpers/town";

beforeEach(() => setConfig(createTestConfig()));
afterEach(() => resetConfig());

function observedHairColor(world: World): BeliefFacet {
  const piece = recordEvidence(world, { kind: "observation", subject: "s", source: "a" });
  buildUp(world, world.people.a.mind, piece);
  const facet = beliefFacet(world, "a", "s", "hair color");
  assert.ok(facet);
  return facet;
}

test("decay: no elapsed time, no change", () => {
  const world = squareWorld();
  const facet = observedHairColor(world);
  assert.equal(facet.strength, 67.5);
  assert.equal(decayFacet(world, facet, 0), null);
  assert.equal(facet.strength, 67.5);
  assert.equal(decayFacet(world, facet, 0), null);
  assert.equal(facet.strength, 67.5);
});

test("decay: linear in elapsed days, slowed by memory", () => {
  const world = squareWorld();
  const facet = observedHairColor(world);
  // 0.5 per day * (1 - 0.5 memory * 0.8 protection) = 0.3 per day
  decayFacet(world, facet, 2);
  assert.ok(near(facet.strength, 67.2));
  assert.equal(facet.decayedThroughTick, 2);
  decayFacet(world, facet, 3);
  assert.ok(near(facet.strength, 67.05));

  const sharp = squareWorld();
  sharp.people.a.memory = 1;
  const kept = observedHairColor(sharp);
  assert.equal(kept.strength, 90);
  decayFacet(sharp, kept, 20);
  // 0.5 * (1 - 0.8) = 0.1 per day, ten days
  assert.ok(near(kept.strength, 89));
});

test("decay: supporting evidence restarts the clock", () => {
  const world = squareWorld();
  const facet = observedHairColor(world);
  world.clock.tick = 10;
  const again = recordEvidence(world, { kind: "observation", subject: "s", source: "a" });
  receive(world, "a", "s", "hair color", "brown", null, again);
  assert.equal(facet.decayedThroughTick, 10);
  const before = facet.strength;
  assert.equal(decayFacet(world, facet, 10), null);
  assert.equal(facet.strength, before);
});

test("decay: reaching the floor forgets through an implicit forgetting", () => {
  const world = squareWorld();
  const facet = observedHairColor(world);
  facet.strength = 5.2;
  world.clock.tick = 2;
  const out = decayFacet(world, facet, 2);
  assert.ok(out);
  assert.equal(out.effect, "forgotten");
  assert.equal(out.previousValue, "brown");
  assert.equal(facet.value, null);
  assert.equal(facet.strength, 5);
  const last = facet.evidence[facet.evidence.length - 1];
  assert.equal(last.piece.kind, "forgetting");
  assert.equal(last.piece.source, "a");
  assert.equal(last.effect, "forgotten");

  // Unknown facets hold still.
  assert.equal(decayFacet(world, facet, 40), null);
  assert.equal(facet.strength, 5);
  assert.equal(facet.decayedThroughTick, 40);
});

test("decay: decayAll walks the flat facet list and reports what was forgotten", () => {
  const world = squareWorld();
  const facet = observedHairColor(world);
  const facets = world.people.a.mind.facets.length;
  assert.equal(facets, 12);
  facet.strength = 5.1;
  world.clock.tick = 2;
  const forgotten = decayAll(world, "a");
  assert.equal(forgotten.length, 1);
  assert.equal(forgotten[0].facet.feature, "hair color");
  for (const f of world.people.a.mind.facets) {
    if (f !== facet) assert.ok(near(f.strength, 67.2));
  }
  assert.deepEqual(decayAll(world, "nobody"), []);
});

test("decay: two years without contact and the belief is gone", () => {
  const world = squareWorld();
  observedHairColor(world);
  world.clock.tick = 2 * 365 * 2;
  decayAll(world, "a");
  assert.equal(belief(world, "a", "s", "hair color"), null);
  assert.equal(belief(world, "a", "s", "workplace"), null);
});
