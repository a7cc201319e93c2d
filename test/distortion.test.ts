import test, { afterEach } from "node:test";
import assert from "node:assert/strict";
import { createTestConfig, resetConfig, setConfig } from "../src/sim/config";
import type { SimConfigOverrides } from "../src/sim/config";
import { distortMemories, forget } from "../src/sim/epistemics/distortion";
import { recordEvidence } from "../src/sim/epistemics/evidence";
import { getOrCreateFacet, getOrCreateMentalModel, receive } from "../src/sim/epistemics/mentalModel";
import { beliefFacet } from "../src/sim/epistemics/queries";
import type { World } from "../src/sim/types";
import { always, near, never, squareWorld } from "./helpers/town";

function useConfig(overrides: SimConfigOverrides) {
  setConfig(createTestConfig(overrides));
}

/** Ann has noticed hair colors: Dora's red, Carl's brown. */
function annRemembersHair(): World {
  const world = squareWorld();
  world.people.s.appearance["hair color"] = "red";
  const seenDora = recordEvidence(world, { kind: "observation", subject: "s", source: "a" });
  receive(world, "a", "s", "hair color", "red", null, seenDora);
  const seenCarl = recordEvidence(world, { kind: "observation", subject: "b", source: "a" });
  receive(world, "a", "b", "hair color", "brown", null, seenCarl);
  return world;
}

afterEach(() => resetConfig());

test("distortion: a mutation swaps in another value at the same strength", () => {
  useConfig({ tuning: { mutationChance: 1 } });
  const world = annRemembersHair();
  const [first] = distortMemories(world, world.people.a, always);
  assert.equal(first.kind, "mutation");
  assert.equal(first.subject, "s");
  assert.equal(first.from, "red");
  assert.equal(first.to, "black");
  assert.equal(first.outcome.effect, "supplanted");
  assert.equal(first.piece.kind === "mutation" ? first.piece.mutatedFrom : null, "red");

  const facet = beliefFacet(world, "a", "s", "hair color");
  assert.equal(facet?.value, "black");
  assert.ok(facet && near(facet.strength, 67.5));
  assert.ok(facet && near(facet.evidence[0]?.frozenStrength ?? 0, 67.5));
});

test("distortion: a transference copies the owner's belief about someone else", () => {
  useConfig({ tuning: { transferenceChance: 1 } });
  const world = annRemembersHair();
  const distortions = distortMemories(world, world.people.a, always);
  assert.equal(distortions.length, 1);
  const [d] = distortions;
  assert.equal(d.kind, "transference");
  assert.equal(d.to, "brown");
  assert.deepEqual(d.piece.kind === "transference" ? d.piece.transferredFrom : null, {
    owner: "a",
    subject: "b",
    feature: "hair color"
  });
  assert.equal(beliefFacet(world, "a", "s", "hair color")?.value, "brown");
  assert.equal(beliefFacet(world, "a", "b", "hair color")?.value, "brown");
});

test("distortion: confabulation fills in an unknown value", () => {
  useConfig({ tuning: { confabulationChance: 1 } });
  const world = squareWorld();
  const mind = world.people.a.mind;
  getOrCreateFacet(world, mind, getOrCreateMentalModel(world, mind, "s"), "eye color");
  const [d] = distortMemories(world, world.people.a, always);
  assert.equal(d.kind, "confabulation");
  assert.equal(d.from, null);
  assert.equal(d.to, "black");
  assert.equal(d.outcome.effect, "established");
  assert.equal(beliefFacet(world, "a", "s", "eye color")?.value, "black");
});

test("distortion: nothing happens to a perfect memory or on failed rolls", () => {
  useConfig({ tuning: { mutationChance: 1, transferenceChance: 1, confabulationChance: 1 } });
  const world = annRemembersHair();
  assert.deepEqual(distortMemories(world, world.people.a, never), []);
  world.people.a.memory = 1;
  assert.deepEqual(distortMemories(world, world.people.a, always), []);
  assert.equal(beliefFacet(world, "a", "s", "hair color")?.value, "red");
});

test("distortion: a pass looks at a bounded window of facets", () => {
  useConfig({ tuning: { mutationChance: 1 }, limits: { maxFacetsPerDistortionPass: 1 } });
  const world = annRemembersHair();
  const distortions = distortMemories(world, world.people.a, always);
  assert.deepEqual(
    distortions.map((d) => d.subject),
    ["s"]
  );
  assert.equal(beliefFacet(world, "a", "b", "hair color")?.value, "brown");
});

test("distortion: forgetting clears a belief that later evidence reinstates", () => {
  useConfig({});
  const world = annRemembersHair();
  const outcome = forget(world, "a", "s", "hair color");
  assert.equal(outcome?.effect, "forgotten");
  assert.equal(outcome?.previousValue, "red");
  assert.equal(beliefFacet(world, "a", "s", "hair color")?.value, null);
  assert.equal(forget(world, "a", "s", "hair color"), null);
  assert.equal(forget(world, "a", "c", "hair color"), null);

  const seenAgain = recordEvidence(world, { kind: "observation", subject: "s", source: "a" });
  const back = receive(world, "a", "s", "hair color", "red", null, seenAgain);
  assert.equal(back.effect, "reinstated");
  // 67.5 + 67.5 * (1 - 67.5 / 100)
  assert.ok(near(back.facet.strength, 89.4375));
});
