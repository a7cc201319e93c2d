import test, { afterEach, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { createTestConfig, defaultFeatureComesUp, resetConfig, setConfig } from "../src/sim/config";
import { distortMemories } from "../src/sim/epistemics/distortion";
import { recordEvidence } from "../src/sim/epistemics/evidence";
import { FEATURE_TYPES } from "../src/sim/epistemics/features";
import type { FeatureType } from "../src/sim/epistemics/features";
import { buildUp, receive } from "../src/sim/epistemics/mentalModel";
import { observe } from "../src/sim/epistemics/perception";
import { accurateBelief, belief, beliefFacet, sources } from "../src/sim/epistemics/queries";
import { takeTurn, tellLie } from "../src/sim/epistemics/transmission";
import type { PersonId, World } from "../src/sim/types";
import { always, near, never, squareWorld } from "./helpers/town";

function onlyFeature(feature: FeatureType): Record<FeatureType, number> {
  const out = { ...defaultFeatureComesUp };
  for (const f of FEATURE_TYPES) out[f] = f === feature ? 1 : 0;
  return out;
}

function sees(world: World, source: PersonId, subject: PersonId) {
  const piece = recordEvidence(world, { kind: "observation", subject, source });
  return buildUp(world, world.people[source].mind, piece);
}

beforeEach(() => setConfig(createTestConfig({ tuning: { featureComesUpInConversation: onlyFeature("hair color") } })));
afterEach(() => resetConfig());

test("scenario: a lie passed on in good faith is corrected by seeing for oneself", () => {
  const world = squareWorld();
  const { a, b, c } = world.people;
  tellLie(world, a, b, "s", { "hair color": "red" }, never);
  takeTurn(world, b, c, "s", always);

  assert.equal(belief(world, "c", "s", "hair color"), "red");
  assert.deepEqual(sources(world, "c", "s"), ["b"]);
  const secondHand = beliefFacet(world, "c", "s", "hair color");
  // b sold it at 20.25: 100 * 0.6 * 0.6 * 0.2025 * 0.75
  assert.ok(secondHand && near(secondHand.strength, 5.4675));

  sees(world, "c", "s");
  assert.equal(accurateBelief(world, "c", "s", "hair color"), true);
  // b passed the lie on as a statement, so c has no one to blame.
  assert.deepEqual(c.mind.distrust, {});
});

test("scenario: a caught liar is believed half as much", () => {
  const world = squareWorld();
  const { a, b } = world.people;
  tellLie(world, a, b, "s", { "hair color": "red" }, never);
  observe(world, b, always);
  assert.equal(b.mind.distrust.a, 1);

  const exchange = tellLie(world, a, b, "c", { "hair color": "red" }, never);
  const [outcome] = exchange.outcomes;
  // 100 * 0.6 * 0.6 * 0.75 * 0.75 * 0.5
  assert.ok(near(outcome.weight, 10.125));
  assert.equal(outcome.effect, "contradicted");
  // 67.5 - 10.125 * 0.25
  assert.ok(near(outcome.facet.strength, 64.96875));
  assert.equal(belief(world, "b", "c", "hair color"), "brown");
});

test("scenario: overhearing a lie does not turn the eavesdropper against the liar", () => {
  setConfig(
    createTestConfig({
      tuning: { chanceSomeoneEavesdrops: 1, featureComesUpInConversation: onlyFeature("hair color") }
    })
  );
  const world = squareWorld();
  const { a, b, c } = world.people;
  const exchange = tellLie(world, a, b, "s", { "hair color": "red" }, always);
  assert.equal(exchange.eavesdropping?.eavesdropper, "c");
  assert.equal(belief(world, "c", "s", "hair color"), "red");

  sees(world, "c", "s");
  sees(world, "b", "s");
  assert.equal(belief(world, "c", "s", "hair color"), "brown");
  assert.deepEqual(c.mind.distrust, {});
  assert.equal(b.mind.distrust.a, 1);
});

test("scenario: a mutated memory gives way once the truth is seen twice", () => {
  setConfig(createTestConfig({ tuning: { mutationChance: 1 } }));
  const world = squareWorld();
  world.people.s.appearance["hair color"] = "red";
  const seen = recordEvidence(world, { kind: "observation", subject: "s", source: "a" });
  receive(world, "a", "s", "hair color", "red", null, seen);
  distortMemories(world, world.people.a, always);
  assert.equal(belief(world, "a", "s", "hair color"), "black");

  setConfig(createTestConfig());
  const first = receive(world, "a", "s", "hair color", "red", null, recordEvidence(world, { kind: "observation", subject: "s", source: "a" }));
  assert.equal(first.effect, "contradicted");
  assert.ok(near(first.facet.strength, 50.625));

  const second = receive(world, "a", "s", "hair color", "red", null, recordEvidence(world, { kind: "observation", subject: "s", source: "a" }));
  assert.equal(second.effect, "supplanted");
  // Picks up from the strength frozen when red was lost: 67.5 + 67.5 * 0.325
  assert.ok(near(second.facet.strength, 89.4375));
  assert.equal(accurateBelief(world, "a", "s", "hair color"), true);
});

test("scenario: gossip reaches someone who never met the subject", () => {
  const world = squareWorld();
  world.people.s.locationId = "h4";
  world.people.a.locationId = "h4";
  sees(world, "a", "s");
  world.people.a.locationId = "sq";

  takeTurn(world, world.people.a, world.people.b, "s", always);
  takeTurn(world, world.people.b, world.people.c, "s", always);
  assert.equal(belief(world, "c", "s", "hair color"), "brown");
  assert.equal(accurateBelief(world, "c", "s", "hair color"), true);
  assert.deepEqual(sources(world, "c", "s", "hair color"), ["b"]);
  assert.equal(beliefFacet(world, "c", "s", "home"), null);
});
