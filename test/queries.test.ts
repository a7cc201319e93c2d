import test, { afterEach, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { createTestConfig, defaultFeatureComesUp, resetConfig, setConfig } from "../src/sim/config";
import { recordEvidence } from "../src/sim/epistemics/evidence";
import { FEATURE_TYPES } from "../src/sim/epistemics/features";
import type { FeatureType } from "../src/sim/epistemics/features";
import { buildUp } from "../src/sim/epistemics/mentalModel";
import { observe, reflect } from "../src/sim/epistemics/perception";
import {
  accurateBelief,
  belief,
  beliefFacet,
  inaccurateBelief,
  mostSalientPersonIBelieveWorksAt,
  peopleIBelieveAreNamed,
  peopleIBelieveWorkAt,
  sources,
  topSource
} from "../src/sim/epistemics/queries";
import { takeTurn } from "../src/sim/epistemics/transmission";
import type { PersonId, World } from "../src/sim/types";
import { always, squareWorld } from "./helpers/town";

beforeEach(() => setConfig(createTestConfig()));
afterEach(() => resetConfig());

function onlyFeature(feature: FeatureType): Record<FeatureType, number> {
  const out = { ...defaultFeatureComesUp };
  for (const f of FEATURE_TYPES) out[f] = f === feature ? 1 : 0;
  return out;
}

function sees(world: World, source: PersonId, subject: PersonId) {
  const piece = recordEvidence(world, { kind: "observation", subject, source });
  buildUp(world, world.people[source].mind, piece);
}

test("queries: belief reads the held value and compares it to the truth", () => {
  const world = squareWorld();
  sees(world, "a", "s");
  assert.equal(belief(world, "a", "s", "hair color"), "brown");
  assert.equal(accurateBelief(world, "a", "s", "hair color"), true);
  assert.equal(inaccurateBelief(world, "a", "s", "hair color"), false);

  world.people.s.appearance["hair color"] = "gray";
  assert.equal(belief(world, "a", "s", "hair color"), "brown");
  assert.equal(accurateBelief(world, "a", "s", "hair color"), false);
  assert.equal(inaccurateBelief(world, "a", "s", "hair color"), true);
});

test("queries: unknown owners, subjects and features answer empty", () => {
  const world = squareWorld();
  sees(world, "a", "s");
  assert.equal(belief(world, "a", "s", "first name"), null);
  assert.equal(belief(world, "a", "b", "hair color"), null);
  assert.equal(belief(world, "nobody", "s", "hair color"), null);
  assert.equal(beliefFacet(world, "nobody", "s", "hair color"), null);
  assert.equal(accurateBelief(world, "a", "s", "first name"), false);
  assert.equal(inaccurateBelief(world, "a", "s", "first name"), false);
  assert.deepEqual(sources(world, "nobody", "s"), []);
  assert.equal(topSource(world, "a", "b"), null);
});

test("queries: sources rank informants by how much they told, ties by first appearance", () => {
  const world = squareWorld();
  sees(world, "a", "s");
  sees(world, "c", "s");
  const { a, b, c } = world.people;
  takeTurn(world, c, b, "s", always);
  takeTurn(world, a, b, "s", always);
  assert.deepEqual(sources(world, "b", "s"), ["c", "a"]);
  assert.deepEqual(sources(world, "b", "s", "hair color"), ["c", "a"]);

  takeTurn(world, a, b, "s", always);
  assert.deepEqual(sources(world, "b", "s"), ["a", "c"]);
  assert.equal(topSource(world, "b", "s"), "a");
  assert.equal(topSource(world, "b", "s", "first name"), null);
});

test("queries: sources tied across features rank by who spoke first", () => {
  const world = squareWorld();
  sees(world, "a", "s");
  sees(world, "c", "s");
  const { a, b, c } = world.people;
  setConfig(createTestConfig({ tuning: { featureComesUpInConversation: onlyFeature("hair color") } }));
  takeTurn(world, c, b, "s", always);
  setConfig(createTestConfig({ tuning: { featureComesUpInConversation: onlyFeature("approximate age") } }));
  takeTurn(world, a, b, "s", always);
  assert.deepEqual(sources(world, "b", "s"), ["c", "a"]);
  assert.equal(topSource(world, "b", "s"), "c");
  assert.deepEqual(sources(world, "b", "s", "approximate age"), ["a"]);
});

test("queries: believed employees come most salient first", () => {
  const world = squareWorld();
  world.people.c.occupation = { workplaceId: "sq", jobTitle: "cook", shift: "day" };
  sees(world, "a", "s");
  sees(world, "a", "c");
  assert.deepEqual(peopleIBelieveWorkAt(world, "a", "sq"), ["c", "s"]);
  world.people.a.salience.s = 2;
  assert.deepEqual(peopleIBelieveWorkAt(world, "a", "sq"), ["s", "c"]);
  assert.equal(mostSalientPersonIBelieveWorksAt(world, "a", "sq"), "s");
  assert.deepEqual(peopleIBelieveWorkAt(world, "a", "h1"), []);
  assert.equal(mostSalientPersonIBelieveWorksAt(world, "b", "sq"), null);
  assert.deepEqual(peopleIBelieveWorkAt(world, "nobody", "sq"), []);
});

test("queries: name lookups use believed names and sex", () => {
  const world = squareWorld();
  reflect(world, world.people.a);
  observe(world, world.people.a, always);
  assert.deepEqual(peopleIBelieveAreNamed(world, "a", { firstName: "Ann" }), ["a"]);
  assert.deepEqual(peopleIBelieveAreNamed(world, "a", { firstName: "Ann", lastName: "Boyd", sex: "f" }), ["a"]);
  assert.deepEqual(peopleIBelieveAreNamed(world, "a", { sex: "m" }), ["b", "c"]);
  assert.deepEqual(peopleIBelieveAreNamed(world, "a", { sex: "f" }), ["a", "s"]);
  assert.deepEqual(peopleIBelieveAreNamed(world, "a", { firstName: "Carl" }), []);
  assert.deepEqual(peopleIBelieveAreNamed(world, "a", {}), ["a", "b", "c", "s"]);
  assert.deepEqual(peopleIBelieveAreNamed(world, "nobody", {}), []);
});
