import test, { afterEach } from "node:test";
import assert from "node:assert/strict";
import { createTestConfig, resetConfig, setConfig } from "../src/sim/config";
import { recordEvidence } from "../src/sim/epistemics/evidence";
import {
  buildWeighingContext,
  defaultEvidenceWeigher,
  getEvidenceWeigher,
  implantStrength,
  resetEvidenceWeigher,
  setEvidenceWeigher,
  sourceCredibility,
  weighEvidence
} from "../src/sim/epistemics/weighting";
import { near, squareWorld } from "./helpers/town";

afterEach(() => {
  resetEvidenceWeigher();
  resetConfig();
});

test("weighting: default formula multiplies trust, credibility, transmitted basis and memory", () => {
  const config = createTestConfig();
  const w = defaultEvidenceWeigher({
    kind: "statement",
    credibility: 0.6,
    transmittedStrength: 67.5,
    memory: 0.5,
    distrust: 0,
    config
  });
  // 100 * 0.6 trust * 0.6 credibility * 0.675 basis * 0.75 memory
  assert.ok(near(w, 18.225));
});

test("weighting: every caught lie halves a source's weight", () => {
  const config = createTestConfig();
  const ctx = { kind: "lie" as const, credibility: 1, transmittedStrength: 100, memory: 1, distrust: 0, config };
  assert.ok(near(defaultEvidenceWeigher(ctx), 60));
  assert.ok(near(defaultEvidenceWeigher({ ...ctx, distrust: 2 }), 15));
});

test("weighting: first-hand evidence is fully credible and carries no transmitted strength", () => {
  setConfig(createTestConfig());
  const world = squareWorld();
  const piece = recordEvidence(world, { kind: "observation", subject: "s", source: "a" });
  const ctx = buildWeighingContext(world, "a", "hair color", piece);
  assert.equal(ctx.credibility, 1);
  assert.equal(ctx.transmittedStrength, null);
  assert.equal(ctx.memory, 0.5);
  // 100 * 0.9 * 0.75
  assert.ok(near(weighEvidence(world, "a", "hair color", piece), 67.5));
});

test("weighting: statements carry the teller's strength for the feature weighed", () => {
  setConfig(createTestConfig());
  const world = squareWorld();
  const piece = recordEvidence(world, {
    kind: "statement",
    subject: "s",
    source: "a",
    recipient: "b",
    tellerBeliefStrength: { "hair color": 80 }
  });
  assert.equal(buildWeighingContext(world, "b", "hair color", piece).transmittedStrength, 80);
  assert.equal(buildWeighingContext(world, "b", "eye color", piece).transmittedStrength, null);
});

test("weighting: credibility grows with salience and is total for oneself", () => {
  const config = createTestConfig();
  const world = squareWorld();
  assert.equal(sourceCredibility(world, "a", "a", config), 1);
  assert.ok(near(sourceCredibility(world, "a", "b", config), 0.6));
  world.people.a.salience.b = 1;
  assert.ok(near(sourceCredibility(world, "a", "b", config), 0.8));
});

test("weighting: implant strength follows salience and interactions, capped", () => {
  const config = createTestConfig();
  const world = squareWorld();
  const piece = recordEvidence(world, { kind: "implant", subject: "b", source: "a", totalInteractions: 10, salienceOfSubject: 2 });
  assert.ok(near(implantStrength(piece, config), 70));
  const strong = recordEvidence(world, { kind: "implant", subject: "b", source: "a", totalInteractions: 100, salienceOfSubject: 5 });
  assert.equal(implantStrength(strong, config), 100);
});

test("weighting: the weigher can be swapped and restored", () => {
  setConfig(createTestConfig());
  const world = squareWorld();
  const piece = recordEvidence(world, { kind: "observation", subject: "s", source: "a" });
  setEvidenceWeigher(() => 42);
  assert.equal(weighEvidence(world, "a", "hair color", piece), 42);
  resetEvidenceWeigher();
  assert.equal(getEvidenceWeigher(), defaultEvidenceWeigher);
  assert.ok(near(weighEvidence(world, "a", "hair color", piece), 67.5));
});
