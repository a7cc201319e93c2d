import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  defaultEventsOutPath,
  emptyLogSummary,
  openEventLog,
  summarizeLine,
  timestampForFilename
} from "../src/service/eventLog";
import type { SimEvent } from "../src/sim/types";

const events: SimEvent[] = [
  { id: "evt:0:1", tick: 0, kind: "sim.started", visibility: "system", message: "Simulation started (seed=1)", data: { seed: 1 } },
  {
    id: "evt:1:2",
    tick: 1,
    kind: "lie.told",
    visibility: "private",
    message: "Dora Boyd lied to Gus Diaz about Ed Diaz",
    data: { liar: "p3", listener: "p6", subject: "p4" }
  },
  {
    id: "evt:1:3",
    tick: 1,
    kind: "sim.day.ended",
    visibility: "system",
    message: "Day 0 ended",
    data: { summary: { day: 0, facets: 10, accurateFacets: 8, forgottenFacets: 1 } }
  }
];

test("event log: filenames carry a UTC timestamp, seed and days", () => {
  const now = new Date("2025-12-14T12:34:56.789Z");
  assert.equal(timestampForFilename(now), "20251214-123456Z");
  assert.equal(
    defaultEventsOutPath({ seed: 1, days: 30 }, now),
    path.join("logs", "events-20251214-123456Z-seed1-days30.jsonl")
  );
});

test("event log: writes one JSON event per line, creating the directory", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "town-minds-"));
  try {
    const outPath = path.join(dir, "nested", "events.jsonl");
    const log = openEventLog(outPath);
    log.appendEvents(events);
    await log.close();

    const lines = fs.readFileSync(outPath, "utf8").split("\n");
    assert.equal(lines.length, 4);
    assert.equal(lines[3], "");
    assert.deepEqual(JSON.parse(lines[1]), events[1]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("event log: a summary counts kinds, liars and the last day", () => {
  const summary = emptyLogSummary();
  for (const e of events) summarizeLine(summary, JSON.stringify(e));
  assert.deepEqual(summary, {
    lines: 3,
    seed: 1,
    lastTick: 1,
    counts: { "sim.started": 1, "lie.told": 1, "sim.day.ended": 1 },
    lastDay: { day: 0, facets: 10, accurateFacets: 8, forgottenFacets: 1 },
    liars: { p3: 1 }
  });
});

test("event log: blank and broken lines are skipped", () => {
  const summary = emptyLogSummary();
  summarizeLine(summary, "");
  summarizeLine(summary, "{not json");
  summarizeLine(summary, "[1,2]");
  assert.equal(summary.lines, 2);
  assert.deepEqual(summary.counts, {});
  assert.equal(summary.seed, null);
});
