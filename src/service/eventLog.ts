import fs from "node:fs";
import path from "node:path";
import type { SimEvent } from "../sim/types";

export type EventLog = {
  path: string;
  appendEvents: (events: SimEvent[]) => void;
  close: () => Promise<void>;
};

/** JSONL event log, one event per line. */
export function openEventLog(outPath: string): EventLog {
  const dir = path.dirname(outPath);
  fs.mkdirSync(dir, { recursive: true });
  const stream = fs.createWriteStream(outPath, { encoding: "utf8" });

  const appendEvents = (events: SimEvent[]) => {
    for (const e of events) stream.write(`${JSON.stringify(e)}\n`);
  };

  const close = () =>
    new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });

  return { path: outPath, appendEvents, close };
}

export function timestampForFilename(d = new Date()): string {
  // 2025-12-14T12:34:56.789Z -> 20251214-123456Z
  const iso = d.toISOString();
  const ymd = iso.slice(0, 10).replaceAll("-", "");
  const hms = iso.slice(11, 19).replaceAll(":", "");
  return `${ymd}-${hms}Z`;
}

export function defaultEventsOutPath(opts: { seed: number; days: number }, now = new Date()): string {
  return path.join("logs", `events-${timestampForFilename(now)}-seed${opts.seed}-days${opts.days}.jsonl`);
}

export type LogSummary = {
  lines: number;
  seed: number | null;
  lastTick: number;
  counts: Record<string, number>;
  lastDay: DailyTotals | null;
  liars: Record<string, number>;
};

type DailyTotals = {
  day: number;
  facets: number;
  accurateFacets: number;
  forgottenFacets: number;
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function num(x: unknown): number | null {
  return typeof x === "number" && Number.isFinite(x) ? x : null;
}

/** Fold one JSONL line into a running summary; unparseable lines are counted and skipped. */
export function summarizeLine(summary: LogSummary, line: string): void {
  if (!line) return;
  summary.lines++;
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return;
  }
  if (!isRecord(parsed)) return;

  const tick = num(parsed.tick);
  if (tick !== null) summary.lastTick = Math.max(summary.lastTick, tick);
  const kind = typeof parsed.kind === "string" ? parsed.kind : null;
  if (kind) summary.counts[kind] = (summary.counts[kind] ?? 0) + 1;
  const data = isRecord(parsed.data) ? parsed.data : {};

  if (kind === "sim.started") summary.seed = num(data.seed);
  if (kind === "lie.told" && typeof data.liar === "string") {
    summary.liars[data.liar] = (summary.liars[data.liar] ?? 0) + 1;
  }
  if (kind === "sim.day.ended" && isRecord(data.summary)) {
    const s = data.summary;
    const day = num(s.day);
    if (day !== null && (!summary.lastDay || day >= summary.lastDay.day)) {
      summary.lastDay = {
        day,
        facets: num(s.facets) ?? 0,
        accurateFacets: num(s.accurateFacets) ?? 0,
        forgottenFacets: num(s.forgottenFacets) ?? 0
      };
    }
  }
}

export function emptyLogSummary(): LogSummary {
  return { lines: 0, seed: null, lastTick: 0, counts: {}, lastDay: null, liars: {} };
}
