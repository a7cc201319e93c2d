import fs from "node:fs";
import readline from "node:readline";
import { runSimulation } from "./runner/run";
import { defaultEventsOutPath, emptyLogSummary, openEventLog, summarizeLine } from "./service/eventLog";
import type { LogSummary } from "./service/eventLog";
import type { Person, World } from "./sim/types";
import { describeEvidence, entityName } from "./sim/epistemics/evidence";
import { facetIsAccurate } from "./sim/epistemics/facet";
import { topSource } from "./sim/epistemics/queries";
import { round2 } from "./sim/util";

function parseArgs(argv: string[]) {
  const args = argv.slice(2);
  const cmd = args[0] ?? "help";

  const map: Record<string, string | boolean> = {};
  const positionals: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const a = args[i];
    if (!a.startsWith("--")) {
      positionals.push(a);
      continue;
    }
    const key = a.slice(2);
    const next = args[i + 1];
    if (!next || next.startsWith("--")) {
      map[key] = true;
    } else {
      map[key] = next;
      i++;
    }
  }

  return { cmd, flags: map, positionals };
}

function numFlag(flags: Record<string, string | boolean>, key: string, fallback: number): number {
  const v = flags[key];
  if (v === undefined || v === true) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function strFlag(flags: Record<string, string | boolean>, key: string): string | undefined {
  const v = flags[key];
  if (v === undefined || v === true) return undefined;
  return String(v);
}

function printHelp() {
  console.log(
    [
      "town-minds CLI",
      "",
      "Commands:",
      "  run --days <n> --seed <n> [--save-events] [--events-out <path>]",
      "  person --days <n> --seed <n> --id <personId> [--about <entityId>]",
      "  summarize-log --file <path>",
      "",
      "Notes:",
      "  - You can pass different params via npm scripts using: npm run sim -- run --days 90 --seed 2",
      "  - --save-events writes JSONL to ./logs/ by default (timestamped filename).",
      "",
      "Examples:",
      "  npm run sim -- run --days 30 --seed 1",
      "  npm run sim -- run --days 10 --seed 42 --save-events",
      "  npm run sim -- person --days 10 --seed 42 --id p3",
      "  npm run sim -- person --days 10 --seed 42 --id p3 --about p4",
      "  npm run sim -- summarize-log --file logs/events-20251214-223440Z-seed1-days180.jsonl"
    ].join("\n")
  );
}

async function summarizeLog(filePath: string): Promise<LogSummary> {
  const summary = emptyLogSummary();
  const input = fs.createReadStream(filePath, { encoding: "utf8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  for await (const line of rl) summarizeLine(summary, line);

  console.log(`File: ${filePath}`);
  console.log(`Lines: ${summary.lines}  Seed: ${summary.seed ?? "?"}  Last tick: ${summary.lastTick}`);
  console.log("");
  console.log("Events by kind:");
  for (const [kind, n] of Object.entries(summary.counts).sort((a, b) => b[1] - a[1])) {
    console.log(`  ${kind}: ${n}`);
  }
  const liars = Object.entries(summary.liars).sort((a, b) => b[1] - a[1]);
  if (liars.length) {
    console.log("");
    console.log("Most lies told:");
    for (const [id, n] of liars.slice(0, 5)) console.log(`  ${id}: ${n}`);
  }
  if (summary.lastDay) {
    const d = summary.lastDay;
    const known = d.facets - d.forgottenFacets;
    const share = known > 0 ? round2((100 * d.accurateFacets) / known) : 0;
    console.log("");
    console.log(`Day ${d.day}: facets=${d.facets} forgotten=${d.forgottenFacets} accurate=${d.accurateFacets} (${share}% of held)`);
  }
  return summary;
}

function printPerson(world: World, person: Person, aboutId: string | undefined) {
  const name = (id: string) => entityName(world, id);
  console.log(`${person.id} ${name(person.id)} | at ${person.locationId ? name(person.locationId) : "(away)"}`);
  const distrusted = Object.entries(person.mind.distrust);
  if (distrusted.length) {
    console.log(`distrusts: ${distrusted.map(([id, n]) => `${name(id)} (${n})`).join(", ")}`);
  }
  console.log("");

  const models = Object.values(person.mind.models).filter((m) => !aboutId || m.subject === aboutId);
  for (const model of models) {
    const top = topSource(world, person.id, model.subject);
    console.log(`About ${name(model.subject)} (${model.subject})${top ? `, mostly from ${name(top)}` : ""}:`);
    for (const facet of Object.values(model.facets)) {
      if (!facet) continue;
      const mark = facet.value === null ? "?" : facetIsAccurate(world, facet) ? "✓" : "✗";
      console.log(`  ${mark} ${facet.feature} = ${facet.value ?? "(forgotten)"} [strength ${round2(facet.strength)}]`);
      if (aboutId) {
        for (const entry of facet.evidence) {
          console.log(`      - ${entry.effect}: ${describeEvidence(world, entry.piece)}`);
        }
      }
    }
  }
}

async function main() {
  const { cmd, flags } = parseArgs(process.argv);

  if (cmd === "help" || cmd === "--help" || cmd === "-h") {
    printHelp();
    return;
  }

  if (cmd !== "run" && cmd !== "person" && cmd !== "summarize-log") {
    console.error(`Unknown command: ${cmd}`);
    printHelp();
    process.exitCode = 1;
    return;
  }

  if (cmd === "summarize-log") {
    const file = strFlag(flags, "file");
    if (!file) {
      console.error("Missing required flag: --file <path>");
      process.exitCode = 1;
      return;
    }
    await summarizeLog(file);
    return;
  }

  const days = numFlag(flags, "days", 30);
  const seed = numFlag(flags, "seed", 1);
  const res = runSimulation({ days, seed });

  if (cmd === "person") {
    const id = strFlag(flags, "id");
    if (!id) {
      console.error("Missing required flag: --id <personId>");
      process.exitCode = 1;
      return;
    }
    const person = res.finalWorld.people[id];
    if (!person) {
      console.error(`Person not found: ${id}`);
      process.exitCode = 1;
      return;
    }
    console.log(`Seed=${seed} Days=${days}`);
    printPerson(res.finalWorld, person, strFlag(flags, "about"));
    return;
  }

  console.log(`Seed=${seed} Days=${days}`);
  console.log(`Final tick=${res.finalWorld.clock.tick} (two timesteps per day)`);
  console.log("");
  for (const s of res.summaries) {
    const known = s.facets - s.forgottenFacets;
    const share = known > 0 ? round2((100 * s.accurateFacets) / known) : 0;
    console.log(
      `Day ${s.day} :: conversations=${s.conversations} lies=${s.lies} distortions=${s.distortions} facets=${s.facets} forgotten=${s.forgottenFacets} accurate=${share}%`
    );
  }

  if (flags["save-events"]) {
    const outPath = strFlag(flags, "events-out") ?? defaultEventsOutPath({ seed, days });
    const log = openEventLog(outPath);
    log.appendEvents(res.events);
    await log.close();
    console.log(`\nSaved ${res.events.length} events to ${outPath}`);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});
