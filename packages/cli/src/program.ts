import { resolve } from "node:path";
import { Command } from "commander";
import { parseCoord } from "@wayfinder/grid";
import { Journal, JournalIntegrityError } from "@wayfinder/journal";
import { AreaStore, renderArea } from "@wayfinder/mapping";
import type { AreaMap } from "@wayfinder/mapping";
import { findPath, routeToArea } from "@wayfinder/planner";
import type { PlanStep } from "@wayfinder/planner";
import { loadEngineConfig } from "@wayfinder/kernel";
import { isDirection } from "@wayfinder/schemas";
import type { AreaConnection, Coordinate, Direction, EngineConfig } from "@wayfinder/schemas";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Expected failure of a command; the entry point prints it and exits 1. */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

type GlobalOptions = {
  config?: string;
  dataDir?: string;
};

function parseCoordOption(value: string, label: string): Coordinate {
  const coord = parseCoord(value);
  if (!coord) throw new CliError(`Invalid ${label}: "${value}" (expected x,y)`);
  return coord;
}

function parseFacing(value: string): Direction {
  if (!isDirection(value)) throw new CliError(`Invalid facing: "${value}" (must be Up, Down, Left or Right)`);
  return value;
}

function parseCount(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new CliError(`Invalid ${label}: "${value}" (expected a whole number)`);
  return n;
}

function formatCoord(c: Coordinate): string {
  return `(${c.x},${c.y})`;
}

function formatSteps(steps: PlanStep[]): string {
  return steps.length === 0 ? "(already there)" : steps.map((s) => `${s.kind} ${s.direction}`).join(", ");
}

function formatHop(c: AreaConnection): string {
  return `${c.fromArea} ${formatCoord(c.fromCoord)} -> ${c.toArea} ${formatCoord(c.toCoord)}${c.direction ? ` [${c.direction}]` : " [warp]"}`;
}

export function createProgram(io: CliIo): Command {
  const env = io.env ?? process.env;
  const cwd = io.cwd ?? process.cwd();
  const program = new Command();
  program
    .name("wayfinder")
    .description("Inspect maps and routes recorded by the exploration engine")
    .option("-c, --config <file>", "Engine configuration (YAML)")
    .option("-d, --data-dir <dir>", "Map directory (overrides the configuration)")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  let config: Promise<EngineConfig> | null = null;
  const engineConfig = (): Promise<EngineConfig> => {
    config ??= loadEngineConfig({ path: program.opts<GlobalOptions>().config, env, cwd });
    return config;
  };

  const openStore = async (): Promise<AreaStore> => {
    const opts = program.opts<GlobalOptions>();
    if (opts.dataDir) return new AreaStore(resolve(cwd, opts.dataDir));
    return new AreaStore((await engineConfig()).persistence.dataDir);
  };

  const requireArea = async (store: AreaStore, areaId: string): Promise<AreaMap> => {
    const map = await store.loadArea(areaId);
    if (!map) throw new CliError(`Area ${areaId} has never been visited`);
    return map;
  };

  program.command("areas").description("List recorded areas")
    .action(async () => {
      const store = await openStore();
      const ids = await store.listAreas();
      if (ids.length === 0) {
        io.out("No areas recorded.");
        return;
      }
      for (const id of ids) {
        const map = await store.loadArea(id);
        if (!map) continue;
        const s = map.summary();
        io.out(`${s.areaId}  ${s.displayName}  visits=${s.visitCount} explored=${s.explored} transitions=${s.counts.transition}`);
      }
      const graph = await store.loadConnections();
      io.out(`${ids.length} area(s), ${graph.size} connection(s)`);
    });

  program.command("show").description("Print an area as ASCII").argument("<areaId>", "Area ID, e.g. area_0_1")
    .option("--terrain", "Show classifier labels instead of traversal codes")
    .action(async (areaId: string, opts: { terrain?: boolean }) => {
      const map = await requireArea(await openStore(), areaId);
      for (const line of renderArea(map, { terrain: opts.terrain === true })) io.out(line);
    });

  program.command("path").description("Plan a walk between two tiles of one area").argument("<areaId>", "Area ID")
    .requiredOption("--from <x,y>", "Start tile")
    .requiredOption("--to <x,y>", "Goal tile")
    .option("--facing <dir>", "Facing at the start", "Down")
    .action(async (areaId: string, opts: { from: string; to: string; facing: string }) => {
      const start = parseCoordOption(opts.from, "--from");
      const goal = parseCoordOption(opts.to, "--to");
      const facing = parseFacing(opts.facing);
      const map = await requireArea(await openStore(), areaId);
      const result = findPath(map.traversal, start, goal, facing, (await engineConfig()).pathfinder);
      if (result.status !== "found") {
        throw new CliError(`No path in ${areaId}: ${result.reason}`);
      }
      io.out(`cost=${Number(result.cost.toFixed(2))} expanded=${result.expanded} tiles=${result.path.length}`);
      io.out(formatSteps(result.steps));
    });

  program.command("route").description("Find the chain of areas between two areas")
    .argument("<fromArea>", "Start area ID")
    .argument("<toArea>", "Target area ID")
    .option("--at <x,y>", "Current tile in the start area; also plans the walk to the first exit")
    .option("--facing <dir>", "Facing at --at", "Down")
    .action(async (fromArea: string, toArea: string, opts: { at?: string; facing: string }) => {
      const store = await openStore();
      const graph = await store.loadConnections();
      const hops = graph.routeSteps(fromArea, toArea);
      if (!hops) throw new CliError(`No known route from ${fromArea} to ${toArea}`);
      io.out([fromArea, ...hops.map((h) => h.toArea)].join(" -> "));
      for (const hop of hops) io.out(`  ${formatHop(hop)}`);

      if (opts.at === undefined || hops.length === 0) return;
      const position = parseCoordOption(opts.at, "--at");
      const map = await requireArea(store, fromArea);
      const route = routeToArea({
        graph,
        grid: map.traversal,
        fromArea,
        toArea,
        position,
        facing: parseFacing(opts.facing),
        pathfinder: (await engineConfig()).pathfinder,
      });
      if (route.status === "found") {
        io.out(`first exit ${formatCoord(route.exit.fromCoord)}: ${formatSteps(route.plan.steps)}`);
      } else if (route.status !== "arrived") {
        throw new CliError(route.reason);
      }
    });

  /** Loads a journal for reading; a broken hash chain is an error. */
  const openJournal = async (file: string): Promise<Journal> => {
    const journal = new Journal(resolve(cwd, file), { fsync: false, recovery: "strict" });
    try {
      await journal.init();
    } catch (err) {
      if (err instanceof JournalIntegrityError) throw new CliError(err.message);
      throw err;
    }
    return journal;
  };

  const journalCmd = program.command("journal").description("Decision journal tools");
  journalCmd.command("verify").description("Check the hash chain of a journal file").argument("<file>", "Journal path")
    .action(async (file: string) => {
      const journal = new Journal(resolve(cwd, file));
      const result = await journal.verifyIntegrity();
      if (!result.valid) throw new CliError(`Journal chain broken at event ${result.brokenAt ?? 0}`);
      const events = await journal.readAll();
      io.out(`Journal intact: ${events.length} event(s)`);
    });

  journalCmd.command("sessions").description("List the sessions recorded in a journal").argument("<file>", "Journal path")
    .action(async (file: string) => {
      const journal = await openJournal(file);
      const ids = journal.listSessions();
      if (ids.length === 0) {
        io.out("No sessions recorded.");
        return;
      }
      for (const id of ids) {
        const first = journal.readSession(id, { limit: 1 })[0];
        io.out(`${id}  events=${journal.getSessionEventCount(id)} started=${first?.timestamp ?? "?"}`);
      }
    });

  journalCmd.command("show").description("Print the events of one session")
    .argument("<file>", "Journal path")
    .argument("<sessionId>", "Session ID")
    .option("--offset <n>", "Skip the first n events", "0")
    .option("--limit <n>", "Print at most n events")
    .action(async (file: string, sessionId: string, opts: { offset: string; limit?: string }) => {
      const offset = parseCount(opts.offset, "--offset");
      const limit = opts.limit !== undefined ? parseCount(opts.limit, "--limit") : undefined;
      const journal = await openJournal(file);
      if (journal.getSessionEventCount(sessionId) === 0) {
        throw new CliError(`Session ${sessionId} not found in ${file}`);
      }
      const events = journal.readSession(sessionId, { offset, ...(limit !== undefined ? { limit } : {}) });
      for (const e of events) {
        io.out(`#${e.seq ?? "?"} ${e.timestamp} ${e.type} ${JSON.stringify(e.payload)}`);
      }
    });

  return program;
}

/** Parses `argv` (without the node and script entries) and runs the command. */
export async function runCli(argv: string[], io: CliIo): Promise<void> {
  await createProgram(io).parseAsync(argv, { from: "user" });
}
