// ─── Geometry ───────────────────────────────────────────────────────

export interface Coordinate {
  x: number;
  y: number;
}

export type Direction = "Up" | "Down" | "Left" | "Right";

export const DIRECTIONS: readonly Direction[] = ["Up", "Down", "Left", "Right"];

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// ─── Areas ──────────────────────────────────────────────────────────

/** Stable area identifier, derived from the game's (group, number) pair. */
export type AreaId = string;

/** External reference to an area as the game reports it. */
export interface AreaRef {
  group: number;
  number: number;
  name?: string;
}

export function areaIdOf(ref: Pick<AreaRef, "group" | "number">): AreaId {
  return `area_${ref.group}_${ref.number}`;
}

/** Semantic label produced by the vision classifier for one tile. */
export type TileLabel = string;

export type TraversalStatus =
  | "unknown"
  | "walkable"
  | "blocked"
  | "player"
  | "transition"
  | "interactable"
  | "ledge";

/** Single-character codes used by persisted traversal grids and ASCII renders. */
export const TRAVERSAL_CODES: Record<TraversalStatus, string> = {
  unknown: "?",
  walkable: "W",
  blocked: "N",
  player: "P",
  transition: "T",
  interactable: "I",
  ledge: "L",
};

export const TRAVERSAL_STATUSES: readonly TraversalStatus[] = [
  "unknown", "walkable", "blocked", "player", "transition", "interactable", "ledge",
];

const CODE_TO_STATUS = new Map<string, TraversalStatus>(
  TRAVERSAL_STATUSES.map((status) => [TRAVERSAL_CODES[status], status]),
);

export function traversalFromCode(code: string): TraversalStatus | undefined {
  return CODE_TO_STATUS.get(code);
}

export interface AreaConnection {
  fromArea: AreaId;
  fromCoord: Coordinate;
  toArea: AreaId;
  toCoord: Coordinate;
  /** Direction of travel that crossed the edge; null when the hop was not a step. */
  direction: Direction | null;
}

// ─── Collaborator data ──────────────────────────────────────────────

export type GameAction = Direction | "A" | "B" | "Start" | "Select" | "Wait";

export const GAME_ACTIONS: readonly GameAction[] = [
  "Up", "Down", "Left", "Right", "A", "B", "Start", "Select", "Wait",
];

export function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && (DIRECTIONS as readonly string[]).includes(value);
}

export function isGameAction(value: unknown): value is GameAction {
  return typeof value === "string" && (GAME_ACTIONS as readonly string[]).includes(value);
}

/** Side-effect-free read of the controlled agent's location. */
export interface AgentSnapshot {
  area: AreaRef;
  x: number;
  y: number;
  facing: Direction;
}

export type Scene = "overworld" | "dialogue" | "menu" | "battle";

export interface ObservationCell {
  row: number;
  col: number;
  label: TileLabel;
}

/** Fixed-size window of classified tiles with the agent at (agentRow, agentCol). */
export interface Observation {
  rows: number;
  cols: number;
  agentRow: number;
  agentCol: number;
  cells: ObservationCell[];
}

// ─── Outcomes ───────────────────────────────────────────────────────

export type ActionOutcome =
  | { kind: "moved"; from: Coordinate; to: Coordinate; direction: Direction }
  | { kind: "turned"; position: Coordinate; fromFacing: Direction; toFacing: Direction }
  | { kind: "blocked"; position: Coordinate; target: Coordinate; direction: Direction }
  | {
      kind: "area-changed";
      fromArea: AreaId;
      exit: Coordinate;
      vacated: Coordinate;
      toArea: AreaId;
      toAreaRef: AreaRef;
      entry: Coordinate;
      direction: Direction | null;
    }
  | { kind: "interacted"; target: Coordinate; dialogue: boolean }
  | { kind: "auto-dialogue"; from: Coordinate; to: Coordinate; trigger: Coordinate; direction: Direction }
  | { kind: "waited" }
  | { kind: "unknown"; reason: string };

export type OutcomeKind = ActionOutcome["kind"];

// ─── Persisted records ──────────────────────────────────────────────

export interface GridRecord<T> {
  origin: Coordinate;
  width: number;
  height: number;
  rows: T[][];
}

export interface AreaRecord {
  areaId: AreaId;
  displayName: string;
  group: number;
  number: number;
  terrain: GridRecord<TileLabel>;
  /** Rows of traversal codes, one character per tile. */
  traversal: { origin: Coordinate; width: number; height: number; rows: string[] };
  bounds: Bounds | null;
  visitCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface ConnectionsRecord {
  version: 1;
  updatedAt: string;
  adjacency: Record<AreaId, AreaConnection[]>;
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "session.started"
  | "session.ended"
  | "cycle.completed"
  | "cycle.aborted"
  | "action.failed"
  | "observation.rejected"
  | "area.entered"
  | "map.persisted"
  | "map.persist_failed";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  seq?: number;
  hash_prev?: string;
}

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Configuration ──────────────────────────────────────────────────

export interface WindowConfig {
  rows: number;
  cols: number;
  agentRow: number;
  agentCol: number;
}

export interface SettleConfig {
  minSettleMs: number;
  timeoutMs: number;
  pollIntervalMs: number;
  dialogueWatchMs: number;
}

export interface StuckConfig {
  historySize: number;
  window: number;
  distinctThreshold: number;
  stuckThreshold: number;
  minSamples: number;
}

export interface PathfinderConfig {
  unknownPenalty: number;
  searchMargin: number;
  maxExpansions: number;
}

export interface EngineConfig {
  window: WindowConfig;
  solidLabels: string[];
  preserveNegativeCoordinates: boolean;
  settle: SettleConfig;
  stuck: StuckConfig;
  pathfinder: PathfinderConfig;
  persistence: { dataDir: string; saveEveryCycles: number };
  /** Half-size of the traversal window handed to the decision source. */
  contextRadius: number;
}

/** Configuration as written in YAML: every key optional, merged over defaults. */
export interface EngineConfigInput {
  window?: Partial<WindowConfig>;
  solidLabels?: string[];
  preserveNegativeCoordinates?: boolean;
  settle?: Partial<SettleConfig>;
  stuck?: Partial<StuckConfig>;
  pathfinder?: Partial<PathfinderConfig>;
  persistence?: Partial<EngineConfig["persistence"]>;
  contextRadius?: number;
}
