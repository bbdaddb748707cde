import type {
  AgentSnapshot,
  AreaConnection,
  AreaId,
  Coordinate,
  Direction,
  GameAction,
  Observation,
  Scene,
} from "@wayfinder/schemas";
import type { MapWindow } from "@wayfinder/mapping";
import type { ExplorationAdvice } from "@wayfinder/planner";

/** Classifies the tiles currently on screen. */
export interface VisionSource {
  observe(): Promise<Observation>;
}

/**
 * Side-effect-free reads of game state. Implementations may return data
 * that does not match AgentSnapshot; the engine validates every read.
 */
export interface GameStateProbe {
  readSnapshot(): Promise<AgentSnapshot>;
  readScene(): Promise<Scene>;
}

export interface ActionExecutor {
  /** Resolves false when the input could not be delivered. */
  execute(action: GameAction): Promise<boolean>;
}

export interface DecisionContext {
  cycle: number;
  areaId: AreaId;
  areaName: string;
  position: Coordinate;
  facing: Direction;
  window: Readonly<MapWindow>;
  advice: Readonly<ExplorationAdvice>;
  connections: readonly AreaConnection[];
}

export interface DecisionSource {
  decide(context: DecisionContext): Promise<GameAction>;
}
