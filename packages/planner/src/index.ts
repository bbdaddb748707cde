export { DEFAULT_PATHFINDER_CONFIG, findPath, stepsForPath } from "./pathfinder.js";
export type { PathResult, PlanStep, TraversalView } from "./pathfinder.js";
export { DEFAULT_STUCK_CONFIG, ExplorationAdvisor, PositionHistory } from "./advisor.js";
export type { AdvisorOptions, DirectionHit, ExplorationAdvice, PositionSample } from "./advisor.js";
export { routeToArea } from "./navigator.js";
export type { AreaRoute, RouteRequest } from "./navigator.js";
