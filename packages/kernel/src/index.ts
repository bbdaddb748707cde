export { classifyOutcome } from "./outcome-classifier.js";
export type { ClassifyInput } from "./outcome-classifier.js";
export { waitForSettle, watchForDialogue } from "./settle.js";
export type { SettleOptions, SettleResult, SettleStatus } from "./settle.js";
export {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  parseEngineConfig,
  resolveEngineConfig,
} from "./config.js";
export type { LoadConfigOptions } from "./config.js";
export { NavigationEngine } from "./engine.js";
export type { CycleResult, NavigationEngineOptions } from "./engine.js";
export type {
  ActionExecutor,
  DecisionContext,
  DecisionSource,
  GameStateProbe,
  VisionSource,
} from "./collaborators.js";
