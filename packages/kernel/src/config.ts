import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { isEngineConfigInput, validateEngineConfigData } from "@wayfinder/schemas";
import type { EngineConfig } from "@wayfinder/schemas";

export const DEFAULT_CONFIG_PATH = "config/wayfinder.yaml";

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  window: { rows: 9, cols: 15, agentRow: 4, agentCol: 7 },
  solidLabels: ["tree", "water", "rock", "wall", "black"],
  preserveNegativeCoordinates: true,
  settle: { minSettleMs: 150, timeoutMs: 1500, pollIntervalMs: 50, dialogueWatchMs: 400 },
  stuck: { historySize: 20, window: 10, distinctThreshold: 3, stuckThreshold: 3, minSamples: 8 },
  pathfinder: { unknownPenalty: 0.1, searchMargin: 1, maxExpansions: 10_000 },
  persistence: { dataDir: "data", saveEveryCycles: 10 },
  contextRadius: 4,
};

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join(", ")}` : message);
    this.name = "ConfigError";
    this.errors = errors;
  }
}

/**
 * Validates parsed configuration and fills omitted keys from the defaults.
 * Null or undefined means "all defaults".
 */
export function resolveEngineConfig(raw: unknown): EngineConfig {
  const input: unknown = raw ?? {};
  if (!isEngineConfigInput(input)) {
    throw new ConfigError("Invalid engine configuration", validateEngineConfigData(input).errors);
  }
  const d = DEFAULT_ENGINE_CONFIG;
  const config: EngineConfig = {
    window: { ...d.window, ...input.window },
    solidLabels: [...(input.solidLabels ?? d.solidLabels)],
    preserveNegativeCoordinates: input.preserveNegativeCoordinates ?? d.preserveNegativeCoordinates,
    settle: { ...d.settle, ...input.settle },
    stuck: { ...d.stuck, ...input.stuck },
    pathfinder: { ...d.pathfinder, ...input.pathfinder },
    persistence: { ...d.persistence, ...input.persistence },
    contextRadius: input.contextRadius ?? d.contextRadius,
  };

  const w = config.window;
  if (w.agentRow >= w.rows || w.agentCol >= w.cols) {
    throw new ConfigError("Invalid engine configuration", [
      `/window: agent cell (${w.agentRow},${w.agentCol}) lies outside a ${w.rows}x${w.cols} window`,
    ]);
  }
  if (config.settle.minSettleMs > config.settle.timeoutMs) {
    throw new ConfigError("Invalid engine configuration", ["/settle: minSettleMs exceeds timeoutMs"]);
  }
  return config;
}

export function parseEngineConfig(text: string): EngineConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Configuration is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveEngineConfig(parsed);
}

export interface LoadConfigOptions {
  /** Explicit file; otherwise WAYFINDER_CONFIG, then the default path. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Reads the YAML configuration. A missing file at the default location
 * yields the defaults; a missing file that was asked for explicitly is an
 * error. WAYFINDER_DATA_DIR overrides persistence.dataDir.
 */
export async function loadEngineConfig(options: LoadConfigOptions = {}): Promise<EngineConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.path ?? env.WAYFINDER_CONFIG;
  const path = resolve(cwd, explicit ?? DEFAULT_CONFIG_PATH);

  let text: string | null = null;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    if (!missing || explicit !== undefined) {
      throw new ConfigError(`Cannot read configuration ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const config = text === null ? resolveEngineConfig(undefined) : parseEngineConfig(text);
  const dataDir = env.WAYFINDER_DATA_DIR;
  if (dataDir) config.persistence.dataDir = dataDir;
  config.persistence.dataDir = resolve(cwd, config.persistence.dataDir);
  return config;
}
