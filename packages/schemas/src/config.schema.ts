const positiveInt = { type: "integer", minimum: 1 } as const;
const nonNegativeInt = { type: "integer", minimum: 0 } as const;

/**
 * Engine configuration as read from YAML. Every key is optional; omitted
 * values fall back to the built-in defaults.
 */
export const EngineConfigSchema = {
  type: "object",
  properties: {
    window: {
      type: "object",
      properties: {
        rows: positiveInt,
        cols: positiveInt,
        agentRow: nonNegativeInt,
        agentCol: nonNegativeInt,
      },
      additionalProperties: false,
    },
    solidLabels: { type: "array", items: { type: "string", minLength: 1 } },
    preserveNegativeCoordinates: { type: "boolean" },
    settle: {
      type: "object",
      properties: {
        minSettleMs: nonNegativeInt,
        timeoutMs: positiveInt,
        pollIntervalMs: positiveInt,
        dialogueWatchMs: nonNegativeInt,
      },
      additionalProperties: false,
    },
    stuck: {
      type: "object",
      properties: {
        historySize: positiveInt,
        window: positiveInt,
        distinctThreshold: positiveInt,
        stuckThreshold: positiveInt,
        minSamples: positiveInt,
      },
      additionalProperties: false,
    },
    pathfinder: {
      type: "object",
      properties: {
        unknownPenalty: { type: "number", minimum: 0 },
        searchMargin: nonNegativeInt,
        maxExpansions: positiveInt,
      },
      additionalProperties: false,
    },
    persistence: {
      type: "object",
      properties: {
        dataDir: { type: "string", minLength: 1 },
        saveEveryCycles: positiveInt,
      },
      additionalProperties: false,
    },
    contextRadius: positiveInt,
  },
  additionalProperties: false,
} as const;
