export const ObservationSchema = {
  type: "object",
  required: ["rows", "cols", "agentRow", "agentCol", "cells"],
  properties: {
    rows: { type: "integer", minimum: 1 },
    cols: { type: "integer", minimum: 1 },
    agentRow: { type: "integer", minimum: 0 },
    agentCol: { type: "integer", minimum: 0 },
    cells: {
      type: "array",
      items: {
        type: "object",
        required: ["row", "col", "label"],
        properties: {
          row: { type: "integer", minimum: 0 },
          col: { type: "integer", minimum: 0 },
          label: { type: "string" },
        },
      },
    },
  },
} as const;

export const AgentSnapshotSchema = {
  type: "object",
  required: ["area", "x", "y", "facing"],
  properties: {
    area: {
      type: "object",
      required: ["group", "number"],
      properties: {
        group: { type: "integer" },
        number: { type: "integer" },
        name: { type: "string" },
      },
    },
    x: { type: "integer" },
    y: { type: "integer" },
    facing: { type: "string", enum: ["Up", "Down", "Left", "Right"] },
  },
} as const;
