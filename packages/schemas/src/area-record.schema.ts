const CoordinateSchema = {
  type: "object",
  required: ["x", "y"],
  properties: {
    x: { type: "integer" },
    y: { type: "integer" },
  },
} as const;

const BoundsSchema = {
  type: ["object", "null"],
  required: ["minX", "minY", "maxX", "maxY"],
  properties: {
    minX: { type: "integer" },
    minY: { type: "integer" },
    maxX: { type: "integer" },
    maxY: { type: "integer" },
  },
} as const;

export const AreaRecordSchema = {
  type: "object",
  required: [
    "areaId", "displayName", "group", "number", "terrain", "traversal",
    "bounds", "visitCount", "createdAt", "updatedAt",
  ],
  properties: {
    areaId: { type: "string", minLength: 1 },
    displayName: { type: "string" },
    group: { type: "integer" },
    number: { type: "integer" },
    terrain: {
      type: "object",
      required: ["origin", "width", "height", "rows"],
      properties: {
        origin: CoordinateSchema,
        width: { type: "integer", minimum: 0 },
        height: { type: "integer", minimum: 0 },
        rows: { type: "array", items: { type: "array", items: { type: "string" } } },
      },
    },
    traversal: {
      type: "object",
      required: ["origin", "width", "height", "rows"],
      properties: {
        origin: CoordinateSchema,
        width: { type: "integer", minimum: 0 },
        height: { type: "integer", minimum: 0 },
        rows: { type: "array", items: { type: "string", pattern: "^[?WNPTIL]*$" } },
      },
    },
    bounds: BoundsSchema,
    visitCount: { type: "integer", minimum: 0 },
    createdAt: { type: "string", format: "date-time" },
    updatedAt: { type: "string", format: "date-time" },
  },
} as const;

const ConnectionSchema = {
  type: "object",
  required: ["fromArea", "fromCoord", "toArea", "toCoord", "direction"],
  properties: {
    fromArea: { type: "string", minLength: 1 },
    fromCoord: CoordinateSchema,
    toArea: { type: "string", minLength: 1 },
    toCoord: CoordinateSchema,
    direction: { enum: ["Up", "Down", "Left", "Right", null] },
  },
} as const;

export const ConnectionsRecordSchema = {
  type: "object",
  required: ["version", "updatedAt", "adjacency"],
  properties: {
    version: { const: 1 },
    updatedAt: { type: "string", format: "date-time" },
    adjacency: {
      type: "object",
      additionalProperties: { type: "array", items: ConnectionSchema },
    },
  },
} as const;
