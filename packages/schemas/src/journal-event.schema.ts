export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "session_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    session_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "session.started", "session.ended",
        "cycle.completed", "cycle.aborted",
        "action.failed", "observation.rejected",
        "area.entered", "map.persisted", "map.persist_failed",
      ],
    },
    payload: { type: "object" },
    seq: { type: "integer", minimum: 0 },
    hash_prev: { type: "string" },
  },
  additionalProperties: false,
} as const;
