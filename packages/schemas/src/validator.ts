import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { ObservationSchema, AgentSnapshotSchema } from "./observation.schema.js";
import { AreaRecordSchema, ConnectionsRecordSchema } from "./area-record.schema.js";
import { EngineConfigSchema } from "./config.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import type { AgentSnapshot, AreaRecord, ConnectionsRecord, EngineConfigInput, JournalEvent, Observation } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats exposes its plugin under .default when loaded from ESM
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateObservation: ValidateFunction<Observation> = ajv.compile<Observation>(ObservationSchema);
const validateSnapshot: ValidateFunction<AgentSnapshot> = ajv.compile<AgentSnapshot>(AgentSnapshotSchema);
const validateAreaRecord: ValidateFunction<AreaRecord> = ajv.compile<AreaRecord>(AreaRecordSchema);
const validateConnections: ValidateFunction<ConnectionsRecord> = ajv.compile<ConnectionsRecord>(ConnectionsRecordSchema);
const validateEngineConfig: ValidateFunction<EngineConfigInput> = ajv.compile<EngineConfigInput>(EngineConfigSchema);
const validateJournalEvent: ValidateFunction<JournalEvent> = ajv.compile<JournalEvent>(JournalEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateObservationData(data: unknown): ValidationResult {
  const valid = validateObservation(data);
  return toResult(valid, validateObservation.errors);
}

export function validateAreaRecordData(data: unknown): ValidationResult {
  const valid = validateAreaRecord(data);
  return toResult(valid, validateAreaRecord.errors);
}

export function validateConnectionsRecordData(data: unknown): ValidationResult {
  const valid = validateConnections(data);
  return toResult(valid, validateConnections.errors);
}

export function validateEngineConfigData(data: unknown): ValidationResult {
  const valid = validateEngineConfig(data);
  return toResult(valid, validateEngineConfig.errors);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

// Type guards for data crossing a collaborator or disk boundary.

export function isObservation(data: unknown): data is Observation {
  return validateObservation(data);
}

export function isAgentSnapshot(data: unknown): data is AgentSnapshot {
  return validateSnapshot(data);
}

export function isAreaRecord(data: unknown): data is AreaRecord {
  return validateAreaRecord(data);
}

export function isConnectionsRecord(data: unknown): data is ConnectionsRecord {
  return validateConnections(data);
}

export function isEngineConfigInput(data: unknown): data is EngineConfigInput {
  return validateEngineConfig(data);
}

export function isJournalEvent(data: unknown): data is JournalEvent {
  return validateJournalEvent(data);
}
