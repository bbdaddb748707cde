export { AreaMap, AreaRecordError, STRUCTURAL_STATUSES, UNKNOWN_LABEL } from "./area-map.js";
export type { AreaSummary } from "./area-map.js";
export { ObservationMerger, observationFromRows } from "./observation-merger.js";
export type { MergeResult, ObservationMergerConfig } from "./observation-merger.js";
export { ConnectivityGraph } from "./connectivity-graph.js";
export type { UpsertResult } from "./connectivity-graph.js";
export { AreaStore } from "./area-store.js";
export { AreaCatalog } from "./area-catalog.js";
export type { AreaCatalogOptions, MapOrigin, PersistListener, PersistTarget } from "./area-catalog.js";
export { ActiveArea, TraversalUpdater } from "./traversal-updater.js";
export type { TileEdit, TransitionResult, TraversalUpdaterOptions } from "./traversal-updater.js";
export { LEGEND, renderArea, windowAround, windowToText } from "./render.js";
export type { MapWindow, RenderOptions } from "./render.js";
