export { CoordinateGrid } from "./coordinate-grid.js";
export type { GridCell } from "./coordinate-grid.js";
export {
  DIRECTION_DELTAS,
  opposite,
  step,
  manhattan,
  sameCoord,
  coordKey,
  directionBetween,
  parseCoord,
} from "./directions.js";
