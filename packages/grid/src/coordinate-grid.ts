import type { Bounds, Coordinate, GridRecord } from "@wayfinder/schemas";

export interface GridCell<T> {
  coord: Coordinate;
  value: T;
}

/**
 * Unbounded 2D store keyed by signed coordinates.
 *
 * Backed by a dense row-major array plus the world coordinate of its
 * top-left cell. Writing outside the current storage inserts whole rows or
 * columns on the touched edge and moves the origin, so logical coordinates
 * of earlier writes never change. Reads outside storage return the default.
 */
export class CoordinateGrid<T> {
  readonly defaultValue: T;
  private rows: T[][] = [];
  private originX = 0;
  private originY = 0;
  private cols = 0;

  constructor(defaultValue: T) {
    this.defaultValue = defaultValue;
  }

  get width(): number {
    return this.cols;
  }

  get height(): number {
    return this.rows.length;
  }

  get origin(): Coordinate {
    return { x: this.originX, y: this.originY };
  }

  isEmpty(): boolean {
    return this.rows.length === 0;
  }

  has(c: Coordinate): boolean {
    const col = c.x - this.originX;
    const row = c.y - this.originY;
    return row >= 0 && row < this.rows.length && col >= 0 && col < this.cols;
  }

  get(c: Coordinate): T {
    if (!this.has(c)) return this.defaultValue;
    return this.rows[c.y - this.originY]![c.x - this.originX]!;
  }

  set(c: Coordinate, value: T): void {
    if (this.isEmpty()) {
      this.originX = c.x;
      this.originY = c.y;
      this.cols = 1;
      this.rows = [[value]];
      return;
    }
    this.ensure(c);
    this.rows[c.y - this.originY]![c.x - this.originX] = value;
  }

  bounds(): Bounds | null {
    if (this.isEmpty()) return null;
    return {
      minX: this.originX,
      minY: this.originY,
      maxX: this.originX + this.cols - 1,
      maxY: this.originY + this.rows.length - 1,
    };
  }

  *cells(): IterableIterator<GridCell<T>> {
    for (let r = 0; r < this.rows.length; r++) {
      const row = this.rows[r]!;
      for (let c = 0; c < this.cols; c++) {
        yield { coord: { x: this.originX + c, y: this.originY + r }, value: row[c]! };
      }
    }
  }

  find(predicate: (value: T, coord: Coordinate) => boolean): Coordinate | null {
    for (const cell of this.cells()) {
      if (predicate(cell.value, cell.coord)) return cell.coord;
    }
    return null;
  }

  count(predicate: (value: T, coord: Coordinate) => boolean): number {
    let n = 0;
    for (const cell of this.cells()) {
      if (predicate(cell.value, cell.coord)) n++;
    }
    return n;
  }

  toJSON(): GridRecord<T> {
    return {
      origin: this.origin,
      width: this.cols,
      height: this.rows.length,
      rows: this.rows.map((row) => [...row]),
    };
  }

  static fromJSON<T>(record: GridRecord<T>, defaultValue: T): CoordinateGrid<T> {
    const grid = new CoordinateGrid<T>(defaultValue);
    if (record.height === 0 || record.width === 0) return grid;
    grid.originX = record.origin.x;
    grid.originY = record.origin.y;
    grid.cols = record.width;
    grid.rows = [];
    for (let r = 0; r < record.height; r++) {
      const source = record.rows[r] ?? [];
      const row: T[] = new Array<T>(record.width);
      for (let c = 0; c < record.width; c++) {
        row[c] = c < source.length ? source[c]! : defaultValue;
      }
      grid.rows.push(row);
    }
    return grid;
  }

  private ensure(c: Coordinate): void {
    const left = this.originX - c.x;
    if (left > 0) {
      const pad = new Array<T>(left).fill(this.defaultValue);
      for (let r = 0; r < this.rows.length; r++) {
        this.rows[r] = pad.concat(this.rows[r]!);
      }
      this.originX = c.x;
      this.cols += left;
    }
    const right = c.x - (this.originX + this.cols - 1);
    if (right > 0) {
      for (const row of this.rows) {
        for (let i = 0; i < right; i++) row.push(this.defaultValue);
      }
      this.cols += right;
    }
    const above = this.originY - c.y;
    if (above > 0) {
      const added: T[][] = [];
      for (let i = 0; i < above; i++) added.push(new Array<T>(this.cols).fill(this.defaultValue));
      this.rows = added.concat(this.rows);
      this.originY = c.y;
    }
    const below = c.y - (this.originY + this.rows.length - 1);
    for (let i = 0; i < below; i++) {
      this.rows.push(new Array<T>(this.cols).fill(this.defaultValue));
    }
  }
}
