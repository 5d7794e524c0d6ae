/**
 * Grid-based spatial hash over lat/lng coordinates.
 */

import type { LatLng } from "../geo/types";

/**
 * Buckets items into square cells of a fixed size in degrees.
 * Cells keep insertion order, and so do the items inside a cell.
 */
export class SpatialGrid<T> {
  private cellSize: number;
  private cells: Map<string, T[]> = new Map();

  constructor(cellSize: number) {
    if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
      throw new Error(`Grid cell size must be a positive number of degrees, got ${cellSize}`);
    }
    this.cellSize = cellSize;
  }

  clear(): void {
    this.cells.clear();
  }

  /** Key of the cell containing a coordinate */
  getCellKey(coordinate: LatLng): string {
    const row = Math.floor(coordinate.lat / this.cellSize);
    const col = Math.floor(coordinate.lng / this.cellSize);
    return `${row},${col}`;
  }

  insert(coordinate: LatLng, item: T): void {
    const key = this.getCellKey(coordinate);
    let cell = this.cells.get(key);
    if (!cell) {
      cell = [];
      this.cells.set(key, cell);
    }
    cell.push(item);
  }

  /** Items sharing a cell with the coordinate */
  query(coordinate: LatLng): readonly T[] {
    return this.cells.get(this.getCellKey(coordinate)) ?? [];
  }

  /** Occupied cells in first-insertion order */
  occupiedCells(): IterableIterator<T[]> {
    return this.cells.values();
  }

  get cellCount(): number {
    return this.cells.size;
  }
}
