/**
 * @fileoverview GridMap - dense terrain grid
 *
 * Default `MapSnapshot` implementation. Hosts that keep their own map only
 * need to satisfy the interface; this one is handy for tools and tests.
 *
 * @module domain/world/GridMap
 */

import { TerrainType } from "@/shared/constants/TerrainEnums";
import type { GridPosition } from "@/shared/types/grid";
import type { MapSnapshot } from "@/domain/types/world";

/**
 * Glyphs understood by {@link GridMap.fromRows}.
 */
export const TERRAIN_GLYPHS: Readonly<Record<string, TerrainType>> = {
  ".": TerrainType.FLOOR,
  "#": TerrainType.WALL,
  "+": TerrainType.DOOR,
  "~": TerrainType.HAZARD,
  "^": TerrainType.DANGEROUS_HAZARD,
};

export class GridMap implements MapSnapshot {
  private readonly cells: TerrainType[];

  constructor(
    public readonly width: number,
    public readonly height: number,
    fill: TerrainType = TerrainType.FLOOR,
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
      throw new Error(`GridMap: dimensions must be integers (${width}x${height})`);
    }
    if (width <= 0 || height <= 0) {
      throw new Error(`GridMap: dimensions must be positive (${width}x${height})`);
    }
    this.cells = new Array<TerrainType>(width * height).fill(fill);
  }

  /**
   * Builds a map from ASCII rows, one glyph per cell.
   *
   * @example
   * ```ts
   * const map = GridMap.fromRows([
   *   "#####",
   *   "#.+~#",
   *   "#####",
   * ]);
   * ```
   */
  static fromRows(rows: readonly string[]): GridMap {
    if (rows.length === 0) {
      throw new Error("GridMap: at least one row is required");
    }
    const width = rows[0].length;
    const map = new GridMap(width, rows.length);

    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(
          `GridMap: row ${y} has length ${row.length}, expected ${width}`,
        );
      }
      for (let x = 0; x < width; x++) {
        const glyph = row[x];
        const terrain = TERRAIN_GLYPHS[glyph];
        if (terrain === undefined) {
          throw new Error(`GridMap: unknown glyph '${glyph}' at ${x},${y}`);
        }
        map.setTerrain({ x, y }, terrain);
      }
    });

    return map;
  }

  public isInBounds(position: GridPosition): boolean {
    return (
      position.x >= 0 &&
      position.y >= 0 &&
      position.x < this.width &&
      position.y < this.height
    );
  }

  public getTerrain(position: GridPosition): TerrainType {
    if (!this.isInBounds(position)) return TerrainType.WALL;
    return this.cells[position.y * this.width + position.x];
  }

  public setTerrain(position: GridPosition, terrain: TerrainType): void {
    if (!this.isInBounds(position)) {
      throw new Error(
        `GridMap: ${position.x},${position.y} is outside ${this.width}x${this.height}`,
      );
    }
    this.cells[position.y * this.width + position.x] = terrain;
  }

  public blocksSight(position: GridPosition): boolean {
    return this.getTerrain(position) === TerrainType.WALL;
  }
}
