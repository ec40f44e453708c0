/**
 * Grid coordinate types shared by perception, navigation and the goal planner.
 *
 * @module shared/types/grid
 */

/**
 * Integer cell coordinate on the dungeon grid.
 */
export interface GridPosition {
  readonly x: number;
  readonly y: number;
}

/**
 * Single-step offset between two adjacent cells. Each axis is -1, 0 or 1.
 */
export type GridDirection = GridPosition;
