/**
 * Shared grid math for consistent distance and direction calculations across
 * perception, navigation and goals.
 *
 * @module shared/utils/mathUtils
 */

import type { GridDirection, GridPosition } from "../types/grid";

/**
 * The eight neighbour offsets. Orthogonal steps come first so that every
 * search that walks this list breaks ties the same way.
 */
export const DIRECTIONS_8: readonly GridDirection[] = [
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 1, y: -1 },
  { x: 1, y: 1 },
  { x: -1, y: 1 },
  { x: -1, y: -1 },
];

/**
 * Chebyshev (king-move) distance: the number of 8-directional steps between
 * two cells on an open grid.
 */
export function chebyshevDistance(a: GridPosition, b: GridPosition): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function euclideanDistanceSquared(
  a: GridPosition,
  b: GridPosition,
): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export function samePosition(a: GridPosition, b: GridPosition): boolean {
  return a.x === b.x && a.y === b.y;
}

export function offsetPosition(
  position: GridPosition,
  direction: GridDirection,
): GridPosition {
  return { x: position.x + direction.x, y: position.y + direction.y };
}

/**
 * Unit step from `from` towards `to` (each axis clamped to -1..1).
 */
export function directionBetween(
  from: GridPosition,
  to: GridPosition,
): GridDirection {
  return { x: Math.sign(to.x - from.x), y: Math.sign(to.y - from.y) };
}

/**
 * Stable string key for maps and sets keyed by cell.
 */
export function positionKey(position: GridPosition): string {
  return `${position.x},${position.y}`;
}
