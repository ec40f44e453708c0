/**
 * @fileoverview Multi-source Dijkstra flood map
 *
 * Distance from every cell to the nearest of N sources, using the same
 * enter-cell cost semantics as the A* pathfinder. Actors walk the gradient
 * downhill to reach the closest source (allies, exits, loot).
 *
 * @module domain/simulation/navigation/DijkstraMap
 */

import { UNREACHABLE } from "@/shared/constants/NavigationConstants";
import type { GridPosition } from "@/shared/types/grid";
import { MinHeap } from "@/shared/utils/MinHeap";
import { DIRECTIONS_8, offsetPosition } from "@/shared/utils/mathUtils";
import type { NavigationCostMap } from "./NavigationCostMap";

export { UNREACHABLE };

/**
 * Dense per-cell distance array. Cells no source reaches hold
 * {@link UNREACHABLE}.
 */
export class DistanceField {
  constructor(
    public readonly width: number,
    public readonly height: number,
    private readonly distances: Float64Array,
  ) {}

  public isInBounds(position: GridPosition): boolean {
    return (
      position.x >= 0 &&
      position.y >= 0 &&
      position.x < this.width &&
      position.y < this.height
    );
  }

  public get(position: GridPosition): number {
    if (!this.isInBounds(position)) return UNREACHABLE;
    return this.distances[position.y * this.width + position.x];
  }

  public isReachable(position: GridPosition): boolean {
    return Number.isFinite(this.get(position));
  }
}

interface FrontierNode {
  readonly index: number;
  readonly distance: number;
}

/**
 * Floods outward from every source at distance 0.
 *
 * Sources outside the map or on terrain this actor cannot stand on are
 * skipped; a source's occupant does not stop it from seeding.
 */
export function buildDistanceField(
  costMap: NavigationCostMap,
  sources: Iterable<GridPosition>,
): DistanceField {
  const { width, height } = costMap;
  const distances = new Float64Array(width * height).fill(UNREACHABLE);
  const frontier = new MinHeap<FrontierNode>(
    (a, b) => a.distance - b.distance || a.index - b.index,
  );

  for (const source of sources) {
    if (!costMap.isInBounds(source)) continue;
    if (!Number.isFinite(costMap.getTerrainCost(source))) continue;
    const index = costMap.indexOf(source);
    if (distances[index] === 0) continue;
    distances[index] = 0;
    frontier.push({ index, distance: 0 });
  }

  while (!frontier.isEmpty()) {
    const current = frontier.pop();
    if (!current) break;
    if (current.distance > distances[current.index]) continue;

    const cx = current.index % width;
    const cy = (current.index - cx) / width;

    for (const direction of DIRECTIONS_8) {
      const next = { x: cx + direction.x, y: cy + direction.y };
      const cost = costMap.getCost(next);
      if (!Number.isFinite(cost)) continue;

      const nextIndex = costMap.indexOf(next);
      const candidate = current.distance + cost;
      if (candidate < distances[nextIndex]) {
        distances[nextIndex] = candidate;
        frontier.push({ index: nextIndex, distance: candidate });
      }
    }
  }

  return new DistanceField(width, height, distances);
}

/**
 * The neighbour with the lowest distance strictly below the current cell's.
 * Ties go to the first neighbour in the fixed direction order.
 *
 * @returns `null` at a source, on an unreachable cell, or in a local minimum
 */
export function stepToward(
  field: DistanceField,
  position: GridPosition,
): GridPosition | null {
  const current = field.get(position);
  if (current === 0 || !Number.isFinite(current)) return null;

  let best: GridPosition | null = null;
  let bestDistance = current;
  for (const direction of DIRECTIONS_8) {
    const next = offsetPosition(position, direction);
    const distance = field.get(next);
    if (distance < bestDistance) {
      best = next;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Follows the gradient from `start` down to the nearest source.
 *
 * @returns Cells after `start`, ending on a source; `[]` at a source;
 * `null` when `start` is unreachable
 */
export function pathToNearestSource(
  field: DistanceField,
  start: GridPosition,
): GridPosition[] | null {
  if (!field.isReachable(start)) return null;

  const path: GridPosition[] = [];
  let current = start;
  const limit = field.width * field.height;
  while (path.length < limit) {
    const next = stepToward(field, current);
    if (!next) break;
    path.push(next);
    current = next;
  }
  return path;
}
