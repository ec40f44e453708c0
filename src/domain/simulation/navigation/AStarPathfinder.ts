/**
 * @fileoverview A* pathfinder over a navigation cost map
 *
 * 8-directional search where every step costs the entered cell's cost, so
 * diagonal and orthogonal moves weigh the same. The heuristic is Chebyshev
 * distance scaled by the map's cheapest step, which never overestimates.
 *
 * @module domain/simulation/navigation/AStarPathfinder
 */

import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import type { GridPosition } from "@/shared/types/grid";
import { MinHeap } from "@/shared/utils/MinHeap";
import {
  DIRECTIONS_8,
  chebyshevDistance,
  samePosition,
} from "@/shared/utils/mathUtils";
import type { NavigationCostMap } from "./NavigationCostMap";

export interface PathfindingOptions {
  /** Node expansions before giving up (default: every cell once) */
  maxExpansions?: number;
}

interface OpenNode {
  readonly index: number;
  readonly g: number;
  readonly f: number;
  readonly order: number;
}

function compareOpenNodes(a: OpenNode, b: OpenNode): number {
  return a.f - b.f || a.order - b.order;
}

/**
 * Finds the cheapest path from `start` to `goal`.
 *
 * @returns Cells to step through, excluding `start` and ending at `goal`;
 * `[]` when already there; `null` when the goal is out of bounds,
 * impassable for this actor, unreachable, or the expansion budget ran out.
 * The goal's occupant penalty is ignored so an actor can path onto a target
 * it means to attack.
 */
export function findPath(
  costMap: NavigationCostMap,
  start: GridPosition,
  goal: GridPosition,
  options: PathfindingOptions = {},
): GridPosition[] | null {
  if (!costMap.isInBounds(start) || !costMap.isInBounds(goal)) return null;
  if (samePosition(start, goal)) return [];
  if (!Number.isFinite(costMap.getTerrainCost(goal))) return null;

  const { width } = costMap;
  const size = width * costMap.height;
  const startIndex = costMap.indexOf(start);
  const goalIndex = costMap.indexOf(goal);
  const heuristicScale = costMap.minStepCost;
  const maxExpansions = options.maxExpansions ?? size;

  const gScore = new Float64Array(size).fill(Number.POSITIVE_INFINITY);
  const cameFrom = new Int32Array(size).fill(-1);
  const closed = new Uint8Array(size);
  const open = new MinHeap<OpenNode>(compareOpenNodes);
  let order = 0;

  gScore[startIndex] = 0;
  open.push({
    index: startIndex,
    g: 0,
    f: chebyshevDistance(start, goal) * heuristicScale,
    order: order++,
  });

  let expansions = 0;
  while (!open.isEmpty()) {
    const current = open.pop();
    if (!current) break;
    if (closed[current.index] === 1 || current.g > gScore[current.index]) {
      continue;
    }

    if (current.index === goalIndex) {
      return reconstructPath(cameFrom, goalIndex, startIndex, width);
    }

    closed[current.index] = 1;
    if (++expansions > maxExpansions) {
      logger.debug(
        `A*: expansion budget ${maxExpansions} exhausted`,
        LogCategory.NAVIGATION,
        { start, goal },
      );
      return null;
    }

    const cx = current.index % width;
    const cy = (current.index - cx) / width;

    for (const direction of DIRECTIONS_8) {
      const next = { x: cx + direction.x, y: cy + direction.y };
      if (!costMap.isInBounds(next)) continue;

      const nextIndex = costMap.indexOf(next);
      if (closed[nextIndex] === 1) continue;

      const stepCost =
        nextIndex === goalIndex
          ? costMap.getTerrainCost(next)
          : costMap.getCost(next);
      if (!Number.isFinite(stepCost)) continue;

      const tentative = current.g + stepCost;
      if (tentative < gScore[nextIndex]) {
        gScore[nextIndex] = tentative;
        cameFrom[nextIndex] = current.index;
        open.push({
          index: nextIndex,
          g: tentative,
          f: tentative + chebyshevDistance(next, goal) * heuristicScale,
          order: order++,
        });
      }
    }
  }

  return null;
}

function reconstructPath(
  cameFrom: Int32Array,
  goalIndex: number,
  startIndex: number,
  width: number,
): GridPosition[] {
  const path: GridPosition[] = [];
  let index = goalIndex;
  while (index !== startIndex && index !== -1) {
    path.push({ x: index % width, y: Math.floor(index / width) });
    index = cameFrom[index];
  }
  return path.reverse();
}

/**
 * Total entry cost of walking `path` on `costMap` (goal priced without its
 * occupant penalty, as {@link findPath} does).
 */
export function pathCost(
  costMap: NavigationCostMap,
  path: readonly GridPosition[],
): number {
  return path.reduce(
    (total, position, i) =>
      total +
      (i === path.length - 1
        ? costMap.getTerrainCost(position)
        : costMap.getCost(position)),
    0,
  );
}
