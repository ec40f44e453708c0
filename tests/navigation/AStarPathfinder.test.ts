import { describe, it, expect } from "vitest";
import { findPath, pathCost } from "@/domain/simulation/navigation/AStarPathfinder";
import { NavigationCostMap } from "@/domain/simulation/navigation/NavigationCostMap";
import { GridMap } from "@/domain/world/GridMap";
import { DEFAULT_CAPABILITIES, type OccupantSnapshot } from "@/domain/types/world";
import { chebyshevDistance } from "@/shared/utils/mathUtils";
import type { GridPosition } from "@/shared/types/grid";

const X = Infinity;

function occupantAt(cell: GridPosition, id: string): OccupantSnapshot {
  return {
    getOccupant: (position) =>
      position.x === cell.x && position.y === cell.y ? { id } : undefined,
  };
}

function expectContiguous(start: GridPosition, path: readonly GridPosition[]): void {
  let previous = start;
  for (const step of path) {
    expect(chebyshevDistance(previous, step)).toBe(1);
    previous = step;
  }
}

describe("findPath", () => {
  it("finds a Chebyshev-length path on a uniform map", () => {
    const costMap = NavigationCostMap.uniform(10, 10);
    const start = { x: 0, y: 0 };
    const path = findPath(costMap, start, { x: 6, y: 3 });

    expect(path).not.toBeNull();
    expect(path).toHaveLength(6);
    expect(path?.[5]).toEqual({ x: 6, y: 3 });
    expectContiguous(start, path ?? []);
    expect(pathCost(costMap, path ?? [])).toBe(6);
  });

  it("returns an empty path when already at the goal", () => {
    expect(findPath(NavigationCostMap.uniform(3, 3), { x: 1, y: 1 }, { x: 1, y: 1 })).toEqual([]);
  });

  it("prefers a cheaper detour over an expensive straight line", () => {
    const costMap = NavigationCostMap.fromCosts([
      [1, 1, 1, 1, 1],
      [1, 9, 9, 9, 1],
      [1, 1, 1, 1, 1],
    ]);
    const path = findPath(costMap, { x: 0, y: 1 }, { x: 4, y: 1 });

    expect(path).toHaveLength(4);
    expect(pathCost(costMap, path ?? [])).toBe(4);
    expect(path?.some((cell) => cell.y === 1 && cell.x > 0 && cell.x < 4)).toBe(false);
  });

  it("returns null when a wall cuts the map in two", () => {
    const costMap = NavigationCostMap.fromCosts([
      [1, X, 1],
      [1, X, 1],
      [1, X, 1],
    ]);
    expect(findPath(costMap, { x: 0, y: 1 }, { x: 2, y: 1 })).toBeNull();
  });

  it("returns null for an impassable or out-of-bounds goal", () => {
    const costMap = NavigationCostMap.fromCosts([[1, 1, X]]);
    expect(findPath(costMap, { x: 0, y: 0 }, { x: 2, y: 0 })).toBeNull();
    expect(findPath(costMap, { x: 0, y: 0 }, { x: 5, y: 0 })).toBeNull();
  });

  it("paths onto an occupied goal without the occupant penalty", () => {
    const map = GridMap.fromRows(["....."]);
    const costMap = NavigationCostMap.build(
      DEFAULT_CAPABILITIES,
      map,
      occupantAt({ x: 4, y: 0 }, "orc"),
    );
    const path = findPath(costMap, { x: 0, y: 0 }, { x: 4, y: 0 });

    expect(path).toEqual([
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 3, y: 0 },
      { x: 4, y: 0 },
    ]);
    expect(pathCost(costMap, path ?? [])).toBe(4);
  });

  it("walks around a creature standing in the way", () => {
    const map = GridMap.fromRows([".....", ".....", "....."]);
    const costMap = NavigationCostMap.build(
      DEFAULT_CAPABILITIES,
      map,
      occupantAt({ x: 2, y: 1 }, "orc"),
    );
    const path = findPath(costMap, { x: 0, y: 1 }, { x: 4, y: 1 });

    expect(path).toHaveLength(4);
    expect(path?.some((cell) => cell.x === 2 && cell.y === 1)).toBe(false);
    expect(pathCost(costMap, path ?? [])).toBe(4);
  });

  it("gives up when the expansion budget runs out", () => {
    const costMap = NavigationCostMap.uniform(20, 20);
    expect(findPath(costMap, { x: 0, y: 0 }, { x: 19, y: 19 }, { maxExpansions: 1 })).toBeNull();
  });
});
