import { describe, it, expect } from "vitest";
import {
  UNREACHABLE,
  buildDistanceField,
  pathToNearestSource,
  stepToward,
} from "@/domain/simulation/navigation/DijkstraMap";
import { NavigationCostMap } from "@/domain/simulation/navigation/NavigationCostMap";
import { DIRECTIONS_8, offsetPosition } from "@/shared/utils/mathUtils";

const X = Infinity;

describe("buildDistanceField", () => {
  it("measures steps to a single source", () => {
    const field = buildDistanceField(NavigationCostMap.uniform(5, 5), [{ x: 2, y: 2 }]);
    expect(field.get({ x: 2, y: 2 })).toBe(0);
    expect(field.get({ x: 0, y: 0 })).toBe(2);
    expect(field.get({ x: 4, y: 1 })).toBe(2);
  });

  it("measures to the nearest of several sources", () => {
    const field = buildDistanceField(NavigationCostMap.uniform(5, 5), [
      { x: 0, y: 0 },
      { x: 4, y: 4 },
    ]);
    expect(field.get({ x: 0, y: 0 })).toBe(0);
    expect(field.get({ x: 4, y: 4 })).toBe(0);
    expect(field.get({ x: 1, y: 1 })).toBe(1);
    expect(field.get({ x: 3, y: 3 })).toBe(1);
    expect(field.get({ x: 2, y: 2 })).toBe(2);
  });

  it("satisfies the Bellman condition on every reachable cell", () => {
    const costMap = NavigationCostMap.fromCosts([
      [1, 1, 3, 1, 1],
      [1, X, X, 2, 1],
      [1, 5, 1, X, 1],
      [2, 1, 1, 1, 1],
    ]);
    const sources = [{ x: 0, y: 0 }, { x: 4, y: 3 }];
    const field = buildDistanceField(costMap, sources);

    for (let y = 0; y < costMap.height; y++) {
      for (let x = 0; x < costMap.width; x++) {
        const cell = { x, y };
        const distance = field.get(cell);
        if (sources.some((s) => s.x === x && s.y === y)) {
          expect(distance).toBe(0);
          continue;
        }
        if (!costMap.isPassable(cell)) {
          expect(distance).toBe(UNREACHABLE);
          continue;
        }
        const bestNeighbour = Math.min(
          ...DIRECTIONS_8.map((d) => field.get(offsetPosition(cell, d))),
        );
        expect(distance).toBe(bestNeighbour + costMap.getCost(cell));
      }
    }
  });

  it("leaves walled-off cells unreachable", () => {
    const costMap = NavigationCostMap.fromCosts([
      [1, X, 1],
      [1, X, 1],
    ]);
    const field = buildDistanceField(costMap, [{ x: 0, y: 0 }]);
    expect(field.get({ x: 2, y: 1 })).toBe(UNREACHABLE);
    expect(field.isReachable({ x: 2, y: 1 })).toBe(false);
    expect(field.isReachable({ x: 0, y: 1 })).toBe(true);
    expect(field.get({ x: 9, y: 9 })).toBe(UNREACHABLE);
  });

  it("skips sources on impassable terrain", () => {
    const field = buildDistanceField(NavigationCostMap.fromCosts([[X, 1]]), [{ x: 0, y: 0 }]);
    expect(field.get({ x: 1, y: 0 })).toBe(UNREACHABLE);
  });
});

describe("stepToward", () => {
  const field = buildDistanceField(NavigationCostMap.uniform(5, 5), [{ x: 0, y: 0 }]);

  it("moves to the strictly lowest neighbour", () => {
    expect(stepToward(field, { x: 2, y: 2 })).toEqual({ x: 1, y: 1 });
  });

  it("returns null at a source or on an unreachable cell", () => {
    expect(stepToward(field, { x: 0, y: 0 })).toBeNull();
    const walled = buildDistanceField(NavigationCostMap.fromCosts([[1, X, 1]]), [
      { x: 0, y: 0 },
    ]);
    expect(stepToward(walled, { x: 2, y: 0 })).toBeNull();
  });

  it("follows the gradient down to the source", () => {
    expect(pathToNearestSource(field, { x: 4, y: 4 })).toEqual([
      { x: 3, y: 3 },
      { x: 2, y: 2 },
      { x: 1, y: 1 },
      { x: 0, y: 0 },
    ]);
    expect(pathToNearestSource(field, { x: 0, y: 0 })).toEqual([]);
  });
});
