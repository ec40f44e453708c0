/**
 * @fileoverview Navigation cost map
 *
 * Per-call grid of entry costs for one actor, derived from terrain,
 * occupants and the actor's capability profile. Built fresh for every path
 * query so it never reflects a stale turn.
 *
 * @module domain/simulation/navigation/NavigationCostMap
 */

import { NAVIGATION_COSTS } from "@/shared/constants/NavigationConstants";
import { TerrainType } from "@/shared/constants/TerrainEnums";
import type { GridPosition } from "@/shared/types/grid";
import type {
  CapabilityProfile,
  MapSnapshot,
  OccupantSnapshot,
} from "@/domain/types/world";

/**
 * Cost of entering a cell of this terrain, ignoring occupants.
 */
export function terrainCost(
  terrain: TerrainType,
  capabilities: CapabilityProfile,
): number {
  switch (terrain) {
    case TerrainType.FLOOR:
      return NAVIGATION_COSTS.FLOOR;
    case TerrainType.DOOR:
      return capabilities.canOpenDoors
        ? NAVIGATION_COSTS.DOOR
        : NAVIGATION_COSTS.IMPASSABLE;
    case TerrainType.HAZARD:
      return capabilities.canFly
        ? NAVIGATION_COSTS.FLOOR
        : NAVIGATION_COSTS.HAZARD;
    case TerrainType.DANGEROUS_HAZARD:
      return capabilities.canFly
        ? NAVIGATION_COSTS.FLOOR
        : NAVIGATION_COSTS.DANGEROUS_HAZARD;
    case TerrainType.WALL:
      return capabilities.canBurrow
        ? NAVIGATION_COSTS.BURROW_WALL
        : NAVIGATION_COSTS.IMPASSABLE;
  }
}

export interface CostMapOptions {
  /** The requesting actor; its own cell carries no occupant penalty */
  selfId?: string;
}

export class NavigationCostMap {
  private readonly terrainCosts: Float64Array;
  private readonly costs: Float64Array;
  private readonly occupied: Uint8Array;
  private cachedMinStepCost?: number;

  private constructor(
    public readonly width: number,
    public readonly height: number,
  ) {
    const size = width * height;
    this.terrainCosts = new Float64Array(size);
    this.costs = new Float64Array(size);
    this.occupied = new Uint8Array(size);
  }

  /**
   * Open map where every cell costs the same.
   */
  static uniform(width: number, height: number, cost: number = 1): NavigationCostMap {
    const map = new NavigationCostMap(width, height);
    map.terrainCosts.fill(cost);
    map.costs.fill(cost);
    return map;
  }

  /**
   * Map from explicit row-major costs, `rows[y][x]`.
   */
  static fromCosts(rows: readonly (readonly number[])[]): NavigationCostMap {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;
    const map = new NavigationCostMap(width, height);

    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(
          `NavigationCostMap: row ${y} has length ${row.length}, expected ${width}`,
        );
      }
      row.forEach((cost, x) => {
        map.terrainCosts[y * width + x] = cost;
        map.costs[y * width + x] = cost;
      });
    });
    return map;
  }

  /**
   * Builds the cost map for one actor.
   *
   * Occupied cells cost at least `OTHER_CREATURE` so paths route around
   * crowds but can still pass through them when nothing else is open.
   */
  static build(
    capabilities: CapabilityProfile,
    map: MapSnapshot,
    occupants: OccupantSnapshot,
    options: CostMapOptions = {},
  ): NavigationCostMap {
    const costMap = new NavigationCostMap(map.width, map.height);

    for (let y = 0; y < map.height; y++) {
      for (let x = 0; x < map.width; x++) {
        const position = { x, y };
        const index = y * map.width + x;
        const base = terrainCost(map.getTerrain(position), capabilities);
        costMap.terrainCosts[index] = base;
        costMap.costs[index] = base;

        const occupant = occupants.getOccupant(position);
        if (occupant && occupant.id !== options.selfId) {
          costMap.occupied[index] = 1;
          if (Number.isFinite(base)) {
            costMap.costs[index] = Math.max(base, NAVIGATION_COSTS.OTHER_CREATURE);
          }
        }
      }
    }

    return costMap;
  }

  public isInBounds(position: GridPosition): boolean {
    return (
      position.x >= 0 &&
      position.y >= 0 &&
      position.x < this.width &&
      position.y < this.height
    );
  }

  public indexOf(position: GridPosition): number {
    return position.y * this.width + position.x;
  }

  /**
   * Cost of entering the cell, occupant penalty included.
   * Out-of-bounds cells are impassable.
   */
  public getCost(position: GridPosition): number {
    if (!this.isInBounds(position)) return NAVIGATION_COSTS.IMPASSABLE;
    return this.costs[this.indexOf(position)];
  }

  /**
   * Cost of entering the cell as if nobody stood on it.
   */
  public getTerrainCost(position: GridPosition): number {
    if (!this.isInBounds(position)) return NAVIGATION_COSTS.IMPASSABLE;
    return this.terrainCosts[this.indexOf(position)];
  }

  public isPassable(position: GridPosition): boolean {
    return Number.isFinite(this.getCost(position));
  }

  public isOccupied(position: GridPosition): boolean {
    return this.isInBounds(position) && this.occupied[this.indexOf(position)] === 1;
  }

  /**
   * Cheapest finite terrain cost on the map; scales the A* heuristic.
   */
  public get minStepCost(): number {
    if (this.cachedMinStepCost === undefined) {
      let min = Number.POSITIVE_INFINITY;
      for (const cost of this.terrainCosts) {
        if (cost < min) min = cost;
      }
      this.cachedMinStepCost = Number.isFinite(min) ? min : 1;
    }
    return this.cachedMinStepCost;
  }
}

/**
 * Functional alias of {@link NavigationCostMap.build}.
 */
export function buildCostMap(
  capabilities: CapabilityProfile,
  map: MapSnapshot,
  occupants: OccupantSnapshot,
  options?: CostMapOptions,
): NavigationCostMap {
  return NavigationCostMap.build(capabilities, map, occupants, options);
}
