/**
 * Terrain and distance enumerations for the dungeon grid.
 *
 * @module shared/constants/TerrainEnums
 */

/**
 * Enumeration of terrain kinds a map cell can hold.
 */
export enum TerrainType {
  FLOOR = "floor",
  WALL = "wall",
  DOOR = "door",
  /** Mild hazard such as shallow water or rubble */
  HAZARD = "hazard",
  /** Lava, chasms and other cells that hurt to enter */
  DANGEROUS_HAZARD = "dangerous_hazard",
}

/**
 * Distance metrics understood by the FOV engine.
 */
export enum DistanceMetric {
  EUCLIDEAN = "euclidean",
  CHEBYSHEV = "chebyshev",
}
