/**
 * Movement cost policy used by the navigation cost map.
 *
 * Costs are per entered cell; diagonal and orthogonal steps weigh the same.
 *
 * @module shared/constants/NavigationConstants
 */

export const NAVIGATION_COSTS = {
  FLOOR: 1,
  /** Only for actors that can open doors */
  DOOR: 2,
  HAZARD: 3,
  /** Penalty for stepping into a cell another creature stands on */
  OTHER_CREATURE: 50,
  DANGEROUS_HAZARD: 100,
  /** Only for burrowers */
  BURROW_WALL: 20,
  IMPASSABLE: Number.POSITIVE_INFINITY,
} as const;

/**
 * Distance value of cells no source can reach.
 */
export const UNREACHABLE = Number.POSITIVE_INFINITY;
