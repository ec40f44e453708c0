export { computeVisible, VisibleSet } from "./FieldOfView";
export {
  NavigationCostMap,
  buildCostMap,
  terrainCost,
  type CostMapOptions,
} from "./NavigationCostMap";
export {
  findPath,
  pathCost,
  type PathfindingOptions,
} from "./AStarPathfinder";
export {
  DistanceField,
  UNREACHABLE,
  buildDistanceField,
  stepToward,
  pathToNearestSource,
} from "./DijkstraMap";
