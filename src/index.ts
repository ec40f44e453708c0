/**
 * Public entry point of the dungeon AI core.
 *
 * @module index
 */
import "reflect-metadata";

export { TYPES } from "./config/Types";
export {
  CONFIG,
  DEFAULT_AI_CONFIG,
  loadAIConfig,
  type AIConfig,
} from "./config/config";
export { createAIContainer, type AIContainerOptions } from "./config/container";

export { logger, Logger, LogLevel, LogCategory } from "./infrastructure/utils/logger";
export {
  EventBus,
  EVENT_NAMES,
  type EventBusConfig,
  type EventName,
  type EventData,
  type EventHandler,
  type SystemEvents,
} from "./domain/simulation/ecs/EventBus";

export * from "./domain/types/world";
export { GridMap, TERRAIN_GLYPHS } from "./domain/world/GridMap";
export * from "./domain/simulation/navigation";
export * from "./domain/simulation/systems/agents/ai";

export * from "./shared/constants/AIEnums";
export { InventoryItemKind } from "./shared/constants/ItemEnums";
export { TerrainType, DistanceMetric } from "./shared/constants/TerrainEnums";
export { NAVIGATION_COSTS } from "./shared/constants/NavigationConstants";
export type { GridPosition, GridDirection } from "./shared/types/grid";
export {
  RandomUtils,
  createRandomSource,
  type RandomSource,
} from "./shared/utils/RandomUtils";
export * from "./shared/utils/mathUtils";
export { MinHeap } from "./shared/utils/MinHeap";
