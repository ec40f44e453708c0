/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  AIConfig: Symbol.for("AIConfig"),
  AISystem: Symbol.for("AISystem"),
  EventBus: Symbol.for("EventBus"),
  ActionGatherBus: Symbol.for("ActionGatherBus"),
  RandomSource: Symbol.for("RandomSource"),

  WorldQueryService: Symbol.for("WorldQueryService"),
  ActionFactory: Symbol.for("ActionFactory"),
};
