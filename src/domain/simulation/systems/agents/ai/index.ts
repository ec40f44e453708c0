/**
 * AI Subsystem Module Exports
 *
 * Goal-stack planner:
 * ```
 * AISystem.processTurn(id) → AIContext → GoalStack → Goal.takeAction()
 *   → ActionGatherBus → behaviour modules → GameAction
 * ```
 *
 * @module domain/simulation/systems/agents/ai
 */

export { AISystem, type TurnSummary } from "./AISystem";
export { AIComponent, type AIActorOptions } from "./AIComponent";
export {
  AIContext,
  type AIContextDeps,
  type PerceivedActor,
  type PerceivedItem,
} from "./AIContext";

export {
  ActionGatherBus,
  type AIBehavior,
  type ActionGatherBusConfig,
} from "./actions/ActionGatherBus";
export { GetActionsEvent } from "./actions/GetActionsEvent";
export {
  WeightedActionList,
  type WeightedAction,
} from "./actions/WeightedActionList";

export * from "./goals";
export * from "./behaviors";
