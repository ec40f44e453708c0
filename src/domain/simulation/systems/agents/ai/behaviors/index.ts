export { BehaviorRegistry } from "./BehaviorRegistry";
export { MeleeAttackBehavior } from "./MeleeAttackBehavior";
export {
  RangedAttackBehavior,
  type RangedAttackOptions,
} from "./RangedAttackBehavior";
export {
  ItemUsageBehavior,
  healingUrgency,
  healthFraction,
  type ItemUsageOptions,
} from "./ItemUsageBehavior";
export { CowardiceBehavior, type CowardiceOptions } from "./CowardiceBehavior";
export {
  CallForHelpBehavior,
  type CallForHelpOptions,
} from "./CallForHelpBehavior";
