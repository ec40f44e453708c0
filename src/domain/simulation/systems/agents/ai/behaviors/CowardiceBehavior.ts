import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { AIEventName, BehaviorType, GoalKind } from "@/shared/constants/AIEnums";
import type { AIBehavior } from "../actions/ActionGatherBus";
import type { GetActionsEvent } from "../actions/GetActionsEvent";
import { FleeGoal } from "../goals/FleeGoal";
import { healthFraction } from "./ItemUsageBehavior";

export interface CowardiceOptions {
  /** Health fraction under which the actor runs */
  fleeThreshold: number;
  fleeTurns: number;
  safeDistance: number;
}

const DEFAULT_OPTIONS: CowardiceOptions = {
  fleeThreshold: 0.25,
  fleeTurns: 5,
  safeDistance: 6,
};

/**
 * Badly hurt actors run. Pushes a {@link FleeGoal} on top of the goal that
 * asked for defensive actions and marks the event handled. The flight hangs
 * off the stack root, so it runs its course after the fight that triggered
 * it has ended.
 */
export class CowardiceBehavior implements AIBehavior {
  public readonly type = BehaviorType.COWARDICE;
  public readonly events: readonly AIEventName[] = [
    AIEventName.ON_GET_DEFENSIVE_ACTIONS,
  ];
  private readonly options: CowardiceOptions;

  constructor(options: Partial<CowardiceOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  public handle(event: GetActionsEvent): void {
    const { context } = event;
    if (healthFraction(context.actor) >= this.options.fleeThreshold) return;

    const alreadyFleeing = context.goalStack
      .getGoals()
      .some((goal) => goal.kind === GoalKind.FLEE);
    if (alreadyFleeing) return;

    const threat = event.target ?? context.closestEnemy();
    if (!threat) return;

    const flee = new FleeGoal(
      threat.id,
      this.options.fleeTurns,
      this.options.safeDistance,
    );
    flee.originalIntent = context.goalStack.getGoals()[0] ?? event.source;
    context.goalStack.push(flee);
    event.handled = true;

    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AI,
      context.actor.id,
      `panics and flees from ${threat.id}`,
    );
  }
}
