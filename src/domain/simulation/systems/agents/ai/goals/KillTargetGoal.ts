/**
 * @fileoverview KillTargetGoal - fight one actor until it dies or is lost
 *
 * Each step walks the attack tiers in {@link KILL_TARGET_PRIORITY} order and
 * runs a weighted pick from the first tier that yields a runnable action.
 * When no tier yields, it closes the distance with an {@link ApproachGoal}.
 *
 * @module domain/simulation/systems/agents/ai/goals/KillTargetGoal
 */

import { AIEventName, GoalKind } from "@/shared/constants/AIEnums";
import { chebyshevDistance } from "@/shared/utils/mathUtils";
import type { ActorHandle } from "@/domain/types/world";
import type { AIContext } from "../AIContext";
import { ApproachGoal } from "./ApproachGoal";
import { Goal } from "./Goal";

/**
 * Attack tiers, highest priority first. Melee is only asked when adjacent.
 */
export const KILL_TARGET_PRIORITY: readonly AIEventName[] = [
  AIEventName.ON_GET_MELEE_ACTIONS,
  AIEventName.ON_GET_DEFENSIVE_ACTIONS,
  AIEventName.ON_GET_RANGED_ACTIONS,
  AIEventName.ON_GET_ITEM_ACTIONS,
];

export class KillTargetGoal extends Goal {
  public readonly kind = GoalKind.KILL_TARGET;

  constructor(public readonly targetId: string) {
    super();
  }

  /**
   * Done when the target is gone, dead, or out of sight.
   */
  protected checkFinished(context: AIContext): boolean {
    const target = context.resolveLiving(this.targetId);
    return !target || !context.canSee(target);
  }

  public takeAction(context: AIContext): void {
    const target = context.resolveLiving(this.targetId);
    if (!target) return;

    const adjacent = chebyshevDistance(context.actor.position, target.position) <= 1;

    for (const tier of KILL_TARGET_PRIORITY) {
      if (tier === AIEventName.ON_GET_MELEE_ACTIONS && !adjacent) continue;
      if (this.tryTier(context, tier, target)) return;
    }

    if (adjacent) {
      this.fail(context, "no usable attack on an adjacent target");
      return;
    }
    this.pushSubGoal(context, new ApproachGoal({ entityId: target.id }, 1));
  }

  /**
   * @returns true when the tier settled this step
   */
  private tryTier(
    context: AIContext,
    tier: AIEventName,
    target: ActorHandle,
  ): boolean {
    const event = context.gather(tier, this, target);
    if (event.handled) return true;

    const result = context.executeWeightedPick(event);
    if (result === undefined || !context.actionTaken) return false;

    if (tier === AIEventName.ON_GET_RANGED_ACTIONS && result.success) {
      context.gather(AIEventName.ON_RANGED_ATTACK_SUCCESS, this, target);
    }
    return true;
  }

  public describe(): string {
    return `${this.kind}(${this.targetId})`;
  }
}
