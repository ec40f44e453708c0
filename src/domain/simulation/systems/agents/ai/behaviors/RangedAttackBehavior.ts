import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { AIEventName, BehaviorType } from "@/shared/constants/AIEnums";
import type { ActorHandle } from "@/domain/types/world";
import type { AIBehavior } from "../actions/ActionGatherBus";
import type { GetActionsEvent } from "../actions/GetActionsEvent";

export interface RangedAttackOptions {
  /** Maximum Chebyshev range */
  range: number;
  weight?: number;
  /** Called after a ranged pick executed successfully */
  onHit?: (attacker: ActorHandle, target: ActorHandle) => void;
}

/**
 * Offers a ranged attack on a visible target that is in range but not
 * adjacent.
 */
export class RangedAttackBehavior implements AIBehavior {
  public readonly type = BehaviorType.RANGED_ATTACK;
  public readonly events: readonly AIEventName[] = [
    AIEventName.ON_GET_RANGED_ACTIONS,
    AIEventName.ON_RANGED_ATTACK_SUCCESS,
  ];
  private hits = 0;

  constructor(private readonly options: RangedAttackOptions) {}

  public get hitCount(): number {
    return this.hits;
  }

  public handle(event: GetActionsEvent): void {
    const { target, context } = event;
    if (!target || target.isDead) return;

    if (event.name === AIEventName.ON_RANGED_ATTACK_SUCCESS) {
      this.hits++;
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.AI,
        context.actor.id,
        `ranged hit on ${target.id}`,
      );
      this.options.onHit?.(context.actor, target);
      return;
    }

    const distance = context.distanceTo(target.position);
    if (distance <= 1 || distance > this.options.range) return;
    if (!context.canSee(target)) return;

    event.actions.add(
      context.actions.rangedAttack(target.id),
      this.options.weight ?? 10,
      "ranged attack",
    );
  }
}
