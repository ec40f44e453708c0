import { AIEventName, BehaviorType } from "@/shared/constants/AIEnums";
import { chebyshevDistance } from "@/shared/utils/mathUtils";
import type { AIBehavior } from "../actions/ActionGatherBus";
import type { GetActionsEvent } from "../actions/GetActionsEvent";

/**
 * Offers a melee attack on an adjacent target.
 */
export class MeleeAttackBehavior implements AIBehavior {
  public readonly type = BehaviorType.MELEE_ATTACK;
  public readonly events: readonly AIEventName[] = [
    AIEventName.ON_GET_MELEE_ACTIONS,
  ];

  constructor(private readonly weight: number = 10) {}

  public handle(event: GetActionsEvent): void {
    const { target, context } = event;
    if (!target || target.isDead) return;
    if (chebyshevDistance(context.actor.position, target.position) > 1) return;

    event.actions.add(context.actions.attack(target.id), this.weight, "melee attack");
  }
}
