/**
 * @fileoverview ItemUsageBehavior - healing and offensive items
 *
 * Defensive: below the healing threshold, every healing item with charges is
 * a candidate, weighted up sharply as health drops.
 * Item tier: offensive items that reach a visible target.
 *
 * @module domain/simulation/systems/agents/ai/behaviors/ItemUsageBehavior
 */

import { AIEventName, BehaviorType } from "@/shared/constants/AIEnums";
import { InventoryItemKind } from "@/shared/constants/ItemEnums";
import type { ActorHandle, InventoryItem } from "@/domain/types/world";
import type { AIBehavior } from "../actions/ActionGatherBus";
import type { GetActionsEvent } from "../actions/GetActionsEvent";

export interface ItemUsageOptions {
  /** Health fraction under which healing is considered */
  healingThreshold: number;
  healingWeight: number;
  offensiveWeight: number;
}

const DEFAULT_OPTIONS: ItemUsageOptions = {
  healingThreshold: 0.5,
  healingWeight: 10,
  offensiveWeight: 15,
};

export function healthFraction(actor: ActorHandle): number {
  const { health } = actor;
  if (!health || health.max <= 0) return 1;
  return health.current / health.max;
}

/**
 * ×10 under 15% health, ×5 under 25%, ×1 otherwise.
 */
export function healingUrgency(fraction: number): number {
  if (fraction < 0.15) return 10;
  if (fraction < 0.25) return 5;
  return 1;
}

function hasCharges(item: InventoryItem): boolean {
  return item.charges === undefined || item.charges > 0;
}

export class ItemUsageBehavior implements AIBehavior {
  public readonly type = BehaviorType.ITEM_USAGE;
  public readonly events: readonly AIEventName[] = [
    AIEventName.ON_GET_DEFENSIVE_ACTIONS,
    AIEventName.ON_GET_ITEM_ACTIONS,
  ];
  private readonly options: ItemUsageOptions;

  constructor(options: Partial<ItemUsageOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  public handle(event: GetActionsEvent): void {
    if (event.name === AIEventName.ON_GET_DEFENSIVE_ACTIONS) {
      this.offerHealing(event);
    } else {
      this.offerOffensive(event);
    }
  }

  private offerHealing(event: GetActionsEvent): void {
    const { actor, actions } = event.context;
    const fraction = healthFraction(actor);
    if (fraction >= this.options.healingThreshold) return;

    const weight = this.options.healingWeight * healingUrgency(fraction);
    for (const item of actor.inventory ?? []) {
      if (item.kind !== InventoryItemKind.HEALING || !hasCharges(item)) continue;
      event.actions.add(actions.useItem(item.id), weight, `drink ${item.name}`);
    }
  }

  private offerOffensive(event: GetActionsEvent): void {
    const { target, context } = event;
    if (!target || target.isDead || !context.canSee(target)) return;

    const distance = context.distanceTo(target.position);
    for (const item of context.actor.inventory ?? []) {
      if (item.kind !== InventoryItemKind.OFFENSIVE || !hasCharges(item)) continue;
      if ((item.range ?? 1) < distance) continue;
      event.actions.add(
        context.actions.useItem(item.id, target.id),
        this.options.offensiveWeight,
        `use ${item.name}`,
      );
    }
  }
}
