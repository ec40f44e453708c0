import { GoalKind } from "@/shared/constants/AIEnums";
import { samePosition } from "@/shared/utils/mathUtils";
import type { AIContext } from "../AIContext";
import { ApproachGoal } from "./ApproachGoal";
import { Goal } from "./Goal";

/**
 * Walks onto an item and picks it up. Done once the item no longer exists,
 * whoever took it.
 */
export class SeekItemGoal extends Goal {
  public readonly kind = GoalKind.SEEK_ITEM;

  constructor(public readonly itemId: string) {
    super();
  }

  protected checkFinished(context: AIContext): boolean {
    return context.world.getItem(this.itemId) === undefined;
  }

  public takeAction(context: AIContext): void {
    const item = context.world.getItem(this.itemId);
    if (!item) {
      this.fail(context, "item gone");
      return;
    }

    if (samePosition(item.position, context.actor.position)) {
      const result = context.executeAction(context.actions.pickup(item.id));
      if (result.success) {
        this.complete();
      } else {
        this.fail(context, result.message);
      }
      return;
    }

    this.pushSubGoal(context, new ApproachGoal({ position: item.position }, 0));
  }

  public describe(): string {
    return `${this.kind}(${this.itemId})`;
  }
}
