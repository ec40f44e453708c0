import { GoalKind } from "@/shared/constants/AIEnums";
import type { AIContext } from "../AIContext";
import { ApproachGoal } from "./ApproachGoal";
import { Goal } from "./Goal";

/**
 * Stays within `maxDistance` of a leader. Aborts as soon as an enemy is in
 * view so the root can pick a fight instead.
 */
export class FollowEntityGoal extends Goal {
  public readonly kind = GoalKind.FOLLOW_ENTITY;

  constructor(
    public readonly leaderId: string,
    public readonly maxDistance: number,
  ) {
    super();
  }

  protected checkFailed(context: AIContext): boolean {
    return context.visibleEnemies.length > 0;
  }

  protected checkFinished(context: AIContext): boolean {
    const leader = context.resolveLiving(this.leaderId);
    return !leader || context.distanceTo(leader.position) <= this.maxDistance;
  }

  public takeAction(context: AIContext): void {
    if (context.visibleEnemies.length > 0) {
      this.fail(context, "enemies in view");
      return;
    }
    if (!context.resolveLiving(this.leaderId)) {
      this.complete();
      return;
    }
    this.pushSubGoal(
      context,
      new ApproachGoal({ entityId: this.leaderId }, this.maxDistance),
    );
  }

  public describe(): string {
    return `${this.kind}(${this.leaderId}, ${this.maxDistance})`;
  }
}
