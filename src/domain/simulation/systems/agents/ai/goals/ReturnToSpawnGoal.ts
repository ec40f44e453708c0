import { GoalKind } from "@/shared/constants/AIEnums";
import { samePosition } from "@/shared/utils/mathUtils";
import type { AIContext } from "../AIContext";
import { ApproachGoal } from "./ApproachGoal";
import { Goal } from "./Goal";

/**
 * Walks an idle actor back to its spawn cell. Drops out when an enemy shows
 * up, and fails once the way home turned out to be blocked.
 */
export class ReturnToSpawnGoal extends Goal {
  public readonly kind = GoalKind.RETURN_TO_SPAWN;
  private approach?: ApproachGoal;

  protected checkFinished(context: AIContext): boolean {
    const spawn = context.state.spawnPosition;
    return (
      !spawn ||
      samePosition(context.actor.position, spawn) ||
      context.visibleEnemies.length > 0
    );
  }

  public takeAction(context: AIContext): void {
    const spawn = context.state.spawnPosition;
    if (!spawn) {
      this.complete();
      return;
    }
    if (this.approach?.hasFailed) {
      this.fail(context, "spawn unreachable");
      return;
    }

    this.approach = new ApproachGoal({ position: spawn }, 0);
    this.pushSubGoal(context, this.approach);
  }
}
