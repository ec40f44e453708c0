import { GoalKind } from "@/shared/constants/AIEnums";
import type { GridPosition } from "@/shared/types/grid";
import { samePosition } from "@/shared/utils/mathUtils";
import type { AIContext } from "../AIContext";
import { ApproachGoal } from "./ApproachGoal";
import { Goal } from "./Goal";
import { WanderGoal } from "./WanderGoal";

/**
 * Goes to where an enemy was last seen, then wanders around that spot for
 * the remaining search turns. Spending the last search turn wipes the
 * enemy memory. A new position (an ally's alarm) restarts the approach.
 */
export class SearchLastKnownPositionGoal extends Goal {
  public readonly kind = GoalKind.SEARCH_LAST_KNOWN_POSITION;
  private approach?: ApproachGoal;
  private reached = false;
  private searchedPosition?: GridPosition;

  protected checkFinished(context: AIContext): boolean {
    return (
      context.visibleEnemies.length > 0 ||
      context.state.lastKnownEnemyPosition === undefined
    );
  }

  public takeAction(context: AIContext): void {
    const { state, config } = context;
    const target = state.lastKnownEnemyPosition;
    if (!target) {
      this.complete();
      return;
    }

    if (!this.searchedPosition || !samePosition(this.searchedPosition, target)) {
      this.searchedPosition = target;
      this.reached = false;
      this.approach = undefined;
    }
    if (context.distanceTo(target) === 0) this.reached = true;
    if (!this.reached && !this.approach?.hasFailed) {
      this.approach = new ApproachGoal({ position: target }, 0);
      this.pushSubGoal(context, this.approach);
      return;
    }

    if (state.searchTurnsRemaining <= 0) {
      state.forgetEnemy();
      this.complete();
      return;
    }

    state.searchTurnsRemaining--;
    this.pushSubGoal(context, new WanderGoal(target, config.searchRadius));
  }
}
