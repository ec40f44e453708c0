import { GoalKind } from "@/shared/constants/AIEnums";
import type { AIContext } from "../AIContext";
import { ApproachGoal } from "./ApproachGoal";
import { Goal } from "./Goal";
import { KillTargetGoal } from "./KillTargetGoal";

/**
 * Guards a protected ally. Threats the ally can see come first, then the
 * guard's own. A threat only the ally sees is closed on until the guard
 * sees it too. Finished once neither of them sees an enemy, or when the
 * ally is gone.
 */
export class DefendTargetGoal extends Goal {
  public readonly kind = GoalKind.DEFEND_TARGET;

  constructor(public readonly wardId: string) {
    super();
  }

  protected checkFinished(context: AIContext): boolean {
    const ward = context.resolveLiving(this.wardId);
    if (!ward) return true;
    return (
      context.enemiesVisibleTo(ward).length === 0 &&
      context.visibleEnemies.length === 0
    );
  }

  public takeAction(context: AIContext): void {
    const ward = context.resolveLiving(this.wardId);
    if (!ward) {
      this.fail(context, `${this.wardId} is gone`);
      return;
    }

    const threat =
      context.enemiesVisibleTo(ward)[0]?.actor ?? context.closestEnemy();
    if (!threat) return;

    if (context.canSee(threat)) {
      this.pushSubGoal(context, new KillTargetGoal(threat.id));
    } else {
      this.pushSubGoal(context, new ApproachGoal({ entityId: threat.id }, 1));
    }
  }

  public describe(): string {
    return `${this.kind}(${this.wardId})`;
  }
}
