import { GoalKind } from "@/shared/constants/AIEnums";
import type { GridPosition } from "@/shared/types/grid";
import {
  DIRECTIONS_8,
  chebyshevDistance,
  offsetPosition,
} from "@/shared/utils/mathUtils";
import type { AIContext } from "../AIContext";
import { Goal } from "./Goal";
import { MoveDirectionGoal } from "./MoveDirectionGoal";

/**
 * One random step to an open adjacent cell, optionally kept within `radius`
 * of `center`. Finished once that step resolves either way, or at once when
 * no cell is open.
 */
export class WanderGoal extends Goal {
  public readonly kind = GoalKind.WANDER;
  private attempted = false;
  private pendingMove?: MoveDirectionGoal;

  constructor(
    public readonly center?: GridPosition,
    public readonly radius?: number,
  ) {
    super();
  }

  protected checkFinished(): boolean {
    return (
      this.attempted &&
      (this.pendingMove === undefined || this.pendingMove.isResolved)
    );
  }

  public takeAction(context: AIContext): void {
    if (this.attempted) return;
    this.attempted = true;

    const from = context.actor.position;
    const { center, radius } = this;
    const options = DIRECTIONS_8.filter((direction) => {
      const next = offsetPosition(from, direction);
      if (!context.isOpenStep(next)) return false;
      return (
        center === undefined ||
        radius === undefined ||
        chebyshevDistance(next, center) <= radius
      );
    });

    const direction = context.random.element(options);
    if (!direction) return;

    this.pendingMove = new MoveDirectionGoal(direction);
    this.pushSubGoal(context, this.pendingMove);
  }
}
