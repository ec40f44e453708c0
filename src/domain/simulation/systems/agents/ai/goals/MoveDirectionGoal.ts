import { GoalKind } from "@/shared/constants/AIEnums";
import type { GridDirection } from "@/shared/types/grid";
import type { AIContext } from "../AIContext";
import { Goal } from "./Goal";

/**
 * Leaf goal: one step through the host's move action. Finished on success,
 * fails back to its intent when the move is rejected.
 */
export class MoveDirectionGoal extends Goal {
  public readonly kind = GoalKind.MOVE_DIRECTION;

  constructor(public readonly direction: GridDirection) {
    super();
  }

  public takeAction(context: AIContext): void {
    const result = context.executeAction(context.actions.move(this.direction));
    if (result.success) {
      this.complete();
    } else {
      this.fail(context, result.message);
    }
  }

  public describe(): string {
    return `${this.kind}(${this.direction.x},${this.direction.y})`;
  }
}
