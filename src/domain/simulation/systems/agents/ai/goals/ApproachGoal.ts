/**
 * @fileoverview ApproachGoal - close in on a cell or an actor
 *
 * @module domain/simulation/systems/agents/ai/goals/ApproachGoal
 */

import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { GoalKind } from "@/shared/constants/AIEnums";
import type { GridPosition } from "@/shared/types/grid";
import { chebyshevDistance, directionBetween } from "@/shared/utils/mathUtils";
import { findPath } from "@/domain/simulation/navigation/AStarPathfinder";
import type { AIContext } from "../AIContext";
import { Goal } from "./Goal";
import { MoveDirectionGoal } from "./MoveDirectionGoal";

/**
 * A fixed cell, or an actor whose position is re-read on every check.
 */
export type ApproachTarget =
  | { readonly position: GridPosition }
  | { readonly entityId: string };

/**
 * Walks towards the target until within `desiredDistance` (Chebyshev),
 * one A* step per turn. Fails when no path exists.
 */
export class ApproachGoal extends Goal {
  public readonly kind = GoalKind.APPROACH;
  private lastKnownPosition?: GridPosition;

  constructor(
    public readonly target: ApproachTarget,
    public readonly desiredDistance: number = 1,
  ) {
    super();
  }

  protected checkFinished(context: AIContext): boolean {
    const destination = this.refreshTarget(context);
    return (
      destination !== undefined &&
      chebyshevDistance(context.actor.position, destination) <= this.desiredDistance
    );
  }

  public takeAction(context: AIContext): void {
    const destination = this.refreshTarget(context);
    if (!destination) {
      this.fail(context, "target lost");
      return;
    }

    const from = context.actor.position;
    const path = findPath(context.buildCostMap(), from, destination);
    if (!path || path.length === 0) {
      this.fail(context, `no path to ${destination.x},${destination.y}`);
      return;
    }

    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.NAVIGATION,
      context.actor.id,
      `path to ${destination.x},${destination.y}: ${path.length} steps`,
    );
    this.pushSubGoal(context, new MoveDirectionGoal(directionBetween(from, path[0])));
  }

  /**
   * Current destination. A tracked actor that died or vanished leaves its
   * last seen cell as the destination.
   */
  public refreshTarget(context: AIContext): GridPosition | undefined {
    if ("entityId" in this.target) {
      const tracked = context.resolveLiving(this.target.entityId);
      if (tracked) this.lastKnownPosition = tracked.position;
    } else {
      this.lastKnownPosition = this.target.position;
    }
    return this.lastKnownPosition;
  }

  public describe(): string {
    const target =
      "entityId" in this.target
        ? this.target.entityId
        : `${this.target.position.x},${this.target.position.y}`;
    return `${this.kind}(${target}, ${this.desiredDistance})`;
  }
}
