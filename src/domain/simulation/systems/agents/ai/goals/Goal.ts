/**
 * @fileoverview Goal base class
 *
 * A goal is one unit of intent on an actor's goal stack. Only the top goal
 * is stepped. A goal either acts (runs a `GameAction`), plans (pushes a
 * sub-goal), or gives up with {@link Goal.fail}, which unwinds the stack to
 * the goal that pushed it.
 *
 * @module domain/simulation/systems/agents/ai/goals/Goal
 */

import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import type { GoalKind } from "@/shared/constants/AIEnums";
import type { AIContext } from "../AIContext";

export abstract class Goal {
  public abstract readonly kind: GoalKind;
  /** The goal that pushed this one. Never owned, only compared by identity. */
  public originalIntent?: Goal;

  private completed = false;
  private failed = false;

  public get hasCompleted(): boolean {
    return this.completed;
  }

  public get hasFailed(): boolean {
    return this.failed;
  }

  /** Completed or failed, without consulting the world */
  public get isResolved(): boolean {
    return this.completed || this.failed;
  }

  public isFinished(context: AIContext): boolean {
    return this.completed || this.checkFinished(context);
  }

  /**
   * Whether the goal has failed, either explicitly or because its abort
   * condition now holds.
   */
  public isFailed(context: AIContext): boolean {
    if (!this.failed && this.checkFailed(context)) {
      this.failed = true;
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.AI,
        context.actor.id,
        `${this.describe()} aborted`,
      );
    }
    return this.failed;
  }

  public abstract takeAction(context: AIContext): void;

  /**
   * Gives up on this goal and unwinds the stack down to its original intent.
   */
  public fail(context: AIContext, reason?: string): void {
    if (this.failed) return;
    this.failed = true;
    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AI,
      context.actor.id,
      `${this.describe()} failed${reason ? `: ${reason}` : ""}`,
    );
    context.goalStack.failToIntent(this);
  }

  public describe(): string {
    return this.kind;
  }

  protected checkFinished(_context: AIContext): boolean {
    return false;
  }

  protected checkFailed(_context: AIContext): boolean {
    return false;
  }

  protected complete(): void {
    this.completed = true;
  }

  protected pushSubGoal(context: AIContext, goal: Goal): void {
    goal.originalIntent = this;
    context.goalStack.push(goal);
  }
}
