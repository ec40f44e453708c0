/**
 * @fileoverview Goal Stack
 *
 * Ordered goals of one actor, bottom (root) to top (most tactical).
 *
 * @module domain/simulation/systems/agents/ai/goals/GoalStack
 */

import { GoalRemovalReason } from "@/shared/constants/AIEnums";
import type { AIContext } from "../AIContext";
import type { Goal } from "./Goal";

export interface GoalStackListener {
  onPushed?(goal: Goal, depth: number): void;
  onRemoved?(goal: Goal, reason: GoalRemovalReason): void;
}

export class GoalStack {
  private goals: Goal[] = [];

  constructor(private readonly listener: GoalStackListener = {}) {}

  public get count(): number {
    return this.goals.length;
  }

  public isEmpty(): boolean {
    return this.goals.length === 0;
  }

  public peek(): Goal | undefined {
    return this.goals[this.goals.length - 1];
  }

  public contains(goal: Goal): boolean {
    return this.goals.includes(goal);
  }

  /**
   * Snapshot of the stack, bottom to top.
   */
  public getGoals(): readonly Goal[] {
    return [...this.goals];
  }

  public push(goal: Goal): void {
    this.goals.push(goal);
    this.listener.onPushed?.(goal, this.goals.length);
  }

  public pop(): Goal | undefined {
    const goal = this.goals.pop();
    if (goal) this.listener.onRemoved?.(goal, GoalRemovalReason.FINISHED);
    return goal;
  }

  /**
   * Maintenance pass, bottom to top. Drops goals that finished or failed and
   * every goal whose original intent was dropped earlier in the same pass.
   *
   * @returns The removed goals, bottom to top
   */
  public removeFinished(context: AIContext): Goal[] {
    const removed: Goal[] = [];
    const removedSet = new Set<Goal>();
    const kept: Goal[] = [];

    for (const goal of this.goals) {
      let reason: GoalRemovalReason | undefined;
      if (goal.originalIntent && removedSet.has(goal.originalIntent)) {
        reason = GoalRemovalReason.CASCADE;
      } else if (goal.isFailed(context)) {
        reason = GoalRemovalReason.FAILED;
      } else if (goal.isFinished(context)) {
        reason = GoalRemovalReason.FINISHED;
      }

      if (reason === undefined) {
        kept.push(goal);
        continue;
      }
      removed.push(goal);
      removedSet.add(goal);
      this.listener.onRemoved?.(goal, reason);
    }

    this.goals = kept;
    return removed;
  }

  /**
   * Pops from the top down to, not including, the failed goal's original
   * intent, leaving the intent on top. When the intent is not below the
   * failed goal, only the failed goal and what sits above it are popped.
   * A goal that is not on the stack changes nothing.
   *
   * @returns The popped goals, top first
   */
  public failToIntent(failed: Goal): Goal[] {
    const failedIndex = this.goals.indexOf(failed);
    if (failedIndex === -1) return [];

    const intentIndex = failed.originalIntent
      ? this.goals.indexOf(failed.originalIntent)
      : -1;
    const keep =
      intentIndex !== -1 && intentIndex < failedIndex
        ? intentIndex + 1
        : failedIndex;

    const popped = this.goals.splice(keep).reverse();
    for (const goal of popped) {
      this.listener.onRemoved?.(
        goal,
        goal === failed ? GoalRemovalReason.FAILED : GoalRemovalReason.CASCADE,
      );
    }
    return popped;
  }

  public clear(): void {
    this.goals = [];
  }
}
