/**
 * @fileoverview AISystem - goal-stack planner orchestrator
 *
 * Owns one {@link AIComponent} per registered actor and runs the planner
 * for one actor per call:
 * ```
 * processTurn(id) → AIContext (FOV, enemies, allies, items)
 *   → GoalStack.removeFinished() → top.takeAction()
 *   → … until an action runs or no goal was pushed
 * ```
 * The root {@link BoredGoal} is never absent after a processed turn.
 * Planner activity is published on the {@link EventBus}.
 *
 * @module domain/simulation/systems/agents/ai
 */

import "reflect-metadata";
import { inject, injectable } from "inversify";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import type { GoalKind } from "@/shared/constants/AIEnums";
import type { GridPosition } from "@/shared/types/grid";
import { chebyshevDistance } from "@/shared/utils/mathUtils";
import type { RandomSource } from "@/shared/utils/RandomUtils";
import type { AIConfig } from "@/config/config";
import { TYPES } from "@/config/Types";
import type {
  ActionFactory,
  ActionResult,
  ActorHandle,
  GameAction,
  WorldQueryService,
} from "@/domain/types/world";
import type { EventBus } from "@/domain/simulation/ecs/EventBus";
import type { ActionGatherBus, AIBehavior } from "./actions/ActionGatherBus";
import { AIComponent, type AIActorOptions } from "./AIComponent";
import { AIContext } from "./AIContext";
import { BoredGoal } from "./goals/BoredGoal";
import type { GoalStack, GoalStackListener } from "./goals/GoalStack";

export interface TurnSummary {
  actorId: string;
  /** Planning steps taken */
  iterations: number;
  actionTaken: boolean;
  action?: { name: string; result: ActionResult };
  /** Goal kinds bottom to top after the turn */
  stack: GoalKind[];
}

@injectable()
export class AISystem {
  private components = new Map<string, AIComponent>();
  private unsubscribers = new Map<string, Array<() => void>>();

  constructor(
    @inject(TYPES.WorldQueryService) private readonly world: WorldQueryService,
    @inject(TYPES.ActionFactory) private readonly actions: ActionFactory,
    @inject(TYPES.ActionGatherBus) private readonly gatherBus: ActionGatherBus,
    @inject(TYPES.EventBus) private readonly eventBus: EventBus,
    @inject(TYPES.RandomSource) private readonly random: RandomSource,
    @inject(TYPES.AIConfig) private readonly config: AIConfig,
  ) {
    logger.info("✅ [AISystem] Initialized", LogCategory.AI, {
      maxPlanningIterations: config.maxPlanningIterations,
    });
  }

  /**
   * Gives an actor planner state and subscribes its behaviour modules.
   * Registering an actor again replaces its state.
   */
  public registerActor(
    actorId: string,
    options: AIActorOptions = {},
  ): AIComponent {
    if (this.components.has(actorId)) this.unregisterActor(actorId);

    const component = new AIComponent(
      actorId,
      options,
      this.config.followDistance,
      this.createStackListener(actorId),
    );
    this.components.set(actorId, component);

    for (const behavior of options.behaviors ?? []) {
      this.addBehavior(actorId, behavior);
    }

    this.eventBus.emit("ai:actor_registered", {
      actorId,
      behaviors: component.behaviors.types(),
    });
    return component;
  }

  /**
   * Attaches a behaviour module, replacing any module of the same type.
   */
  public addBehavior(actorId: string, behavior: AIBehavior): void {
    const component = this.components.get(actorId) ?? this.registerActor(actorId);

    const replaced = component.behaviors.register(behavior);
    if (replaced) this.gatherBus.unsubscribe(actorId, replaced);

    const unsubscribe = this.gatherBus.subscribe(actorId, behavior);
    const list = this.unsubscribers.get(actorId) ?? [];
    list.push(unsubscribe);
    this.unsubscribers.set(actorId, list);
  }

  public unregisterActor(actorId: string): boolean {
    const component = this.components.get(actorId);
    if (!component) return false;

    for (const unsubscribe of this.unsubscribers.get(actorId) ?? []) {
      unsubscribe();
    }
    this.unsubscribers.delete(actorId);
    this.gatherBus.unsubscribeAll(actorId);
    component.goalStack.clear();
    this.components.delete(actorId);

    this.eventBus.emit("ai:actor_unregistered", { actorId });
    return true;
  }

  /**
   * Sets or clears the ally an actor stays near while idle.
   */
  public setProtectionTarget(
    actorId: string,
    targetId?: string,
    followDistance?: number,
  ): void {
    const component = this.components.get(actorId) ?? this.registerActor(actorId);
    component.protectionTargetId = targetId;
    if (followDistance !== undefined) component.followDistance = followDistance;
  }

  public getComponent(actorId: string): AIComponent | undefined {
    return this.components.get(actorId);
  }

  public getRegisteredActors(): string[] {
    return [...this.components.keys()];
  }

  /**
   * The actor's goal stack, for debugging and tests.
   */
  public goalStackFor(actorId: string): GoalStack | undefined {
    return this.components.get(actorId)?.goalStack;
  }

  /**
   * Runs the planner for one actor's turn. Unknown or dead actors are
   * skipped. Actors without state are registered on first use.
   *
   * @returns Summary of the turn, or undefined when skipped
   */
  public processTurn(actorId: string): TurnSummary | undefined {
    const actor = this.world.getActor(actorId);
    if (!actor || actor.isDead) {
      logger.debug(
        `[AISystem] Skipping ${actorId}: ${actor ? "dead" : "unknown actor"}`,
        LogCategory.AI,
      );
      return undefined;
    }

    const component = this.components.get(actorId) ?? this.registerActor(actorId);
    component.turnsProcessed++;
    const turn = component.turnsProcessed;

    const context = new AIContext(actor, component, {
      world: this.world,
      actions: this.actions,
      random: this.random,
      config: this.config,
      gatherBus: this.gatherBus,
      onActionExecuted: (action, result) =>
        this.onActionExecuted(actorId, turn, action, result),
      alertAllies: (position, radius, searchTurns) =>
        this.alertAllies(actor, turn, position, radius, searchTurns),
    });

    const enemy = context.closestEnemy();
    if (enemy) component.rememberEnemy(enemy, this.config.searchTurns);

    const stack = component.goalStack;
    let iterations = 0;
    while (iterations < this.config.maxPlanningIterations) {
      iterations++;
      stack.removeFinished(context);
      if (stack.isEmpty()) stack.push(new BoredGoal());

      const top = stack.peek();
      if (!top) break;

      const before = stack.count;
      top.takeAction(context);
      if (context.actionTaken || stack.count <= before) break;
    }

    if (iterations >= this.config.maxPlanningIterations && !context.actionTaken) {
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.AI,
        actorId,
        `planning budget spent after ${iterations} steps`,
      );
    }

    this.ensureRootGoal(stack);

    const kinds = stack.getGoals().map((goal) => goal.kind);
    this.eventBus.emit("ai:turn_processed", {
      actorId,
      turn,
      iterations,
      actionTaken: context.actionTaken,
      stack: kinds,
    });

    const last = context.lastAction;
    return {
      actorId,
      iterations,
      actionTaken: context.actionTaken,
      action: last ? { name: last.action.name, result: last.result } : undefined,
      stack: kinds,
    };
  }

  /**
   * Processes every registered actor once, in registration order.
   */
  public processAll(): TurnSummary[] {
    const summaries: TurnSummary[] = [];
    for (const actorId of this.getRegisteredActors()) {
      const summary = this.processTurn(actorId);
      if (summary) summaries.push(summary);
    }
    return summaries;
  }

  public getStats(): {
    actors: number;
    goals: number;
    deepestStack: number;
  } {
    let goals = 0;
    let deepestStack = 0;
    for (const component of this.components.values()) {
      goals += component.goalStack.count;
      deepestStack = Math.max(deepestStack, component.goalStack.count);
    }
    return { actors: this.components.size, goals, deepestStack };
  }

  public cleanup(): void {
    for (const actorId of this.getRegisteredActors()) {
      this.unregisterActor(actorId);
    }
  }

  private ensureRootGoal(stack: GoalStack): void {
    if (stack.isEmpty()) stack.push(new BoredGoal());
  }

  /**
   * Living registered actors of the caller's faction within `radius` start
   * searching `position`.
   */
  private alertAllies(
    caller: ActorHandle,
    turn: number,
    position: GridPosition,
    radius: number,
    searchTurns: number,
  ): string[] {
    const alerted: string[] = [];
    for (const [actorId, component] of this.components) {
      if (actorId === caller.id) continue;
      const ally = this.world.getActor(actorId);
      if (
        !ally ||
        ally.isDead ||
        ally.faction !== caller.faction ||
        this.world.isHostile(caller, ally) ||
        chebyshevDistance(caller.position, ally.position) > radius
      ) {
        continue;
      }
      component.hearAlarm(position, searchTurns);
      alerted.push(actorId);
    }

    logger.agentLog(
      LogLevel.INFO,
      LogCategory.AI,
      caller.id,
      `calls for help, ${alerted.length} allies alerted`,
    );
    if (alerted.length > 0) {
      this.eventBus.emit("ai:allies_alerted", {
        actorId: caller.id,
        alerted,
        position: { x: position.x, y: position.y },
        turn,
      });
    }
    return alerted;
  }

  private createStackListener(actorId: string): GoalStackListener {
    const turnOf = (): number =>
      this.components.get(actorId)?.turnsProcessed ?? 0;
    return {
      onPushed: (goal, depth) => {
        this.eventBus.emit("ai:goal_pushed", {
          actorId,
          goal: goal.kind,
          intent: goal.originalIntent?.kind,
          depth,
          turn: turnOf(),
        });
      },
      onRemoved: (goal, reason) => {
        this.eventBus.emit("ai:goal_removed", {
          actorId,
          goal: goal.kind,
          reason,
          turn: turnOf(),
        });
      },
    };
  }

  private onActionExecuted(
    actorId: string,
    turn: number,
    action: GameAction,
    result: ActionResult,
  ): void {
    logger.agentLog(
      result.success ? LogLevel.DEBUG : LogLevel.INFO,
      LogCategory.AI,
      actorId,
      `${action.name} → ${result.success ? "ok" : (result.message ?? "failed")}`,
    );
    this.eventBus.emit("ai:action_executed", {
      actorId,
      action: action.name,
      success: result.success,
      message: result.message,
      turnCost: result.turnCost,
      turn,
    });
  }
}
