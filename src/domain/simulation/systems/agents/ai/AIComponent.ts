/**
 * @fileoverview AIComponent - per-actor planner state
 *
 * Everything the planner remembers about one actor between turns: its goal
 * stack, behaviour modules, standing orders (protect, stay near spawn) and
 * enemy memory. Perception itself is rebuilt every turn.
 *
 * @module domain/simulation/systems/agents/ai/AIComponent
 */

import type { GridPosition } from "@/shared/types/grid";
import type { ActorHandle } from "@/domain/types/world";
import type { AIBehavior } from "./actions/ActionGatherBus";
import { BehaviorRegistry } from "./behaviors/BehaviorRegistry";
import { GoalStack, type GoalStackListener } from "./goals/GoalStack";

export interface AIActorOptions {
  behaviors?: readonly AIBehavior[];
  /** Ally to stay close to while idle */
  protectionTargetId?: string;
  followDistance?: number;
  /** Home cell; idle actors farther than the leash radius walk back */
  spawnPosition?: GridPosition;
  /** Whether the actor goes after items it sees */
  collectsItems?: boolean;
}

export class AIComponent {
  public readonly goalStack: GoalStack;
  public readonly behaviors = new BehaviorRegistry();

  public protectionTargetId?: string;
  public followDistance: number;
  public spawnPosition?: GridPosition;
  public collectsItems: boolean;

  public lastKnownEnemyPosition?: GridPosition;
  public searchTurnsRemaining = 0;
  public turnsProcessed = 0;

  constructor(
    public readonly actorId: string,
    options: AIActorOptions,
    defaultFollowDistance: number,
    listener?: GoalStackListener,
  ) {
    this.goalStack = new GoalStack(listener);
    this.protectionTargetId = options.protectionTargetId;
    this.followDistance = options.followDistance ?? defaultFollowDistance;
    this.spawnPosition = options.spawnPosition;
    this.collectsItems = options.collectsItems ?? false;
  }

  public rememberEnemy(enemy: ActorHandle, searchTurns: number): void {
    this.lastKnownEnemyPosition = { x: enemy.position.x, y: enemy.position.y };
    this.searchTurnsRemaining = searchTurns;
  }

  /**
   * An ally called for help: search where it saw the enemy.
   */
  public hearAlarm(position: GridPosition, searchTurns: number): void {
    this.lastKnownEnemyPosition = { x: position.x, y: position.y };
    this.searchTurnsRemaining = searchTurns;
  }

  public forgetEnemy(): void {
    this.lastKnownEnemyPosition = undefined;
    this.searchTurnsRemaining = 0;
  }
}
