/**
 * @fileoverview AIContext - per-turn perception context
 *
 * Built once per processed turn for the acting actor: runs FOV, caches the
 * visible enemies, allies and items (nearest first), and carries the handles
 * goals need to plan and act. Cross-turn memory lives on goals or on the
 * actor's {@link AIComponent}, never here.
 *
 * @module domain/simulation/systems/agents/ai/AIContext
 */

import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import type { AIEventName } from "@/shared/constants/AIEnums";
import { DistanceMetric, TerrainType } from "@/shared/constants/TerrainEnums";
import type { GridPosition } from "@/shared/types/grid";
import { chebyshevDistance } from "@/shared/utils/mathUtils";
import type { RandomSource } from "@/shared/utils/RandomUtils";
import type { AIConfig } from "@/config/config";
import type {
  ActionFactory,
  ActionResult,
  ActorHandle,
  GameAction,
  GroundItem,
  WorldQueryService,
} from "@/domain/types/world";
import { computeVisible, type VisibleSet } from "@/domain/simulation/navigation/FieldOfView";
import { NavigationCostMap } from "@/domain/simulation/navigation/NavigationCostMap";
import type { ActionGatherBus } from "./actions/ActionGatherBus";
import { GetActionsEvent } from "./actions/GetActionsEvent";
import type { AIComponent } from "./AIComponent";
import type { Goal } from "./goals/Goal";
import type { GoalStack } from "./goals/GoalStack";

export interface PerceivedActor {
  readonly actor: ActorHandle;
  /** Chebyshev distance from the acting actor */
  readonly distance: number;
}

export interface PerceivedItem {
  readonly item: GroundItem;
  readonly distance: number;
}

export interface AIContextDeps {
  world: WorldQueryService;
  actions: ActionFactory;
  random: RandomSource;
  config: AIConfig;
  gatherBus: ActionGatherBus;
  onActionExecuted?: (action: GameAction, result: ActionResult) => void;
  /** Sets allies near the actor searching `position`; returns their ids */
  alertAllies?: (
    position: GridPosition,
    radius: number,
    searchTurns: number,
  ) => readonly string[];
}

function byDistanceThenId<T extends { distance: number }>(
  idOf: (entry: T) => string,
): (a: T, b: T) => number {
  return (a, b) => {
    if (a.distance !== b.distance) return a.distance - b.distance;
    const idA = idOf(a);
    const idB = idOf(b);
    return idA < idB ? -1 : idA > idB ? 1 : 0;
  };
}

export class AIContext {
  public readonly visibleTiles: VisibleSet;
  public readonly visibleEnemies: readonly PerceivedActor[];
  public readonly visibleAllies: readonly PerceivedActor[];
  public readonly visibleItems: readonly PerceivedItem[];

  private executed?: { action: GameAction; result: ActionResult };
  private seenByObserver = new Map<string, readonly PerceivedActor[]>();

  constructor(
    public readonly actor: ActorHandle,
    public readonly state: AIComponent,
    private readonly deps: AIContextDeps,
  ) {
    const { world } = deps;
    this.visibleTiles = computeVisible(
      world.map,
      actor.position,
      actor.visionRange,
      DistanceMetric.EUCLIDEAN,
    );

    const enemies: PerceivedActor[] = [];
    const allies: PerceivedActor[] = [];
    for (const other of world.getEntitiesInArea(actor.position, actor.visionRange)) {
      if (other.id === actor.id || other.isDead) continue;
      if (!this.visibleTiles.has(other.position)) continue;

      const entry = {
        actor: other,
        distance: chebyshevDistance(actor.position, other.position),
      };
      if (world.isHostile(actor, other)) {
        enemies.push(entry);
      } else if (other.faction === actor.faction) {
        allies.push(entry);
      }
    }

    const items: PerceivedItem[] = world
      .getItemsInArea(actor.position, actor.visionRange)
      .filter((item) => this.visibleTiles.has(item.position))
      .map((item) => ({
        item,
        distance: chebyshevDistance(actor.position, item.position),
      }));

    this.visibleEnemies = enemies.sort(byDistanceThenId((e) => e.actor.id));
    this.visibleAllies = allies.sort(byDistanceThenId((e) => e.actor.id));
    this.visibleItems = items.sort(byDistanceThenId((e) => e.item.id));

    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.PERCEPTION,
      actor.id,
      `sees ${this.visibleTiles.size} tiles, ${enemies.length} enemies, ${allies.length} allies, ${items.length} items`,
    );
  }

  public get world(): WorldQueryService {
    return this.deps.world;
  }

  public get actions(): ActionFactory {
    return this.deps.actions;
  }

  public get random(): RandomSource {
    return this.deps.random;
  }

  public get config(): AIConfig {
    return this.deps.config;
  }

  public get goalStack(): GoalStack {
    return this.state.goalStack;
  }

  /** An action ran this turn; no other may run */
  public get actionTaken(): boolean {
    return this.executed !== undefined;
  }

  public get lastAction(): { action: GameAction; result: ActionResult } | undefined {
    return this.executed;
  }

  public canSee(target: ActorHandle | GridPosition): boolean {
    const position = "position" in target ? target.position : target;
    return this.visibleTiles.has(position);
  }

  public closestEnemy(): ActorHandle | undefined {
    return this.visibleEnemies[0]?.actor;
  }

  /**
   * Enemies of the acting actor that `observer` can see from where it
   * stands, nearest to the acting actor first.
   */
  public enemiesVisibleTo(observer: ActorHandle): readonly PerceivedActor[] {
    if (observer.id === this.actor.id) return this.visibleEnemies;
    const cached = this.seenByObserver.get(observer.id);
    if (cached) return cached;

    const { world } = this.deps;
    const seen = computeVisible(
      world.map,
      observer.position,
      observer.visionRange,
      DistanceMetric.EUCLIDEAN,
    );
    const enemies = world
      .getEntitiesInArea(observer.position, observer.visionRange)
      .filter(
        (other) =>
          other.id !== this.actor.id &&
          other.id !== observer.id &&
          !other.isDead &&
          seen.has(other.position) &&
          world.isHostile(this.actor, other),
      )
      .map((other) => ({
        actor: other,
        distance: chebyshevDistance(this.actor.position, other.position),
      }))
      .sort(byDistanceThenId((e) => e.actor.id));

    this.seenByObserver.set(observer.id, enemies);
    return enemies;
  }

  public distanceTo(position: GridPosition): number {
    return chebyshevDistance(this.actor.position, position);
  }

  /**
   * Resolves an actor id to a living actor, or undefined.
   */
  public resolveLiving(actorId: string): ActorHandle | undefined {
    const other = this.deps.world.getActor(actorId);
    return other && !other.isDead ? other : undefined;
  }

  /**
   * Whether the actor could step into `position` right now: walkable,
   * unoccupied, and not a door it cannot open.
   */
  public isOpenStep(position: GridPosition): boolean {
    const { world } = this.deps;
    if (!world.map.isInBounds(position) || !world.isWalkable(position)) {
      return false;
    }
    if (world.getOccupant(position)) return false;
    return (
      world.map.getTerrain(position) !== TerrainType.DOOR ||
      this.actor.capabilities.canOpenDoors
    );
  }

  public buildCostMap(): NavigationCostMap {
    return NavigationCostMap.build(
      this.actor.capabilities,
      this.deps.world.map,
      this.deps.world,
      { selfId: this.actor.id },
    );
  }

  /**
   * Runs an action through both phases. At most one action runs per turn;
   * a rejected `canExecute` does not use the turn.
   */
  public executeAction(action: GameAction): ActionResult {
    if (this.executed) {
      return {
        success: false,
        message: `turn already spent on ${this.executed.action.name}`,
        turnCost: 0,
      };
    }

    if (!action.canExecute(this.actor, this.deps.world)) {
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.AI,
        this.actor.id,
        `${action.name} rejected`,
      );
      return { success: false, message: `${action.name} cannot be executed`, turnCost: 0 };
    }

    const result = action.execute(this.actor, this.deps.world);
    this.executed = { action, result };
    this.deps.onActionExecuted?.(action, result);
    return result;
  }

  /**
   * Executes a weighted-random pick from a gathered event.
   * @returns undefined when the event holds no candidates
   */
  public executeWeightedPick(event: GetActionsEvent): ActionResult | undefined {
    const pick = event.actions.pickRandomWeighted(this.deps.random);
    if (!pick) return undefined;

    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AI,
      this.actor.id,
      `picked ${pick.label} (${pick.weight}/${event.actions.totalWeight})`,
    );
    return this.executeAction(pick.action);
  }

  /**
   * Raises the alarm among allies within `radius` of the actor.
   * @returns Ids of the allies now searching `position`
   */
  public alertAllies(
    position: GridPosition,
    radius: number,
    searchTurns: number,
  ): readonly string[] {
    return this.deps.alertAllies?.(position, radius, searchTurns) ?? [];
  }

  /**
   * Fires an action-gathering event at this actor's behaviour modules.
   */
  public gather(
    name: AIEventName,
    source: Goal,
    target?: ActorHandle,
  ): GetActionsEvent {
    return this.deps.gatherBus.gather(
      this.actor.id,
      new GetActionsEvent(name, this, source, target),
    );
  }
}
