/**
 * @fileoverview FleeGoal - run from a threat for a number of turns
 *
 * Prefers stepping towards the nearest living ally (down a Dijkstra field
 * seeded on allies) as long as the step does not close on the threat;
 * otherwise takes the first open cell pointing away. A cornered actor waits.
 * Once the threat is out of sight the actor runs from where it last saw it.
 *
 * @module domain/simulation/systems/agents/ai/goals/FleeGoal
 */

import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { AIEventName, GoalKind } from "@/shared/constants/AIEnums";
import type { GridDirection, GridPosition } from "@/shared/types/grid";
import {
  chebyshevDistance,
  directionBetween,
  offsetPosition,
} from "@/shared/utils/mathUtils";
import {
  buildDistanceField,
  stepToward,
} from "@/domain/simulation/navigation/DijkstraMap";
import type { AIContext } from "../AIContext";
import { Goal } from "./Goal";
import { MoveDirectionGoal } from "./MoveDirectionGoal";

/** Clockwise from north */
const COMPASS: readonly GridDirection[] = [
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
  { x: -1, y: 1 },
  { x: -1, y: 0 },
  { x: -1, y: -1 },
];

/** Compass offsets tried after the straight-away heading */
const AWAY_FALLBACK_OFFSETS = [0, 1, -1, 2, -2] as const;

export class FleeGoal extends Goal {
  public readonly kind = GoalKind.FLEE;
  private turnsElapsed = 0;
  private threatPosition?: GridPosition;

  constructor(
    public readonly threatId: string,
    public readonly duration: number,
    public readonly safeDistance: number,
  ) {
    super();
  }

  public get elapsed(): number {
    return this.turnsElapsed;
  }

  /**
   * Both must hold: the minimum duration has passed, and the threat is gone,
   * out of sight, or at least `safeDistance` away.
   */
  protected checkFinished(context: AIContext): boolean {
    if (this.turnsElapsed < this.duration) return false;

    const threat = context.resolveLiving(this.threatId);
    if (!threat || !context.canSee(threat)) return true;
    return context.distanceTo(threat.position) >= this.safeDistance;
  }

  public takeAction(context: AIContext): void {
    this.turnsElapsed++;
    const threat = context.resolveLiving(this.threatId);

    const defensive = context.gather(
      AIEventName.ON_GET_DEFENSIVE_ACTIONS,
      this,
      threat,
    );
    if (defensive.handled) return;
    if (context.executeWeightedPick(defensive) !== undefined && context.actionTaken) {
      return;
    }

    if (!threat) return;
    if (context.canSee(threat)) this.threatPosition = threat.position;
    const danger = this.threatPosition;
    if (!danger) return;

    const direction =
      this.stepTowardAllies(context, danger) ?? this.stepAway(context, danger);
    if (!direction) {
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.AI,
        context.actor.id,
        `cornered by ${threat.id}`,
      );
      return;
    }
    this.pushSubGoal(context, new MoveDirectionGoal(direction));
  }

  private stepTowardAllies(
    context: AIContext,
    danger: GridPosition,
  ): GridDirection | undefined {
    const { actor, world, config } = context;
    const allies = world
      .getEntitiesInArea(actor.position, config.fleeAllyRadius)
      .filter(
        (other) =>
          other.id !== actor.id &&
          !other.isDead &&
          other.faction === actor.faction &&
          !world.isHostile(actor, other),
      );
    if (allies.length === 0) return undefined;

    const field = buildDistanceField(
      context.buildCostMap(),
      allies.map((ally) => ally.position),
    );
    const next = stepToward(field, actor.position);
    if (!next || !context.isOpenStep(next)) return undefined;

    const closesOnThreat =
      chebyshevDistance(next, danger) < chebyshevDistance(actor.position, danger);
    return closesOnThreat ? undefined : directionBetween(actor.position, next);
  }

  private stepAway(
    context: AIContext,
    danger: GridPosition,
  ): GridDirection | undefined {
    const from = context.actor.position;
    const away = directionBetween(danger, from);
    const headings =
      away.x === 0 && away.y === 0
        ? context.random.shuffle([...COMPASS])
        : this.headingsAway(away);

    return headings.find((direction) =>
      context.isOpenStep(offsetPosition(from, direction)),
    );
  }

  private headingsAway(away: GridDirection): GridDirection[] {
    const index = COMPASS.findIndex((d) => d.x === away.x && d.y === away.y);
    return AWAY_FALLBACK_OFFSETS.map(
      (offset) => COMPASS[(index + offset + COMPASS.length) % COMPASS.length],
    );
  }

  public describe(): string {
    return `${this.kind}(${this.threatId}, ${this.turnsElapsed}/${this.duration})`;
  }
}
