/**
 * @fileoverview CallForHelpBehavior - shout for allies on seeing a threat
 *
 * Offers the host's `callForHelp` action as a defensive candidate. When the
 * shout goes through, allies within the alert radius start searching the
 * threat's cell. The module then stays quiet for `cooldownTurns`.
 *
 * @module domain/simulation/systems/agents/ai/behaviors/CallForHelpBehavior
 */

import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { AIEventName, BehaviorType } from "@/shared/constants/AIEnums";
import type { GameAction } from "@/domain/types/world";
import type { AIBehavior } from "../actions/ActionGatherBus";
import type { GetActionsEvent } from "../actions/GetActionsEvent";

export interface CallForHelpOptions {
  /** Chebyshev radius around the caller */
  alertRadius: number;
  /** Search turns handed to every alerted ally */
  alertSearchTurns: number;
  /** Processed turns between two calls */
  cooldownTurns: number;
  weight: number;
}

const DEFAULT_OPTIONS: CallForHelpOptions = {
  alertRadius: 12,
  alertSearchTurns: 12,
  cooldownTurns: 4,
  weight: 5,
};

export class CallForHelpBehavior implements AIBehavior {
  public readonly type = BehaviorType.CALL_FOR_HELP;
  public readonly events: readonly AIEventName[] = [
    AIEventName.ON_GET_DEFENSIVE_ACTIONS,
  ];
  private readonly options: CallForHelpOptions;
  private lastCallTurn?: number;

  constructor(options: Partial<CallForHelpOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  public handle(event: GetActionsEvent): void {
    const { context } = event;
    const threat = event.target ?? context.closestEnemy();
    if (!threat || threat.isDead || !context.canSee(threat)) return;

    const turn = context.state.turnsProcessed;
    if (
      this.lastCallTurn !== undefined &&
      turn - this.lastCallTurn < this.options.cooldownTurns
    ) {
      return;
    }

    const shout = context.actions.callForHelp();
    const position = { x: threat.position.x, y: threat.position.y };
    const call: GameAction = {
      name: shout.name,
      canExecute: (actor, world) => shout.canExecute(actor, world),
      execute: (actor, world) => {
        const result = shout.execute(actor, world);
        if (!result.success) return result;

        this.lastCallTurn = turn;
        const alerted = context.alertAllies(
          position,
          this.options.alertRadius,
          this.options.alertSearchTurns,
        );
        logger.agentLog(
          LogLevel.DEBUG,
          LogCategory.AI,
          actor.id,
          `shouts about ${threat.id} at ${position.x},${position.y}`,
          { alerted },
        );
        return result;
      },
    };

    event.actions.add(call, this.options.weight, "call for help");
  }
}
