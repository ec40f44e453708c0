/**
 * @fileoverview Event Bus - AI telemetry
 *
 * Typed event bus the orchestrator publishes planner activity on. Hosts
 * subscribe to drive debug overlays, combat logs or metrics.
 *
 * Features:
 * - Strongly typed events
 * - Unsubscribe handles
 * - Handler error isolation
 * - Optional debug logging
 *
 * @module domain/simulation/ecs
 */

import "reflect-metadata";
import { injectable } from "inversify";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import type {
  BehaviorType,
  GoalKind,
  GoalRemovalReason,
} from "@/shared/constants/AIEnums";
import type { GridPosition } from "@/shared/types/grid";

/**
 * Every event the AI core publishes.
 */
export interface SystemEvents {
  "ai:goal_pushed": {
    actorId: string;
    goal: GoalKind;
    intent?: GoalKind;
    depth: number;
    turn: number;
  };
  "ai:goal_removed": {
    actorId: string;
    goal: GoalKind;
    reason: GoalRemovalReason;
    turn: number;
  };
  "ai:action_executed": {
    actorId: string;
    action: string;
    success: boolean;
    message?: string;
    turnCost: number;
    turn: number;
  };
  "ai:turn_processed": {
    actorId: string;
    turn: number;
    iterations: number;
    actionTaken: boolean;
    stack: GoalKind[];
  };
  "ai:allies_alerted": {
    actorId: string;
    /** Allies now searching `position` */
    alerted: string[];
    position: GridPosition;
    turn: number;
  };
  "ai:actor_registered": {
    actorId: string;
    behaviors: BehaviorType[];
  };
  "ai:actor_unregistered": {
    actorId: string;
  };
}

export type EventName = keyof SystemEvents;
export type EventData<E extends EventName> = SystemEvents[E];
export type EventHandler<E extends EventName> = (data: EventData<E>) => void;

type HandlerRegistry = { [E in EventName]: Set<EventHandler<E>> };

export const EVENT_NAMES: readonly EventName[] = [
  "ai:goal_pushed",
  "ai:goal_removed",
  "ai:action_executed",
  "ai:turn_processed",
  "ai:allies_alerted",
  "ai:actor_registered",
  "ai:actor_unregistered",
];

export interface EventBusConfig {
  /** Enable debug logging */
  debug: boolean;
  /** Max listeners per event (0 = unlimited) */
  maxListeners: number;
  /** Catch and log handler errors instead of throwing */
  catchErrors: boolean;
}

const DEFAULT_CONFIG: EventBusConfig = {
  debug: false,
  maxListeners: 100,
  catchErrors: true,
};

@injectable()
export class EventBus {
  private config: EventBusConfig;
  private handlers: HandlerRegistry = {
    "ai:goal_pushed": new Set(),
    "ai:goal_removed": new Set(),
    "ai:action_executed": new Set(),
    "ai:turn_processed": new Set(),
    "ai:allies_alerted": new Set(),
    "ai:actor_registered": new Set(),
    "ai:actor_unregistered": new Set(),
  };
  private eventCounts = new Map<EventName, number>();

  constructor(config?: Partial<EventBusConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    logger.debug("📡 EventBus: Initialized", LogCategory.AI);
  }

  /**
   * Registers a handler for an event.
   * @returns Unsubscribe function
   */
  public on<E extends EventName>(
    event: E,
    handler: EventHandler<E>,
  ): () => void {
    const handlers: Set<EventHandler<E>> = this.handlers[event];

    if (
      this.config.maxListeners > 0 &&
      handlers.size >= this.config.maxListeners
    ) {
      logger.warn(
        `EventBus: Max listeners (${this.config.maxListeners}) reached for ${event}`,
        LogCategory.AI,
      );
    }

    handlers.add(handler);

    if (this.config.debug) {
      logger.debug(`EventBus: Handler registered for ${event}`, LogCategory.AI);
    }

    return () => {
      handlers.delete(handler);
      if (this.config.debug) {
        logger.debug(
          `EventBus: Handler unregistered from ${event}`,
          LogCategory.AI,
        );
      }
    };
  }

  /**
   * Registers a handler that runs once.
   */
  public once<E extends EventName>(
    event: E,
    handler: EventHandler<E>,
  ): () => void {
    const unsubscribe = this.on(event, (data: EventData<E>) => {
      unsubscribe();
      handler(data);
    });
    return unsubscribe;
  }

  /**
   * Emits an event to every registered handler.
   */
  public emit<E extends EventName>(event: E, data: EventData<E>): void {
    const handlers: Set<EventHandler<E>> = this.handlers[event];

    this.eventCounts.set(event, (this.eventCounts.get(event) ?? 0) + 1);

    if (handlers.size === 0) {
      if (this.config.debug) {
        logger.debug(`EventBus: No handlers for ${event}`, LogCategory.AI);
      }
      return;
    }

    if (this.config.debug) {
      logger.debug(
        `EventBus: Emitting ${event} to ${handlers.size} handlers`,
        LogCategory.AI,
      );
    }

    for (const handler of [...handlers]) {
      try {
        handler(data);
      } catch (error) {
        if (this.config.catchErrors) {
          logger.error(`EventBus: Error in handler for ${event}`, LogCategory.AI, {
            error: error instanceof Error ? error.message : String(error),
          });
        } else {
          throw error;
        }
      }
    }
  }

  /**
   * Removes one handler, or every handler of the event when none is given.
   */
  public off<E extends EventName>(event: E, handler?: EventHandler<E>): void {
    const handlers: Set<EventHandler<E>> = this.handlers[event];
    if (handler) {
      handlers.delete(handler);
    } else {
      handlers.clear();
    }
    if (this.config.debug) {
      logger.debug(`EventBus: Handlers removed for ${event}`, LogCategory.AI);
    }
  }

  public clear(): void {
    for (const event of EVENT_NAMES) {
      this.off(event);
    }
    this.eventCounts.clear();
  }

  public getHandlerCount(event: EventName): number {
    return this.handlers[event].size;
  }

  public getStats(): {
    totalEvents: number;
    eventCounts: Record<string, number>;
    handlerCounts: Record<string, number>;
  } {
    const eventCounts: Record<string, number> = {};
    const handlerCounts: Record<string, number> = {};

    for (const [event, count] of this.eventCounts) {
      eventCounts[event] = count;
    }

    for (const event of EVENT_NAMES) {
      const size = this.getHandlerCount(event);
      if (size > 0) handlerCounts[event] = size;
    }

    return {
      totalEvents: Array.from(this.eventCounts.values()).reduce(
        (a, b) => a + b,
        0,
      ),
      eventCounts,
      handlerCounts,
    };
  }

  public getRegisteredEvents(): EventName[] {
    return EVENT_NAMES.filter((event) => this.getHandlerCount(event) > 0);
  }
}
