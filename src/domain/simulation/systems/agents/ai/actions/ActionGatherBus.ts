/**
 * @fileoverview Action Gather Bus
 *
 * Per-actor dispatch of action-gathering events to behaviour modules.
 * Modules subscribe explicitly for the events they answer; a goal fires an
 * event and reads back the weighted candidates.
 *
 * Flow:
 * ```
 * Goal → AIContext.gather() → ActionGatherBus.gather(actorId, event)
 *      → module.handle(event) … until event.handled
 * Goal ← event.actions.pickRandomWeighted()
 * ```
 *
 * @module domain/simulation/systems/agents/ai/actions/ActionGatherBus
 */

import "reflect-metadata";
import { injectable } from "inversify";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import type { AIEventName, BehaviorType } from "@/shared/constants/AIEnums";
import type { GetActionsEvent } from "./GetActionsEvent";

/**
 * A capability module attached to one actor (melee, ranged, item use...).
 */
export interface AIBehavior {
  readonly type: BehaviorType;
  /** Events this module answers */
  readonly events: readonly AIEventName[];
  handle(event: GetActionsEvent): void;
}

export interface ActionGatherBusConfig {
  /** Enable debug logging */
  debug: boolean;
  /** Catch and log module errors instead of throwing */
  catchErrors: boolean;
}

const DEFAULT_CONFIG: ActionGatherBusConfig = {
  debug: false,
  catchErrors: true,
};

@injectable()
export class ActionGatherBus {
  private config: ActionGatherBusConfig;
  private subscriptions = new Map<string, Map<AIEventName, AIBehavior[]>>();
  private gatherCounts = new Map<AIEventName, number>();

  constructor(config?: Partial<ActionGatherBusConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Subscribes a module to every event it lists, for one actor.
   * @returns Function for unsubscribe
   */
  public subscribe(actorId: string, behavior: AIBehavior): () => void {
    let byEvent = this.subscriptions.get(actorId);
    if (!byEvent) {
      byEvent = new Map();
      this.subscriptions.set(actorId, byEvent);
    }

    for (const eventName of behavior.events) {
      const modules = byEvent.get(eventName) ?? [];
      if (!modules.includes(behavior)) modules.push(behavior);
      byEvent.set(eventName, modules);
    }

    if (this.config.debug) {
      logger.debug(
        `ActionGatherBus: ${behavior.type} subscribed for ${actorId}`,
        LogCategory.AI,
      );
    }

    return () => this.unsubscribe(actorId, behavior);
  }

  public unsubscribe(actorId: string, behavior: AIBehavior): void {
    const byEvent = this.subscriptions.get(actorId);
    if (!byEvent) return;

    for (const [eventName, modules] of byEvent) {
      const remaining = modules.filter((module) => module !== behavior);
      if (remaining.length > 0) {
        byEvent.set(eventName, remaining);
      } else {
        byEvent.delete(eventName);
      }
    }
    if (byEvent.size === 0) this.subscriptions.delete(actorId);
  }

  public unsubscribeAll(actorId: string): void {
    this.subscriptions.delete(actorId);
  }

  /**
   * Runs every module of `actorId` subscribed to `event.name`, in
   * subscription order, stopping once a module marks the event handled.
   */
  public gather(actorId: string, event: GetActionsEvent): GetActionsEvent {
    this.gatherCounts.set(
      event.name,
      (this.gatherCounts.get(event.name) ?? 0) + 1,
    );

    const modules = this.subscriptions.get(actorId)?.get(event.name);
    if (!modules || modules.length === 0) return event;

    for (const module of [...modules]) {
      try {
        module.handle(event);
      } catch (error) {
        if (!this.config.catchErrors) throw error;
        logger.error(
          `ActionGatherBus: ${module.type} failed on ${event.name}`,
          LogCategory.AI,
          {
            actorId,
            error: error instanceof Error ? error.message : String(error),
          },
        );
      }
      if (event.handled) break;
    }

    if (this.config.debug) {
      logger.debug(
        `ActionGatherBus: ${event.name} for ${actorId} → ${event.actions.count} candidates${event.handled ? " (handled)" : ""}`,
        LogCategory.AI,
      );
    }
    return event;
  }

  public getSubscriberCount(actorId: string, eventName: AIEventName): number {
    return this.subscriptions.get(actorId)?.get(eventName)?.length ?? 0;
  }

  public getStats(): { actors: number; gatherCounts: Record<string, number> } {
    const gatherCounts: Record<string, number> = {};
    for (const [eventName, count] of this.gatherCounts) {
      gatherCounts[eventName] = count;
    }
    return { actors: this.subscriptions.size, gatherCounts };
  }
}
