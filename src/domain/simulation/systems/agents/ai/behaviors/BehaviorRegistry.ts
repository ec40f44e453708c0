/**
 * @fileoverview Per-actor behaviour module registry
 *
 * One module per {@link BehaviorType}. Goals and modules look siblings up by
 * type, never by name.
 *
 * @module domain/simulation/systems/agents/ai/behaviors/BehaviorRegistry
 */

import type { BehaviorType } from "@/shared/constants/AIEnums";
import type { AIBehavior } from "../actions/ActionGatherBus";

export class BehaviorRegistry {
  private readonly modules = new Map<BehaviorType, AIBehavior>();

  /**
   * Adds a module, replacing any module of the same type.
   * @returns The replaced module, if any
   */
  public register(behavior: AIBehavior): AIBehavior | undefined {
    const previous = this.modules.get(behavior.type);
    this.modules.set(behavior.type, behavior);
    return previous;
  }

  public get(type: BehaviorType): AIBehavior | undefined {
    return this.modules.get(type);
  }

  public has(type: BehaviorType): boolean {
    return this.modules.has(type);
  }

  public remove(type: BehaviorType): AIBehavior | undefined {
    const module = this.modules.get(type);
    this.modules.delete(type);
    return module;
  }

  public getAll(): AIBehavior[] {
    return Array.from(this.modules.values());
  }

  public types(): BehaviorType[] {
    return Array.from(this.modules.keys());
  }
}
