/**
 * @fileoverview Weighted candidate list filled by behaviour modules
 *
 * @module domain/simulation/systems/agents/ai/actions/WeightedActionList
 */

import type { GameAction } from "@/domain/types/world";
import type { RandomSource } from "@/shared/utils/RandomUtils";

export interface WeightedAction {
  readonly action: GameAction;
  readonly weight: number;
  /** Human-readable reason, for logs */
  readonly label: string;
}

export class WeightedActionList {
  private readonly entries: WeightedAction[] = [];

  public add(action: GameAction, weight: number, label: string = action.name): void {
    this.entries.push({ action, weight, label });
  }

  public get count(): number {
    return this.entries.length;
  }

  public isEmpty(): boolean {
    return this.entries.length === 0;
  }

  public getAll(): readonly WeightedAction[] {
    return this.entries;
  }

  public get totalWeight(): number {
    return this.entries.reduce(
      (sum, entry) => (entry.weight > 0 ? sum + entry.weight : sum),
      0,
    );
  }

  /**
   * Weighted-random pick. An entry of weight 3 wins three times as often as
   * one of weight 1; entries with weight <= 0 never win.
   */
  public pickRandomWeighted(random: RandomSource): WeightedAction | undefined {
    return random.pickWeighted(this.entries, (entry) => entry.weight);
  }

  public clear(): void {
    this.entries.length = 0;
  }
}
