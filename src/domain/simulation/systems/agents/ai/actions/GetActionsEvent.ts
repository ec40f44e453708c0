/**
 * @fileoverview Action-gathering payload
 *
 * Created by a goal, passed through every subscribed behaviour module of the
 * acting actor, then consumed by the goal and dropped.
 *
 * @module domain/simulation/systems/agents/ai/actions/GetActionsEvent
 */

import type { AIEventName } from "@/shared/constants/AIEnums";
import type { ActorHandle } from "@/domain/types/world";
import type { AIContext } from "../AIContext";
import type { Goal } from "../goals/Goal";
import { WeightedActionList } from "./WeightedActionList";

export class GetActionsEvent {
  public readonly actions = new WeightedActionList();
  /**
   * Set by a module that dealt with the situation itself (for example by
   * pushing a goal). Stops the remaining modules and tells the firing goal
   * to do nothing more this step.
   */
  public handled = false;

  constructor(
    public readonly name: AIEventName,
    public readonly context: AIContext,
    /** Goal that fired the event; intent for goals a module pushes */
    public readonly source: Goal,
    public readonly target?: ActorHandle,
  ) {}
}
