/**
 * @fileoverview BoredGoal - root of every goal stack
 *
 * Never finishes. Each time it is on top it decides what the actor should
 * want next, in order:
 * 1. Idle behaviour modules (`ON_I_AM_BORED`)
 * 2. Guard the protection target while it or the actor sees an enemy,
 *    otherwise catch up with it
 * 3. Fight the nearest visible enemy
 * 4. Search where an enemy was last seen
 * 5. Go after a visible item (item collectors only, on a roll)
 * 6. Walk back to spawn when past the leash radius
 * 7. Wander (on a roll), else wait
 *
 * @module domain/simulation/systems/agents/ai/goals/BoredGoal
 */

import { AIEventName, GoalKind } from "@/shared/constants/AIEnums";
import { chebyshevDistance } from "@/shared/utils/mathUtils";
import type { AIContext } from "../AIContext";
import { DefendTargetGoal } from "./DefendTargetGoal";
import { FollowEntityGoal } from "./FollowEntityGoal";
import { Goal } from "./Goal";
import { KillTargetGoal } from "./KillTargetGoal";
import { ReturnToSpawnGoal } from "./ReturnToSpawnGoal";
import { SearchLastKnownPositionGoal } from "./SearchLastKnownPositionGoal";
import { SeekItemGoal } from "./SeekItemGoal";
import { WanderGoal } from "./WanderGoal";

export class BoredGoal extends Goal {
  public readonly kind = GoalKind.BORED;

  public takeAction(context: AIContext): void {
    const idle = context.gather(AIEventName.ON_I_AM_BORED, this);
    if (idle.handled) return;
    if (context.executeWeightedPick(idle) !== undefined && context.actionTaken) {
      return;
    }

    const { actor, state, config, random } = context;

    const ward = state.protectionTargetId
      ? context.resolveLiving(state.protectionTargetId)
      : undefined;
    if (ward) {
      if (
        context.visibleEnemies.length > 0 ||
        context.enemiesVisibleTo(ward).length > 0
      ) {
        this.pushSubGoal(context, new DefendTargetGoal(ward.id));
        return;
      }
      if (context.distanceTo(ward.position) > state.followDistance) {
        this.pushSubGoal(
          context,
          new FollowEntityGoal(ward.id, state.followDistance),
        );
        return;
      }
    }

    const enemy = context.closestEnemy();
    if (enemy) {
      this.pushSubGoal(context, new KillTargetGoal(enemy.id));
      return;
    }

    if (state.lastKnownEnemyPosition && state.searchTurnsRemaining > 0) {
      this.pushSubGoal(context, new SearchLastKnownPositionGoal());
      return;
    }

    const nearestItem = context.visibleItems[0];
    if (
      state.collectsItems &&
      nearestItem &&
      random.chance(config.itemPickupChance)
    ) {
      this.pushSubGoal(context, new SeekItemGoal(nearestItem.item.id));
      return;
    }

    if (
      state.spawnPosition &&
      chebyshevDistance(actor.position, state.spawnPosition) > config.leashRadius
    ) {
      this.pushSubGoal(context, new ReturnToSpawnGoal());
      return;
    }

    if (random.chance(config.wanderChance)) {
      this.pushSubGoal(context, new WanderGoal());
    }
  }
}
