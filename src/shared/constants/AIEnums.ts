/**
 * AI type enumerations for the goal planner.
 *
 * Defines goal kinds, action-gathering event names, behaviour module types and
 * the reasons a goal can leave the stack.
 *
 * @module shared/constants/AIEnums
 */

/**
 * Enumeration of goal kinds.
 * Goals represent units of intent that sit on an actor's goal stack.
 */
export enum GoalKind {
  BORED = "bored",
  KILL_TARGET = "kill_target",
  APPROACH = "approach",
  FLEE = "flee",
  FOLLOW_ENTITY = "follow_entity",
  WANDER = "wander",
  MOVE_DIRECTION = "move_direction",
  SEEK_ITEM = "seek_item",
  SEARCH_LAST_KNOWN_POSITION = "search_last_known_position",
  RETURN_TO_SPAWN = "return_to_spawn",
  DEFEND_TARGET = "defend_target",
}

/**
 * Enumeration of action-gathering events.
 * Goals fire these at an actor's behaviour modules to collect candidate actions.
 */
export enum AIEventName {
  ON_GET_MELEE_ACTIONS = "on_get_melee_actions",
  ON_GET_DEFENSIVE_ACTIONS = "on_get_defensive_actions",
  ON_GET_RANGED_ACTIONS = "on_get_ranged_actions",
  ON_GET_ITEM_ACTIONS = "on_get_item_actions",
  ON_I_AM_BORED = "on_i_am_bored",
  /** Fired after a ranged pick executed successfully */
  ON_RANGED_ATTACK_SUCCESS = "on_ranged_attack_success",
}

/**
 * Enumeration of behaviour module types. An actor holds at most one module
 * per type.
 */
export enum BehaviorType {
  MELEE_ATTACK = "melee_attack",
  RANGED_ATTACK = "ranged_attack",
  ITEM_USAGE = "item_usage",
  COWARDICE = "cowardice",
  CALL_FOR_HELP = "call_for_help",
}

/**
 * Why a goal was removed from a stack.
 */
export enum GoalRemovalReason {
  FINISHED = "finished",
  FAILED = "failed",
  /** Its original intent was removed in the same pass */
  CASCADE = "cascade",
}
