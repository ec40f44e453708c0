/**
 * @fileoverview World contracts consumed by the AI core
 *
 * The host game owns actors, items, terrain and action execution. The AI
 * core only reads through these interfaces and changes the world by running
 * `GameAction`s handed out by the host's `ActionFactory`.
 *
 * @module domain/types/world
 */

import type { InventoryItemKind } from "@/shared/constants/ItemEnums";
import type { TerrainType } from "@/shared/constants/TerrainEnums";
import type { GridDirection, GridPosition } from "@/shared/types/grid";

/**
 * Movement capabilities of an actor. Immutable, supplied at actor creation.
 */
export interface CapabilityProfile {
  readonly canFly: boolean;
  readonly canBurrow: boolean;
  readonly canOpenDoors: boolean;
}

export const DEFAULT_CAPABILITIES: CapabilityProfile = {
  canFly: false,
  canBurrow: false,
  canOpenDoors: false,
};

export interface HealthSnapshot {
  readonly current: number;
  readonly max: number;
}

export interface InventoryItem {
  readonly id: string;
  readonly name: string;
  readonly kind: InventoryItemKind;
  /** Throw or zap range for offensive items */
  readonly range?: number;
  readonly charges?: number;
}

/**
 * Read-only view of a creature.
 */
export interface ActorHandle {
  readonly id: string;
  readonly name: string;
  readonly position: GridPosition;
  readonly faction: string;
  readonly isDead: boolean;
  readonly visionRange: number;
  readonly capabilities: CapabilityProfile;
  readonly health?: HealthSnapshot;
  readonly inventory?: readonly InventoryItem[];
}

/**
 * An item lying on the floor.
 */
export interface GroundItem {
  readonly id: string;
  readonly name: string;
  readonly position: GridPosition;
}

/**
 * Grid of cells that may block line of sight. Out-of-bounds cells block.
 */
export interface OpacityGrid {
  isInBounds(position: GridPosition): boolean;
  blocksSight(position: GridPosition): boolean;
}

export interface MapSnapshot extends OpacityGrid {
  readonly width: number;
  readonly height: number;
  /** Out-of-bounds cells read as walls */
  getTerrain(position: GridPosition): TerrainType;
}

/**
 * Minimal occupant lookup the cost map needs.
 */
export interface OccupantSnapshot {
  getOccupant(position: GridPosition): { readonly id: string } | undefined;
}

export interface WorldQueryService extends OccupantSnapshot {
  readonly map: MapSnapshot;
  /** In bounds and not a wall */
  isWalkable(position: GridPosition): boolean;
  getOccupant(position: GridPosition): ActorHandle | undefined;
  getActor(id: string): ActorHandle | undefined;
  /** Living and dead actors within Chebyshev `radius` of `center` */
  getEntitiesInArea(center: GridPosition, radius: number): readonly ActorHandle[];
  getItem(id: string): GroundItem | undefined;
  getItemsInArea(center: GridPosition, radius: number): readonly GroundItem[];
  isHostile(a: ActorHandle, b: ActorHandle): boolean;
}

export interface ActionResult {
  readonly success: boolean;
  readonly message?: string;
  /** Energy/time units the action consumed; 0 when nothing happened */
  readonly turnCost: number;
}

/**
 * Two-phase action owned by the host. `canExecute` must not mutate anything.
 */
export interface GameAction {
  readonly name: string;
  canExecute(actor: ActorHandle, world: WorldQueryService): boolean;
  execute(actor: ActorHandle, world: WorldQueryService): ActionResult;
}

/**
 * Builds the host's actions for the AI to run.
 */
export interface ActionFactory {
  move(direction: GridDirection): GameAction;
  attack(targetId: string): GameAction;
  rangedAttack(targetId: string): GameAction;
  useItem(itemId: string, targetId?: string): GameAction;
  pickup(itemId: string): GameAction;
  /** A shout for allies. The host resolves its noise, message and cost. */
  callForHelp(): GameAction;
}
