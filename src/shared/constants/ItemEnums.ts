/**
 * Item enumerations consumed by the AI behaviour modules.
 *
 * @module shared/constants/ItemEnums
 */

/**
 * How an inventory item can be used in a fight.
 */
export enum InventoryItemKind {
  HEALING = "healing",
  OFFENSIVE = "offensive",
  MISC = "misc",
}
