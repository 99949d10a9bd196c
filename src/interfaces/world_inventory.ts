/**
 * WorldInventory: the host's view of what the player owns in the game world.
 *
 * Trade Protocol only calls remove()/materialize() after the server has
 * acknowledged the trade, so the world never runs ahead of the server ledger.
 */

export interface InventoryStack {
  itemKind: string;
  quantity: number;
  /** Local market value per unit, whole currency units. */
  unitValue: number;
  quality: string;
}

export interface WorldInventory {
  /** Player-owned stacks that may be offered for sale. One entry per physical stack. */
  tradableStacks(): InventoryStack[];

  /** Total player-owned quantity of a kind. */
  countOf(itemKind: string): number;

  /** Returns the quantity actually removed, which may fall short. */
  remove(itemKind: string, quantity: number): number;

  /** Create `quantity` units of a kind and place them in the world. */
  materialize(itemKind: string, quantity: number): void;
}
