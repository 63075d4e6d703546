import { Item, ItemPage, UpdateItemDto } from '../interfaces';

export interface CreateItemData {
  name: string;
  description: string | null;
}

/**
 * Persistence contract for items.
 */
export interface IItemAdapter {
  create(data: CreateItemData): Promise<Item>;

  findById(id: string): Promise<Item | null>;

  list(skip: number, limit: number): Promise<ItemPage>;

  /**
   * Applies the allow-listed fields present in `changes` and refreshes
   * `updatedAt`.
   *
   * @returns The updated item, or null if it does not exist
   */
  update(id: string, changes: UpdateItemDto): Promise<Item | null>;

  /**
   * @returns true if an item was deleted
   */
  delete(id: string): Promise<boolean>;
}
