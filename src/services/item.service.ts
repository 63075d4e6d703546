import { Injectable } from '@nestjs/common';
import { IItemAdapter } from '../adapters/item.adapter';
import { Item, ItemPage } from '../interfaces';
import { ItemNotFoundException, StoreUnavailableException } from '../exceptions';
import { AppLogger } from '../utils/logger.util';
import {
  DEFAULT_PAGE_LIMIT,
  isUuid,
  validateCreateItem,
  validateUpdateItem,
} from '../utils/validation.util';

function byActor(actor?: string): string {
  return actor ? ` by key ${actor}` : '';
}

/**
 * CRUD over items. Inputs arrive unvalidated (request bodies) and are
 * normalized here before they reach the adapter.
 */
@Injectable()
export class ItemService {
  constructor(private readonly adapter: IItemAdapter) {}

  /**
   * @param actor - Key prefix of the caller, for the log line
   */
  async create(input: unknown, actor?: string): Promise<Item> {
    const dto = validateCreateItem(input);
    const item = await this.guardStore('create', () =>
      this.adapter.create({ name: dto.name, description: dto.description ?? null }),
    );
    AppLogger.log(`Item created: ${item.id}${byActor(actor)}`, 'ItemService');
    return item;
  }

  /**
   * @throws {ItemNotFoundException} If no item has this id
   */
  async findById(id: string): Promise<Item> {
    const item = isUuid(id) ? await this.guardStore('find', () => this.adapter.findById(id)) : null;
    if (!item) {
      throw new ItemNotFoundException();
    }
    return item;
  }

  async list(skip = 0, limit = DEFAULT_PAGE_LIMIT): Promise<ItemPage> {
    return this.guardStore('list', () => this.adapter.list(skip, limit));
  }

  /**
   * Applies the `name` and `description` present in `input`; any other field
   * is ignored.
   *
   * @throws {ItemNotFoundException} If no item has this id
   */
  async update(id: string, input: unknown, actor?: string): Promise<Item> {
    const changes = validateUpdateItem(input);
    if (!isUuid(id)) {
      throw new ItemNotFoundException();
    }
    const item = await this.guardStore('update', () => this.adapter.update(id, changes));
    if (!item) {
      throw new ItemNotFoundException();
    }
    AppLogger.debug(`Item updated: ${id}${byActor(actor)}`, 'ItemService');
    return item;
  }

  /**
   * @throws {ItemNotFoundException} If no item has this id
   */
  async delete(id: string, actor?: string): Promise<void> {
    const deleted = isUuid(id) ? await this.guardStore('delete', () => this.adapter.delete(id)) : false;
    if (!deleted) {
      throw new ItemNotFoundException();
    }
    AppLogger.log(`Item deleted: ${id}${byActor(actor)}`, 'ItemService');
  }

  private async guardStore<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      AppLogger.error(`Item ${operation} failed`, error, 'ItemService');
      throw new StoreUnavailableException();
    }
  }
}
