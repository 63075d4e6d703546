import { DataSource } from 'typeorm';
import { Item, ItemPage, UpdateItemDto } from '../interfaces';
import { ItemEntity } from '../entities/item.entity';
import { pickUpdatableFields } from '../utils/validation.util';
import { IItemAdapter, CreateItemData } from './item.adapter';

/**
 * TypeORM (PostgreSQL) storage for items.
 */
export class TypeOrmItemAdapter implements IItemAdapter {
  constructor(private readonly dataSource: DataSource) {}

  async create(data: CreateItemData): Promise<Item> {
    const repository = this.dataSource.getRepository(ItemEntity);
    const saved = await repository.save(
      repository.create({ name: data.name, description: data.description }),
    );
    return this.mapToItem(saved);
  }

  async findById(id: string): Promise<Item | null> {
    const entity = await this.dataSource.getRepository(ItemEntity).findOne({ where: { id } });
    return entity ? this.mapToItem(entity) : null;
  }

  async list(skip: number, limit: number): Promise<ItemPage> {
    const repository = this.dataSource.getRepository(ItemEntity);
    const total = await repository.count();
    const entities = await repository.find({
      order: { createdAt: 'DESC' },
      skip,
      take: limit,
    });
    return { items: entities.map((entity) => this.mapToItem(entity)), total };
  }

  async update(id: string, changes: UpdateItemDto): Promise<Item | null> {
    return this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(ItemEntity);
      const entity = await repository.findOne({ where: { id } });
      if (!entity) {
        return null;
      }

      Object.assign(entity, pickUpdatableFields(changes));

      // save() bumps the @UpdateDateColumn.
      const saved = await repository.save(entity);
      return this.mapToItem(saved);
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.dataSource.getRepository(ItemEntity).delete({ id });
    return (result.affected ?? 0) > 0;
  }

  private mapToItem(entity: ItemEntity): Item {
    return {
      id: entity.id,
      name: entity.name,
      description: entity.description ?? null,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
