import { TypeOrmItemAdapter } from '../../src/adapters/typeorm-item.adapter';
import { ItemEntity } from '../../src/entities/item.entity';
import { ITEM_ID, createMockItem } from '../helpers/api-key.helper';
import { createDataSourceMock } from '../helpers/typeorm.mock';

function toEntity(overrides: Partial<ItemEntity> = {}): ItemEntity {
  return Object.assign(new ItemEntity(), createMockItem(), overrides);
}

describe('TypeOrmItemAdapter', () => {
  let mocks: ReturnType<typeof createDataSourceMock>;
  let adapter: TypeOrmItemAdapter;

  beforeEach(() => {
    mocks = createDataSourceMock();
    adapter = new TypeOrmItemAdapter(mocks.dataSource);
  });

  it('should create an item', async () => {
    mocks.repository.save.mockResolvedValue(toEntity({ description: 'Blue' }));

    await expect(adapter.create({ name: 'Test Item', description: 'Blue' })).resolves.toEqual(
      createMockItem({ description: 'Blue' }),
    );
    expect(mocks.repository.create).toHaveBeenCalledWith({ name: 'Test Item', description: 'Blue' });
  });

  it('should return null for a missing item', async () => {
    mocks.repository.findOne.mockResolvedValue(null);

    await expect(adapter.findById(ITEM_ID)).resolves.toBeNull();
    expect(mocks.repository.findOne).toHaveBeenCalledWith({ where: { id: ITEM_ID } });
  });

  it('should page newest first with an independent total', async () => {
    mocks.repository.count.mockResolvedValue(5);
    mocks.repository.find.mockResolvedValue([toEntity(), toEntity()]);

    const page = await adapter.list(0, 2);

    expect(page.total).toBe(5);
    expect(page.items).toHaveLength(2);
    expect(mocks.repository.find).toHaveBeenCalledWith({
      order: { createdAt: 'DESC' },
      skip: 0,
      take: 2,
    });
  });

  describe('update', () => {
    it('should apply only allow-listed fields', async () => {
      const entity = toEntity();
      mocks.repository.findOne.mockResolvedValue(entity);
      mocks.repository.save.mockImplementation(async (saved: ItemEntity) => saved);
      const changes = { name: 'Renamed', id: 'hijacked' };

      const updated = await adapter.update(ITEM_ID, changes);

      expect(mocks.dataSource.transaction).toHaveBeenCalled();
      expect(updated).toEqual(createMockItem({ name: 'Renamed' }));
      expect(entity.id).toBe(ITEM_ID);
    });

    it('should leave the description alone when only the name changes', async () => {
      const entity = toEntity({ name: 'Widget', description: 'A thing' });
      mocks.repository.findOne.mockResolvedValue(entity);
      mocks.repository.save.mockImplementation(async (saved: ItemEntity) => saved);

      const updated = await adapter.update(ITEM_ID, { name: 'Widget2' });

      expect(mocks.repository.save).toHaveBeenCalledWith(
        expect.objectContaining({ name: 'Widget2', description: 'A thing' }),
      );
      expect(updated).toMatchObject({ name: 'Widget2', description: 'A thing' });
    });

    it('should return null when the item does not exist', async () => {
      mocks.repository.findOne.mockResolvedValue(null);

      await expect(adapter.update(ITEM_ID, { name: 'Renamed' })).resolves.toBeNull();
      expect(mocks.repository.save).not.toHaveBeenCalled();
    });
  });

  it('should report whether a delete removed a row', async () => {
    mocks.repository.delete.mockResolvedValueOnce({ affected: 1 }).mockResolvedValueOnce({ affected: 0 });

    await expect(adapter.delete(ITEM_ID)).resolves.toBe(true);
    await expect(adapter.delete(ITEM_ID)).resolves.toBe(false);
  });
});
