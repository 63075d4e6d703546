import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ApiKeyModule } from '../../src/api-key.module';
import { ApiKeyService } from '../../src/services/api-key.service';
import { ItemService } from '../../src/services/item.service';
import { ApiKeyConflictException } from '../../src/exceptions';
import { InMemoryApiKeyAdapter, InMemoryItemAdapter } from '../helpers/in-memory.adapter';

describe('API Key Flow Integration Tests', () => {
  let module: TestingModule;
  let apiKeyService: ApiKeyService;
  let itemService: ItemService;
  let keyAdapter: InMemoryApiKeyAdapter;

  beforeEach(async () => {
    keyAdapter = new InMemoryApiKeyAdapter();

    module = await Test.createTestingModule({
      imports: [
        ApiKeyModule.register({
          adapter: 'custom',
          customAdapter: keyAdapter,
          customItemAdapter: new InMemoryItemAdapter(),
          bcryptRounds: 10,
        }),
      ],
    }).compile();

    apiKeyService = module.get(ApiKeyService);
    itemService = module.get(ItemService);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('Complete API Key Lifecycle', () => {
    it('should validate an issued key and return the same record', async () => {
      const issued = await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      const validated = await apiKeyService.validate(issued.key);

      expect(validated?.id).toBe(issued.id);
      expect(validated?.lastUsedAt).toBeInstanceOf(Date);
      expect((await apiKeyService.findById(issued.id)).lastUsedAt).toEqual(validated?.lastUsedAt);
    });

    it('should reject a key after it is revoked', async () => {
      const issued = await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      await expect(apiKeyService.revoke(issued.id)).resolves.toBe(true);

      await expect(apiKeyService.validate(issued.key)).resolves.toBeNull();
      const stored = await apiKeyService.findById(issued.id);
      expect(stored.isActive).toBe(false);
      expect(stored.revokedAt).toBeInstanceOf(Date);
    });

    it('should return true when revoking twice', async () => {
      const issued = await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      await expect(apiKeyService.revoke(issued.id)).resolves.toBe(true);
      await expect(apiKeyService.revoke(issued.id)).resolves.toBe(true);
    });

    it('should reject an unknown key with a valid shape', async () => {
      await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      await expect(apiKeyService.validate(`sk_${'Z'.repeat(43)}`)).resolves.toBeNull();
    });

    it('should refuse a second key with the same name for a client', async () => {
      await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      await expect(apiKeyService.create({ name: 'Test Key', clientId: 'acme' })).rejects.toThrow(
        ApiKeyConflictException,
      );
      await expect(
        apiKeyService.create({ name: 'Test Key', clientId: 'other-client' }),
      ).resolves.toBeDefined();
    });
  });

  describe('Concurrent validation', () => {
    it('should let sequential callers both succeed, later timestamp winning', async () => {
      const issued = await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      const first = await apiKeyService.validate(issued.key);
      const second = await apiKeyService.validate(issued.key);

      expect(first).not.toBeNull();
      expect(second).not.toBeNull();
      const stored = await apiKeyService.findById(issued.id);
      expect(stored.lastUsedAt).toEqual(second?.lastUsedAt);
      expect(stored.lastUsedAt?.getTime()).toBeGreaterThanOrEqual(first?.lastUsedAt?.getTime() ?? 0);
    });

    it('should fail closed for a caller that finds the row locked', async () => {
      const issued = await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      const [first, second] = await Promise.all([
        apiKeyService.validate(issued.key),
        apiKeyService.validate(issued.key),
      ]);

      expect(first?.id).toBe(issued.id);
      expect(second).toBeNull();
    });

    it('should accept again once the lock is released', async () => {
      const issued = await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      keyAdapter.holdLock(issued.id);
      await expect(apiKeyService.validate(issued.key)).resolves.toBeNull();

      keyAdapter.releaseLock(issued.id);
      await expect(apiKeyService.validate(issued.key)).resolves.not.toBeNull();
    });
  });

  describe('Administrative lookup', () => {
    it('should find a key by a prefix of at least 4 characters', async () => {
      const issued = await apiKeyService.create({ name: 'Test Key', clientId: 'acme' });

      await expect(apiKeyService.findByPrefix(issued.keyPrefix)).resolves.toMatchObject({
        id: issued.id,
      });
      await expect(apiKeyService.findByPrefix(issued.keyPrefix.substring(0, 3))).resolves.toBeNull();
    });

    it('should list keys with a total independent of the page', async () => {
      for (const name of ['one', 'two', 'three']) {
        await apiKeyService.create({ name, clientId: 'acme' });
      }

      const page = await apiKeyService.list(0, 2);

      expect(page.keys).toHaveLength(2);
      expect(page.total).toBe(3);
    });
  });

  describe('Items', () => {
    it('should page through five items two at a time', async () => {
      for (let i = 1; i <= 5; i++) {
        await itemService.create({ name: `Item ${i}` });
      }

      const page = await itemService.list(0, 2);

      expect(page.items).toHaveLength(2);
      expect(page.total).toBe(5);
    });
  });

  describe('Module registration', () => {
    it('should reject invalid configuration', () => {
      expect(() => ApiKeyModule.register({ adapter: 'custom', bcryptRounds: 20 })).toThrow(
        BadRequestException,
      );
    });

    it('should describe the problem in the message', () => {
      expect(() => ApiKeyModule.register({})).toThrow(
        'Invalid module configuration: A TypeORM DataSource must be provided when using the TypeORM adapter',
      );
    });

    it('should refuse a minimum length that issued keys could never meet', () => {
      expect(() =>
        ApiKeyModule.register({
          adapter: 'custom',
          customAdapter: new InMemoryApiKeyAdapter(),
          customItemAdapter: new InMemoryItemAdapter(),
          apiKeyMinLength: 64,
        }),
      ).toThrow(
        'Invalid module configuration: apiKeyMinLength must be an integer between 12 and 46, the length of issued keys',
      );
    });

    it('should validate keys issued at the largest allowed minimum length with a custom tag', async () => {
      const tagged = await Test.createTestingModule({
        imports: [
          ApiKeyModule.register({
            adapter: 'custom',
            customAdapter: new InMemoryApiKeyAdapter(),
            customItemAdapter: new InMemoryItemAdapter(),
            secretTag: 'live',
            apiKeyMinLength: 47,
            bcryptRounds: 10,
          }),
        ],
      }).compile();
      const service = tagged.get(ApiKeyService);

      const first = await service.create({ name: 'First', clientId: 'acme' });
      const second = await service.create({ name: 'Second', clientId: 'acme' });

      expect(first.key).toHaveLength(47);
      expect(first.keyPrefix).not.toBe(second.keyPrefix);
      await expect(service.validate(first.key)).resolves.toMatchObject({ id: first.id });
      await tagged.close();
    });
  });
});
