import { randomUUID } from 'crypto';
import { CreateApiKeyData, IApiKeyAdapter, LockedKeyCheck } from '../../src/adapters/base.adapter';
import { CreateItemData, IItemAdapter } from '../../src/adapters/item.adapter';
import { ApiKeyConflictException } from '../../src/exceptions';
import { ApiKey, ApiKeyPage, Item, ItemPage, UpdateItemDto } from '../../src/interfaces';
import { pickUpdatableFields } from '../../src/utils/validation.util';

type Clock = () => Date;

function newestFirst<T extends { createdAt: Date }>(records: T[]): T[] {
  // Reverse first so records created in the same millisecond stay newest-first.
  return [...records].reverse().sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}

/**
 * In-process key store. Row locks are modelled with a set of held ids: a
 * validation that finds its row held skips it, like `FOR UPDATE SKIP LOCKED`.
 */
export class InMemoryApiKeyAdapter implements IApiKeyAdapter {
  private readonly keys = new Map<string, ApiKey>();
  private readonly locks = new Set<string>();

  constructor(private readonly now: Clock = () => new Date()) {}

  async create(data: CreateApiKeyData): Promise<ApiKey> {
    for (const existing of this.keys.values()) {
      if (existing.clientId === data.clientId && existing.name === data.name) {
        throw new ApiKeyConflictException();
      }
      if (existing.keyHash === data.keyHash || existing.keyPrefix === data.keyPrefix) {
        throw new ApiKeyConflictException('API key collides with an existing key');
      }
    }

    const apiKey: ApiKey = {
      id: randomUUID(),
      name: data.name,
      clientId: data.clientId,
      keyHash: data.keyHash,
      keyPrefix: data.keyPrefix,
      isActive: true,
      expiresAt: data.expiresAt,
      createdAt: this.now(),
      lastUsedAt: null,
      revokedAt: null,
    };
    this.keys.set(apiKey.id, apiKey);
    return { ...apiKey };
  }

  async findById(id: string): Promise<ApiKey | null> {
    const apiKey = this.keys.get(id);
    return apiKey ? { ...apiKey } : null;
  }

  async findByPrefix(prefix: string): Promise<ApiKey | null> {
    const matches = [...this.keys.values()].filter((key) => key.keyPrefix.startsWith(prefix));
    return matches.length === 1 ? { ...matches[0] } : null;
  }

  async list(skip: number, limit: number): Promise<ApiKeyPage> {
    const keys = newestFirst([...this.keys.values()])
      .slice(skip, skip + limit)
      .map((key) => ({ ...key }));
    return { keys, total: this.keys.size };
  }

  async validateAndTouch(
    keyPrefix: string,
    check: LockedKeyCheck,
    usedAt: Date,
  ): Promise<ApiKey | null> {
    const row = [...this.keys.values()].find(
      (key) => key.keyPrefix === keyPrefix && key.isActive && !this.locks.has(key.id),
    );
    if (!row) {
      return null;
    }

    this.locks.add(row.id);
    try {
      if (!(await check({ ...row }))) {
        return null;
      }
      row.lastUsedAt = usedAt;
      return { ...row };
    } finally {
      this.locks.delete(row.id);
    }
  }

  async revoke(id: string, revokedAt: Date): Promise<boolean> {
    const row = this.keys.get(id);
    if (!row) {
      return false;
    }
    row.isActive = false;
    row.revokedAt = revokedAt;
    return true;
  }

  async count(): Promise<number> {
    return this.keys.size;
  }

  /** Simulates another transaction holding the row lock. */
  holdLock(id: string): void {
    this.locks.add(id);
  }

  releaseLock(id: string): void {
    this.locks.delete(id);
  }
}

export class InMemoryItemAdapter implements IItemAdapter {
  private readonly items = new Map<string, Item>();

  constructor(private readonly now: Clock = () => new Date()) {}

  async create(data: CreateItemData): Promise<Item> {
    const timestamp = this.now();
    const item: Item = {
      id: randomUUID(),
      name: data.name,
      description: data.description,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.items.set(item.id, item);
    return { ...item };
  }

  async findById(id: string): Promise<Item | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  async list(skip: number, limit: number): Promise<ItemPage> {
    const items = newestFirst([...this.items.values()])
      .slice(skip, skip + limit)
      .map((item) => ({ ...item }));
    return { items, total: this.items.size };
  }

  async update(id: string, changes: UpdateItemDto): Promise<Item | null> {
    const item = this.items.get(id);
    if (!item) {
      return null;
    }
    Object.assign(item, pickUpdatableFields(changes), { updatedAt: this.now() });
    return { ...item };
  }

  async delete(id: string): Promise<boolean> {
    return this.items.delete(id);
  }
}

/**
 * Clock that returns `start` and moves forward by `stepMs` on every call.
 */
export function steppingClock(start: string, stepMs = 1000): Clock {
  let current = new Date(start).getTime();
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}
