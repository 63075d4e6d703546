export * from './base.adapter';
export * from './item.adapter';
export * from './typeorm.adapter';
export * from './typeorm-item.adapter';
