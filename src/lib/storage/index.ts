export * from './interfaces';

export { EntityStoreImpl } from './impl/EntityStoreImpl';
export { RelationshipStoreImpl } from './impl/RelationshipStoreImpl';
export { AuditLogStoreImpl } from './impl/AuditLogStoreImpl';

import type { SQLiteDatabase } from '@/lib/db/init';
import type { StorageService } from './interfaces';
import { EntityStoreImpl } from './impl/EntityStoreImpl';
import { RelationshipStoreImpl } from './impl/RelationshipStoreImpl';
import { AuditLogStoreImpl } from './impl/AuditLogStoreImpl';

export function createStorageService(db: SQLiteDatabase): StorageService {
  return {
    db,
    entities: new EntityStoreImpl(db),
    relationships: new RelationshipStoreImpl(db),
    auditLog: new AuditLogStoreImpl(db),
  };
}
