import type { SQLiteDatabase } from '@/lib/db/init';
import type { Account, Contact, Entity, EntityKind } from '@/lib/entities/types';
import type {
  DeletedRelationshipFilter,
  NewLogEntry,
  Relationship,
  RelationshipLogEntry,
} from '@/lib/relationships/types';

// Stores are synchronous: every write runs inside a better-sqlite3
// transaction opened by the MutationCoordinator.

export interface IEntityStore {
  insertAccount(account: Account): void;
  insertContact(contact: Contact): void;
  updateAccount(account: Account): void;
  updateContact(contact: Contact): void;
  /** Includes soft-deleted entities */
  getById(id: string): Entity | null;
  getActiveByIds(ids: string[]): Entity[];
  findActiveByName(kind: EntityKind, name: string): Entity | null;
  findActiveByExternalId(kind: EntityKind, externalId: string): Entity | null;
  search(text: string): Entity[];
  /** Active contacts whose accountId names an active account, by id */
  getEmployedContacts(): Contact[];
  detachContacts(accountId: string, actor: string, timestamp: number): number;
  countActive(kind: EntityKind): number;
}

export interface IRelationshipStore {
  insert(rel: Relationship): void;
  /** Returns false when the stored version no longer matches `expectedVersion` */
  update(rel: Relationship, expectedVersion: number): boolean;
  getById(id: string): Relationship | null;
  /** Active relationship between the two entities, in either direction */
  findActiveBetween(entityA: string, entityB: string): Relationship | null;
  /** Most recently deleted relationship from source to target */
  findDeletedBetween(sourceId: string, targetId: string): Relationship | null;
  getActiveByEntity(entityId: string): Relationship[];
  getAll(includeDeleted: boolean): Relationship[];
  getAmong(entityIds: string[], includeDeleted: boolean): Relationship[];
  queryDeleted(filter: DeletedRelationshipFilter): Relationship[];
  count(deleted: boolean): number;
}

export interface IAuditLogStore {
  append(entry: NewLogEntry): RelationshipLogEntry;
  getPage(relationshipId: string, afterSequence: number, limit: number): RelationshipLogEntry[];
  getLatestAt(relationshipId: string, timestamp: number): RelationshipLogEntry | null;
  getLatestPerRelationshipAt(timestamp: number): RelationshipLogEntry[];
  countFor(relationshipId: string): number;
}

export interface StorageService {
  db: SQLiteDatabase;
  entities: IEntityStore;
  relationships: IRelationshipStore;
  auditLog: IAuditLogStore;
}
