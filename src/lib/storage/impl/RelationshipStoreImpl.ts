/**
 * RelationshipStoreImpl - SQLite persistence for Relationship rows.
 *
 * Rows are never removed: deletion is the `deleted` flag, written through
 * `update` like any other change.
 */

import type { SQLiteDatabase } from '@/lib/db/init';
import type { RelationshipRow } from '@/lib/db/types';
import { relationshipRecordSchema } from '@/lib/relationships/schemas';
import type { DeletedRelationshipFilter, Relationship } from '@/lib/relationships/types';
import type { IRelationshipStore } from '../interfaces';

export class RelationshipStoreImpl implements IRelationshipStore {
  constructor(private db: SQLiteDatabase) {}

  insert(rel: Relationship): void {
    this.db
      .prepare<RelationshipRow>(
        `INSERT INTO relationships (
           id, source_id, source_kind, target_id, target_kind, term, category, directed,
           score, version, created_at, updated_at, deleted, deleted_at, last_modified_by
         ) VALUES (
           @id, @source_id, @source_kind, @target_id, @target_kind, @term, @category, @directed,
           @score, @version, @created_at, @updated_at, @deleted, @deleted_at, @last_modified_by
         )`
      )
      .run(this.relationshipToRow(rel));
  }

  update(rel: Relationship, expectedVersion: number): boolean {
    const result = this.db
      .prepare<RelationshipRow & { expected_version: number }>(
        `UPDATE relationships SET
           term = @term, category = @category, directed = @directed, score = @score,
           version = @version, updated_at = @updated_at, deleted = @deleted,
           deleted_at = @deleted_at, last_modified_by = @last_modified_by
         WHERE id = @id AND version = @expected_version`
      )
      .run({ ...this.relationshipToRow(rel), expected_version: expectedVersion });
    return result.changes > 0;
  }

  getById(id: string): Relationship | null {
    const row = this.db
      .prepare<[string], RelationshipRow>('SELECT * FROM relationships WHERE id = ?')
      .get(id);
    return row ? this.rowToRelationship(row) : null;
  }

  findActiveBetween(entityA: string, entityB: string): Relationship | null {
    const row = this.db
      .prepare<[string, string, string, string], RelationshipRow>(
        `SELECT * FROM relationships
         WHERE deleted = 0
           AND ((source_id = ? AND target_id = ?) OR (source_id = ? AND target_id = ?))
         ORDER BY id LIMIT 1`
      )
      .get(entityA, entityB, entityB, entityA);
    return row ? this.rowToRelationship(row) : null;
  }

  findDeletedBetween(sourceId: string, targetId: string): Relationship | null {
    const row = this.db
      .prepare<[string, string], RelationshipRow>(
        `SELECT * FROM relationships
         WHERE deleted = 1 AND source_id = ? AND target_id = ?
         ORDER BY deleted_at DESC, id DESC LIMIT 1`
      )
      .get(sourceId, targetId);
    return row ? this.rowToRelationship(row) : null;
  }

  getActiveByEntity(entityId: string): Relationship[] {
    return this.db
      .prepare<[string, string], RelationshipRow>(
        `SELECT * FROM relationships
         WHERE deleted = 0 AND (source_id = ? OR target_id = ?)
         ORDER BY id`
      )
      .all(entityId, entityId)
      .map((row) => this.rowToRelationship(row));
  }

  getAll(includeDeleted: boolean): Relationship[] {
    const sql = includeDeleted
      ? 'SELECT * FROM relationships ORDER BY id'
      : 'SELECT * FROM relationships WHERE deleted = 0 ORDER BY id';
    return this.db
      .prepare<[], RelationshipRow>(sql)
      .all()
      .map((row) => this.rowToRelationship(row));
  }

  getAmong(entityIds: string[], includeDeleted: boolean): Relationship[] {
    if (entityIds.length === 0) return [];

    let sql = `SELECT * FROM relationships
      WHERE source_id IN (SELECT value FROM json_each(@ids))
        AND target_id IN (SELECT value FROM json_each(@ids))`;
    if (!includeDeleted) {
      sql += ' AND deleted = 0';
    }
    sql += ' ORDER BY id';

    return this.db
      .prepare<{ ids: string }, RelationshipRow>(sql)
      .all({ ids: JSON.stringify(entityIds) })
      .map((row) => this.rowToRelationship(row));
  }

  queryDeleted(filter: DeletedRelationshipFilter): Relationship[] {
    let sql = 'SELECT * FROM relationships WHERE deleted = 1';
    const params: Array<string | number> = [];

    if (filter.entityId) {
      sql += ' AND (source_id = ? OR target_id = ?)';
      params.push(filter.entityId, filter.entityId);
    }
    if (filter.term) {
      sql += ' AND term = ?';
      params.push(filter.term);
    }
    if (filter.deletedAfter !== undefined) {
      sql += ' AND deleted_at >= ?';
      params.push(filter.deletedAfter);
    }
    if (filter.deletedBefore !== undefined) {
      sql += ' AND deleted_at <= ?';
      params.push(filter.deletedBefore);
    }

    sql += ' ORDER BY deleted_at, id';

    return this.db
      .prepare<Array<string | number>, RelationshipRow>(sql)
      .all(...params)
      .map((row) => this.rowToRelationship(row));
  }

  count(deleted: boolean): number {
    const row = this.db
      .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM relationships WHERE deleted = ?')
      .get(deleted ? 1 : 0);
    return row?.count ?? 0;
  }

  private relationshipToRow(rel: Relationship): RelationshipRow {
    return {
      id: rel.id,
      source_id: rel.sourceId,
      source_kind: rel.sourceKind,
      target_id: rel.targetId,
      target_kind: rel.targetKind,
      term: rel.term,
      category: rel.category,
      directed: rel.directed ? 1 : 0,
      score: rel.score,
      version: rel.version,
      created_at: rel.createdAt,
      updated_at: rel.updatedAt,
      deleted: rel.deleted ? 1 : 0,
      deleted_at: rel.deletedAt,
      last_modified_by: rel.lastModifiedBy,
    };
  }

  private rowToRelationship(row: RelationshipRow): Relationship {
    return relationshipRecordSchema.parse({
      id: row.id,
      sourceId: row.source_id,
      sourceKind: row.source_kind,
      targetId: row.target_id,
      targetKind: row.target_kind,
      term: row.term,
      category: row.category,
      directed: row.directed === 1,
      score: row.score,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      deleted: row.deleted === 1,
      deletedAt: row.deleted_at,
      lastModifiedBy: row.last_modified_by,
    });
  }
}
