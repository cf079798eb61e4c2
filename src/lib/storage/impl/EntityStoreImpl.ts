import type { SQLiteDatabase } from '@/lib/db/init';
import type { AccountRow, ContactRow } from '@/lib/db/types';
import type { Account, Contact, Entity, EntityKind } from '@/lib/entities/types';
import { compareById, compareIds } from '@/lib/utils/compare';
import type { IEntityStore } from '../interfaces';

const TABLES: Record<EntityKind, string> = {
  account: 'accounts',
  contact: 'contacts',
};

/** Escapes LIKE wildcards so user text matches literally */
function likePattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

export class EntityStoreImpl implements IEntityStore {
  constructor(private db: SQLiteDatabase) {}

  insertAccount(account: Account): void {
    this.db
      .prepare<AccountRow>(
        `INSERT INTO accounts (id, name, ticker, external_id, created_at, updated_at, last_modified_by, deleted_at)
         VALUES (@id, @name, @ticker, @external_id, @created_at, @updated_at, @last_modified_by, @deleted_at)`
      )
      .run(this.accountToRow(account));
  }

  insertContact(contact: Contact): void {
    this.db
      .prepare<ContactRow>(
        `INSERT INTO contacts (id, name, job_title, account_id, external_id, created_at, updated_at, last_modified_by, deleted_at)
         VALUES (@id, @name, @job_title, @account_id, @external_id, @created_at, @updated_at, @last_modified_by, @deleted_at)`
      )
      .run(this.contactToRow(contact));
  }

  updateAccount(account: Account): void {
    this.db
      .prepare<AccountRow>(
        `UPDATE accounts SET name = @name, ticker = @ticker, external_id = @external_id,
           updated_at = @updated_at, last_modified_by = @last_modified_by, deleted_at = @deleted_at
         WHERE id = @id`
      )
      .run(this.accountToRow(account));
  }

  updateContact(contact: Contact): void {
    this.db
      .prepare<ContactRow>(
        `UPDATE contacts SET name = @name, job_title = @job_title, account_id = @account_id,
           external_id = @external_id, updated_at = @updated_at, last_modified_by = @last_modified_by,
           deleted_at = @deleted_at
         WHERE id = @id`
      )
      .run(this.contactToRow(contact));
  }

  getById(id: string): Entity | null {
    const account = this.db.prepare<[string], AccountRow>('SELECT * FROM accounts WHERE id = ?').get(id);
    if (account) return this.rowToAccount(account);

    const contact = this.db.prepare<[string], ContactRow>('SELECT * FROM contacts WHERE id = ?').get(id);
    return contact ? this.rowToContact(contact) : null;
  }

  getActiveByIds(ids: string[]): Entity[] {
    if (ids.length === 0) return [];
    const json = JSON.stringify(ids);

    const accounts = this.db
      .prepare<[string], AccountRow>(
        'SELECT * FROM accounts WHERE deleted_at IS NULL AND id IN (SELECT value FROM json_each(?))'
      )
      .all(json)
      .map((row) => this.rowToAccount(row));
    const contacts = this.db
      .prepare<[string], ContactRow>(
        'SELECT * FROM contacts WHERE deleted_at IS NULL AND id IN (SELECT value FROM json_each(?))'
      )
      .all(json)
      .map((row) => this.rowToContact(row));

    return [...accounts, ...contacts].sort(compareById);
  }

  findActiveByName(kind: EntityKind, name: string): Entity | null {
    if (kind === 'account') {
      const row = this.db
        .prepare<[string], AccountRow>(
          'SELECT * FROM accounts WHERE deleted_at IS NULL AND name = ? COLLATE NOCASE ORDER BY id LIMIT 1'
        )
        .get(name);
      return row ? this.rowToAccount(row) : null;
    }
    const row = this.db
      .prepare<[string], ContactRow>(
        'SELECT * FROM contacts WHERE deleted_at IS NULL AND name = ? COLLATE NOCASE ORDER BY id LIMIT 1'
      )
      .get(name);
    return row ? this.rowToContact(row) : null;
  }

  findActiveByExternalId(kind: EntityKind, externalId: string): Entity | null {
    if (kind === 'account') {
      const row = this.db
        .prepare<[string], AccountRow>(
          'SELECT * FROM accounts WHERE deleted_at IS NULL AND external_id = ? ORDER BY id LIMIT 1'
        )
        .get(externalId);
      return row ? this.rowToAccount(row) : null;
    }
    const row = this.db
      .prepare<[string], ContactRow>(
        'SELECT * FROM contacts WHERE deleted_at IS NULL AND external_id = ? ORDER BY id LIMIT 1'
      )
      .get(externalId);
    return row ? this.rowToContact(row) : null;
  }

  /**
   * Case-insensitive substring match on account name/ticker and contact
   * name/job title. SQLite LIKE folds ASCII case only.
   */
  search(text: string): Entity[] {
    const pattern = likePattern(text);

    const accounts = this.db
      .prepare<[string, string], AccountRow>(
        `SELECT * FROM accounts
         WHERE deleted_at IS NULL
           AND (name LIKE ? ESCAPE '\\' OR ticker LIKE ? ESCAPE '\\')`
      )
      .all(pattern, pattern)
      .map((row) => this.rowToAccount(row));
    const contacts = this.db
      .prepare<[string, string], ContactRow>(
        `SELECT * FROM contacts
         WHERE deleted_at IS NULL
           AND (name LIKE ? ESCAPE '\\' OR job_title LIKE ? ESCAPE '\\')`
      )
      .all(pattern, pattern)
      .map((row) => this.rowToContact(row));

    return [...accounts, ...contacts].sort((a, b) => compareIds(a.name, b.name) || compareById(a, b));
  }

  getEmployedContacts(): Contact[] {
    return this.db
      .prepare<[], ContactRow>(
        `SELECT c.* FROM contacts c
         JOIN accounts a ON a.id = c.account_id
         WHERE c.deleted_at IS NULL AND a.deleted_at IS NULL
         ORDER BY c.id`
      )
      .all()
      .map((row) => this.rowToContact(row));
  }

  detachContacts(accountId: string, actor: string, timestamp: number): number {
    const result = this.db
      .prepare<[number, string, string]>(
        `UPDATE contacts SET account_id = NULL, updated_at = ?, last_modified_by = ?
         WHERE account_id = ? AND deleted_at IS NULL`
      )
      .run(timestamp, actor, accountId);
    return result.changes;
  }

  countActive(kind: EntityKind): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${TABLES[kind]} WHERE deleted_at IS NULL`)
      .get();
    return row?.count ?? 0;
  }

  private accountToRow(account: Account): AccountRow {
    return {
      id: account.id,
      name: account.name,
      ticker: account.ticker,
      external_id: account.externalId,
      created_at: account.createdAt,
      updated_at: account.updatedAt,
      last_modified_by: account.lastModifiedBy,
      deleted_at: account.deletedAt,
    };
  }

  private contactToRow(contact: Contact): ContactRow {
    return {
      id: contact.id,
      name: contact.name,
      job_title: contact.jobTitle,
      account_id: contact.accountId,
      external_id: contact.externalId,
      created_at: contact.createdAt,
      updated_at: contact.updatedAt,
      last_modified_by: contact.lastModifiedBy,
      deleted_at: contact.deletedAt,
    };
  }

  private rowToAccount(row: AccountRow): Account {
    return {
      kind: 'account',
      id: row.id,
      name: row.name,
      ticker: row.ticker,
      externalId: row.external_id,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      lastModifiedBy: row.last_modified_by,
      deletedAt: row.deleted_at,
    };
  }

  private rowToContact(row: ContactRow): Contact {
    return {
      kind: 'contact',
      id: row.id,
      name: row.name,
      jobTitle: row.job_title,
      accountId: row.account_id,
      externalId: row.external_id,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      lastModifiedBy: row.last_modified_by,
      deletedAt: row.deleted_at,
    };
  }
}
