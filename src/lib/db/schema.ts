import { RELATIONSHIP_TERMS } from '@/lib/relationships/types';
import { SCORE_MAX, SCORE_MIN } from '@/lib/relationships/term-config';

export const SCHEMA_VERSION = 1;

const TERM_LIST = RELATIONSHIP_TERMS.map((term) => `'${term}'`).join(', ');

export const SCHEMA_STATEMENTS: string[] = [
  `CREATE TABLE IF NOT EXISTS metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  )`,

  // ============================================
  // ACCOUNTS - company nodes
  // ============================================
  `CREATE TABLE IF NOT EXISTS accounts (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    ticker TEXT,
    external_id TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    last_modified_by TEXT NOT NULL,
    deleted_at INTEGER
  )`,

  // ============================================
  // CONTACTS - person nodes
  // ============================================
  `CREATE TABLE IF NOT EXISTS contacts (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    job_title TEXT,
    account_id TEXT,
    external_id TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    last_modified_by TEXT NOT NULL,
    deleted_at INTEGER,

    FOREIGN KEY (account_id) REFERENCES accounts(id)
  )`,

  // ============================================
  // RELATIONSHIPS - soft-deleted, never removed
  // ============================================
  `CREATE TABLE IF NOT EXISTS relationships (
    id TEXT PRIMARY KEY,
    source_id TEXT NOT NULL,
    source_kind TEXT NOT NULL CHECK(source_kind IN ('account', 'contact')),
    target_id TEXT NOT NULL,
    target_kind TEXT NOT NULL CHECK(target_kind IN ('account', 'contact')),
    term TEXT NOT NULL CHECK(term IN (${TERM_LIST})),
    category TEXT NOT NULL,
    directed INTEGER NOT NULL,
    score INTEGER CHECK(score IS NULL OR score BETWEEN ${SCORE_MIN} AND ${SCORE_MAX}),
    version INTEGER NOT NULL DEFAULT 1,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    deleted INTEGER NOT NULL DEFAULT 0,
    deleted_at INTEGER,
    last_modified_by TEXT NOT NULL,

    CHECK(term <> 'works_for' OR score IS NULL),
    CHECK(source_id <> target_id)
  )`,

  // ============================================
  // RELATIONSHIP LOG - append-only audit trail
  // ============================================
  `CREATE TABLE IF NOT EXISTS relationship_log (
    sequence INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    relationship_id TEXT NOT NULL,
    action TEXT NOT NULL CHECK(action IN ('create', 'update', 'delete', 'restore')),
    previous_state TEXT,
    new_state TEXT NOT NULL,
    changes TEXT NOT NULL,
    changed_at INTEGER NOT NULL,
    actor TEXT,
    note TEXT,

    FOREIGN KEY (relationship_id) REFERENCES relationships(id)
  )`,

  `CREATE INDEX IF NOT EXISTS idx_accounts_name ON accounts(name COLLATE NOCASE)`,
  `CREATE INDEX IF NOT EXISTS idx_accounts_external_id ON accounts(external_id)`,
  `CREATE INDEX IF NOT EXISTS idx_contacts_name ON contacts(name COLLATE NOCASE)`,
  `CREATE INDEX IF NOT EXISTS idx_contacts_account ON contacts(account_id)`,
  `CREATE INDEX IF NOT EXISTS idx_contacts_external_id ON contacts(external_id)`,
  `CREATE INDEX IF NOT EXISTS idx_relationships_source ON relationships(source_id, deleted)`,
  `CREATE INDEX IF NOT EXISTS idx_relationships_target ON relationships(target_id, deleted)`,
  `CREATE INDEX IF NOT EXISTS idx_relationships_deleted_at ON relationships(deleted, deleted_at)`,
  `CREATE INDEX IF NOT EXISTS idx_relationship_log_rel ON relationship_log(relationship_id, sequence)`,
  `CREATE INDEX IF NOT EXISTS idx_relationship_log_changed ON relationship_log(changed_at, sequence)`,
];

const endpointExists = (column: 'source' | 'target') => `
  (NEW.${column}_kind = 'account' AND EXISTS (SELECT 1 FROM accounts WHERE id = NEW.${column}_id))
  OR (NEW.${column}_kind = 'contact' AND EXISTS (SELECT 1 FROM contacts WHERE id = NEW.${column}_id))
`;

export const VALIDATION_TRIGGERS: string[] = [
  `CREATE TRIGGER IF NOT EXISTS relationships_endpoints_exist
    BEFORE INSERT ON relationships
    WHEN NOT (${endpointExists('source')}) OR NOT (${endpointExists('target')})
  BEGIN
    SELECT RAISE(ABORT, 'relationship endpoint does not exist');
  END`,

  `CREATE TRIGGER IF NOT EXISTS relationships_no_hard_delete
    BEFORE DELETE ON relationships
  BEGIN
    SELECT RAISE(ABORT, 'relationships are soft-deleted only');
  END`,

  `CREATE TRIGGER IF NOT EXISTS relationship_log_no_update
    BEFORE UPDATE ON relationship_log
  BEGIN
    SELECT RAISE(ABORT, 'relationship_log is append-only');
  END`,

  `CREATE TRIGGER IF NOT EXISTS relationship_log_no_delete
    BEFORE DELETE ON relationship_log
  BEGIN
    SELECT RAISE(ABORT, 'relationship_log is append-only');
  END`,
];
