// Row shapes as stored by SQLite. Booleans are 0/1 integers, timestamps are
// epoch milliseconds and log snapshots are JSON text.

export interface AccountRow {
  id: string;
  name: string;
  ticker: string | null;
  external_id: string | null;
  created_at: number;
  updated_at: number;
  last_modified_by: string;
  deleted_at: number | null;
}

export interface ContactRow {
  id: string;
  name: string;
  job_title: string | null;
  account_id: string | null;
  external_id: string | null;
  created_at: number;
  updated_at: number;
  last_modified_by: string;
  deleted_at: number | null;
}

export interface RelationshipRow {
  id: string;
  source_id: string;
  source_kind: string;
  target_id: string;
  target_kind: string;
  term: string;
  category: string;
  directed: number;
  score: number | null;
  version: number;
  created_at: number;
  updated_at: number;
  deleted: number;
  deleted_at: number | null;
  last_modified_by: string;
}

export interface RelationshipLogRow {
  sequence: number;
  id: string;
  relationship_id: string;
  action: string;
  previous_state: string | null;
  new_state: string;
  changes: string;
  changed_at: number;
  actor: string | null;
  note: string | null;
}

export function serializeJson<T>(data: T | null | undefined): string | null {
  if (data === null || data === undefined) return null;
  return JSON.stringify(data);
}
