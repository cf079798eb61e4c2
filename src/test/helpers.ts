import { DashboardApi } from '@/lib/api/DashboardApi';
import { openDatabase, type SQLiteDatabase } from '@/lib/db/init';
import type { Account, Contact } from '@/lib/entities/types';
import type { DashboardEvents } from '@/lib/events';
import { GraphAssembler } from '@/lib/graph/GraphAssembler';
import { MutationCoordinator } from '@/lib/mutations';
import type { AppSettings } from '@/lib/settings/types';
import { DEFAULT_SETTINGS } from '@/lib/settings/types';
import { createStorageService } from '@/lib/storage';
import type { StorageService } from '@/lib/storage/interfaces';
import { RelationshipHistory } from '@/lib/temporal/relationship-history';
import { EventBus } from '@/lib/utils/event-bus';

export interface TestContext {
  db: SQLiteDatabase;
  storage: StorageService;
  events: EventBus<DashboardEvents>;
  settings: AppSettings;
  mutations: MutationCoordinator;
  history: RelationshipHistory;
  graph: GraphAssembler;
  api: DashboardApi;
  close(): void;
}

/** Fresh in-memory database with every service wired */
export function createTestContext(overrides: Partial<AppSettings> = {}): TestContext {
  const settings: AppSettings = { ...DEFAULT_SETTINGS, dbPath: ':memory:', seed: false, actor: 'Test User', ...overrides };
  const db = openDatabase(settings.dbPath);
  const storage = createStorageService(db);
  const events = new EventBus<DashboardEvents>();
  const mutations = new MutationCoordinator(storage, events, settings);
  const history = new RelationshipHistory(storage);
  const graph = new GraphAssembler(storage, settings);
  const api = new DashboardApi({ storage, mutations, history, graph });

  return { db, storage, events, settings, mutations, history, graph, api, close: () => db.close() };
}

export function addAccount(ctx: TestContext, name: string, id?: string): Account {
  const entity = ctx.mutations.createEntity({ kind: 'account', name, id });
  if (entity.kind !== 'account') throw new Error('expected an account');
  return entity;
}

export function addContact(ctx: TestContext, name: string, id?: string, accountId?: string): Contact {
  const entity = ctx.mutations.createEntity({ kind: 'contact', name, id, accountId });
  if (entity.kind !== 'contact') throw new Error('expected a contact');
  return entity;
}

export function countRows(db: SQLiteDatabase, table: 'relationships' | 'relationship_log'): number {
  const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
  return row?.count ?? 0;
}
