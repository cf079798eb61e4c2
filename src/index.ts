import { DashboardApi } from '@/lib/api/DashboardApi';
import { openDatabase } from '@/lib/db/init';
import type { DashboardEvents } from '@/lib/events';
import { GraphAssembler } from '@/lib/graph/GraphAssembler';
import { MutationCoordinator } from '@/lib/mutations';
import { seedDatabase, type SeedResult } from '@/lib/seed/seedDatabase';
import { SettingsManager } from '@/lib/settings/SettingsManager';
import type { AppSettings, AppSettingsInput } from '@/lib/settings/types';
import { createStorageService } from '@/lib/storage';
import { RelationshipHistory } from '@/lib/temporal/relationship-history';
import { EventBus } from '@/lib/utils/event-bus';
import { createLogger, setLogLevel } from '@/lib/utils/logger';

export * from '@/lib/api';
export * from '@/lib/errors';
export type { DashboardEvents, EntityChangedEvent, RelationshipChangedEvent } from '@/lib/events';
export type { Account, Contact, Entity, EntityKind } from '@/lib/entities/types';
export type { Relationship, RelationshipLogEntry, RelationshipTerm, HistoryPage } from '@/lib/relationships/types';
export { TERM_CONFIG } from '@/lib/relationships/term-config';
export type {
  EntityRelationship,
  GraphEdge,
  SubgraphResult,
  SubgraphSeed,
  SubgraphOptions,
} from '@/lib/graph/types';
export { edgeColor, edgeLabel, getGraphStyles, toGraphElements } from '@/lib/graph/graphStyles';
export type { AppSettings } from '@/lib/settings/types';

const log = createLogger('Dashboard');

export interface Dashboard {
  api: DashboardApi;
  events: EventBus<DashboardEvents>;
  settings: AppSettings;
  seed: SeedResult | null;
  close(): void;
}

/**
 * Opens (or creates) the database and wires the stores, the mutation
 * coordinator and the query side behind one DashboardApi.
 */
export async function createDashboard(
  overrides: Partial<AppSettingsInput> = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<Dashboard> {
  const settings = SettingsManager.load(overrides, env);
  setLogLevel(settings.logLevel);

  const db = openDatabase(settings.dbPath);
  const storage = createStorageService(db);
  const events = new EventBus<DashboardEvents>();

  const api = new DashboardApi({
    storage,
    mutations: new MutationCoordinator(storage, events, settings),
    history: new RelationshipHistory(storage),
    graph: new GraphAssembler(storage, settings),
  });

  let seed: SeedResult | null = null;
  if (settings.seed) {
    try {
      seed = await seedDatabase(api);
    } catch (err) {
      db.close();
      throw err;
    }
  }

  log.info(`Dashboard ready (db: ${settings.dbPath}, node limit ${settings.nodeLimit})`);

  return {
    api,
    events,
    settings,
    seed,
    close: () => {
      events.clear();
      db.close();
    },
  };
}
