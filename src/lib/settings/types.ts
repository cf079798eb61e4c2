import { z } from 'zod';
import { LOG_LEVELS } from '@/lib/utils/logger';

const booleanSetting = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

export const appSettingsSchema = z.object({
  /** SQLite file path, or `:memory:` */
  dbPath: z.string().trim().min(1),
  /** Max nodes returned by a subgraph query */
  nodeLimit: z.coerce.number().int().min(1).max(1000),
  /** Hop count used when a subgraph query gives none */
  defaultDepth: z.coerce.number().int().min(0).max(6),
  /** Recorded as lastModifiedBy and log actor when a request names nobody */
  actor: z.string().trim().min(1),
  /** Populate an empty database with the sample graph on start */
  seed: booleanSetting,
  logLevel: z.enum(LOG_LEVELS),
});

export type AppSettings = z.output<typeof appSettingsSchema>;
export type AppSettingsInput = z.input<typeof appSettingsSchema>;

export const DEFAULT_SETTINGS: AppSettings = {
  dbPath: 'relationship-dashboard.sqlite3',
  nodeLimit: 100,
  defaultDepth: 2,
  actor: 'System User',
  seed: true,
  logLevel: 'info',
};

export const SETTINGS_ENV_KEYS: Record<keyof AppSettings, string> = {
  dbPath: 'DASHBOARD_DB_PATH',
  nodeLimit: 'DASHBOARD_NODE_LIMIT',
  defaultDepth: 'DASHBOARD_DEFAULT_DEPTH',
  actor: 'DASHBOARD_ACTOR',
  seed: 'DASHBOARD_SEED',
  logLevel: 'DASHBOARD_LOG_LEVEL',
};
