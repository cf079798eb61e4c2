import { ValidationError } from '@/lib/errors';
import { createLogger } from '@/lib/utils/logger';
import {
  appSettingsSchema,
  DEFAULT_SETTINGS,
  SETTINGS_ENV_KEYS,
  type AppSettings,
  type AppSettingsInput,
} from './types';

const log = createLogger('SettingsManager');
const partialSettingsSchema = appSettingsSchema.partial();

/**
 * Resolves settings from defaults, then environment variables, then
 * explicit overrides. Invalid environment values fall back to the defaults.
 */
export class SettingsManager {
  static load(
    overrides: Partial<AppSettingsInput> = {},
    env: NodeJS.ProcessEnv = process.env
  ): AppSettings {
    const result = appSettingsSchema.safeParse({
      ...DEFAULT_SETTINGS,
      ...this.fromEnv(env),
      ...overrides,
    });

    if (!result.success) {
      throw new ValidationError('Invalid settings', {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    return result.data;
  }

  static fromEnv(env: NodeJS.ProcessEnv): Partial<AppSettings> {
    const raw: Record<string, string> = {};
    for (const [key, envName] of Object.entries(SETTINGS_ENV_KEYS)) {
      const value = env[envName];
      if (value !== undefined && value.trim() !== '') {
        raw[key] = value;
      }
    }

    const parsed = partialSettingsSchema.safeParse(raw);
    if (parsed.success) return parsed.data;

    const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
    log.warn(`Ignoring invalid environment settings: ${[...invalid].join(', ')}`);
    for (const key of invalid) {
      delete raw[key];
    }
    return partialSettingsSchema.parse(raw);
  }
}
