import { describe, it, expect } from 'vitest';
import { ValidationError } from '@/lib/errors';
import { SettingsManager } from '../SettingsManager';
import { DEFAULT_SETTINGS } from '../types';

describe('SettingsManager', () => {
  it('should fall back to defaults', () => {
    expect(SettingsManager.load({}, {})).toEqual(DEFAULT_SETTINGS);
  });

  it('should read and coerce environment variables', () => {
    const settings = SettingsManager.load(
      {},
      {
        DASHBOARD_NODE_LIMIT: '25',
        DASHBOARD_DEFAULT_DEPTH: '3',
        DASHBOARD_SEED: 'false',
        DASHBOARD_ACTOR: 'Ops Team',
        DASHBOARD_LOG_LEVEL: 'debug',
      }
    );

    expect(settings).toEqual({
      ...DEFAULT_SETTINGS,
      nodeLimit: 25,
      defaultDepth: 3,
      seed: false,
      actor: 'Ops Team',
      logLevel: 'debug',
    });
  });

  it('should ignore invalid environment values and keep the valid ones', () => {
    const settings = SettingsManager.load({}, { DASHBOARD_NODE_LIMIT: 'lots', DASHBOARD_DEFAULT_DEPTH: '1' });

    expect(settings.nodeLimit).toBe(100);
    expect(settings.defaultDepth).toBe(1);
  });

  it('should let explicit overrides win over the environment', () => {
    const settings = SettingsManager.load({ nodeLimit: 10, dbPath: ':memory:' }, { DASHBOARD_NODE_LIMIT: '25' });

    expect(settings.nodeLimit).toBe(10);
    expect(settings.dbPath).toBe(':memory:');
  });

  it('should reject invalid overrides', () => {
    expect(() => SettingsManager.load({ nodeLimit: 0 }, {})).toThrow(ValidationError);
  });
});
