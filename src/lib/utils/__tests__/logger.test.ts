import { describe, it, expect, vi } from 'vitest';
import { createLogger, setLogLevel } from '../logger';

describe('createLogger', () => {
  it('should prefix messages with the scope', () => {
    setLogLevel('info');
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('GraphAssembler').info('built subgraph', 3);

    expect(info).toHaveBeenCalledWith('[GraphAssembler] built subgraph', 3);
  });

  it('should drop messages below the current level', () => {
    setLogLevel('warn');
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createLogger('Seeder');

    log.info('hidden');
    log.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Seeder] shown');
  });
});
