import { afterEach, vi } from 'vitest';
import { setLogLevel } from '@/lib/utils/logger';

setLogLevel('silent');

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
  setLogLevel('silent');
});
