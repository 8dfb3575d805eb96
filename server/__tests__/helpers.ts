import { vi } from 'vitest';
import type { AppConfig } from '../../shared/config';
import { buildConfig } from '../config/config';
import type { Logger } from '../obs/logger';

export const makeTestLogger = () => {
  const logger = {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
  return logger satisfies Logger;
};

export const makeTestConfig = (repoRoot: string, env: NodeJS.ProcessEnv = {}): AppConfig =>
  buildConfig({
    NODE_ENV: 'test',
    REPO_ROOT: repoRoot,
    LOG_LEVEL: 'error',
    GITHUB_SHA: 'test-sha',
    ...env,
  });
