import path from 'node:path';
import {
  ConfigSchema,
  DEFAULT_LEARN_BASE_URL,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const repoRoot = path.resolve(env.REPO_ROOT || process.cwd());
  const outputRoot = path.resolve(env.OUTPUT_ROOT || path.join(repoRoot, 'audit_output'));
  const persistenceEnabled = booleanFromEnv(env.PERSISTENCE_ENABLED, true);

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    docs: {
      repoRoot,
      docsRoot: env.DOCS_ROOT?.trim() || 'docs',
      repoSlug: env.REPO_SLUG?.trim() || env.GITHUB_REPOSITORY?.trim() || 'MicrosoftDocs/architecture-center',
      branch: env.REPO_BRANCH?.trim() || 'main',
      learnBaseUrl: (env.LEARN_BASE_URL?.trim() || DEFAULT_LEARN_BASE_URL).replace(/\/+$/, ''),
      scanConcurrency: numberFromEnv(env.SCAN_CONCURRENCY, 8),
    },
    inventory: {
      path: path.resolve(repoRoot, env.INVENTORY_PATH?.trim() || 'estimate_scenarios.json'),
    },
    persistence: {
      mode: persistenceEnabled ? 'fs' : 'none',
      outputRoot,
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
      repoCommit: env.GITHUB_SHA?.trim() || 'local',
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
