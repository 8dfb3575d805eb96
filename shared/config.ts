import { z } from 'zod';

export const DEFAULT_LEARN_BASE_URL = 'https://learn.microsoft.com/en-us/azure/architecture';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  docs: z.object({
    repoRoot: z.string().min(1),
    docsRoot: z.string().min(1),
    repoSlug: z.string().min(1),
    branch: z.string().min(1),
    learnBaseUrl: z.string().url(),
    scanConcurrency: z.number().int().positive(),
  }),
  inventory: z.object({
    path: z.string().min(1),
  }),
  persistence: z.object({
    mode: z.enum(['fs', 'none']),
    outputRoot: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    repoCommit: z.string().min(1),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  docs: {
    docsRoot: string;
    repoSlug: string;
    branch: string;
    learnBaseUrl: string;
    scanConcurrency: number;
  };
  persistence: {
    mode: AppConfig['persistence']['mode'];
  };
}

// Filesystem locations stay server-side.
export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  docs: {
    docsRoot: config.docs.docsRoot,
    repoSlug: config.docs.repoSlug,
    branch: config.docs.branch,
    learnBaseUrl: config.docs.learnBaseUrl,
    scanConcurrency: config.docs.scanConcurrency,
  },
  persistence: {
    mode: config.persistence.mode,
  },
});
