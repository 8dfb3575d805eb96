import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import path from 'node:path';
import fs from 'node:fs/promises';
import { z } from 'zod';
import type { AppConfig } from '../shared/config';
import type { ArtifactStore, AuditArtifactKind } from '../shared/artifacts';
import type { ApiHealthResponse } from '../shared/types';
import { getPublicConfig } from './config/config';
import { createSseStream } from './http/sse';
import type { Logger } from './obs/logger';
import { auditScenarios, persistAuditRun } from './pipeline/auditPipeline';
import { handleScanStream } from './pipeline/scanStream';
import { InventoryRecordSchema } from './inventory/loadInventory';
import { toScanResultRows } from './audit/report';
import { sanitizeSegment } from './persistence/fsStore';

const nullableText = z.string().nullable().optional();

const ScenarioInputSchema = z.object({
  identityKey: z.string().trim().min(1),
  rawLinks: z.array(z.string()),
  metadata: z
    .object({
      title: nullableText,
      description: nullableText,
      azureCategories: z.array(z.string()).optional(),
      msDate: nullableText,
      ymlPath: nullableText,
      ymlGithubUrl: nullableText,
      includeMdPath: nullableText,
      includeMdGithubUrl: nullableText,
      mdAuthor: nullableText,
      mdMsAuthor: nullableText,
      imagePaths: z.array(z.string()).optional(),
      imageDownloadUrls: z.array(z.string()).optional(),
      extractionIssue: z
        .enum([
          'yaml_parse_failed',
          'missing_content_string',
          'no_include_directive',
          'include_md_unresolvable',
          'include_md_missing',
        ])
        .nullable()
        .optional(),
    })
    .optional(),
});

export const AuditRequestSchema = z.object({
  scenarios: z.array(ScenarioInputSchema).min(1),
  inventory: z.array(InventoryRecordSchema).min(1),
});

const ARTIFACT_KINDS: readonly AuditArtifactKind[] = ['scan_results', 'needs_review', 'summary', 'index_warnings'];

const isArtifactKind = (value: string): value is AuditArtifactKind =>
  ARTIFACT_KINDS.some((kind) => kind === value);

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  store: ArtifactStore;
}

export const createApp = ({ config, logger, store }: AppDeps): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() } satisfies ApiHealthResponse);
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.post('/api/audit', async (req: Request, res: Response) => {
    const parsed = AuditRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid audit request', issues: parsed.error.flatten() });
      return;
    }

    try {
      const run = auditScenarios({
        scenarios: parsed.data.scenarios,
        inventory: parsed.data.inventory,
        config,
        logger,
      });
      await persistAuditRun(store, run);
      res.json({
        runId: run.runId,
        summary: run.summary,
        warnings: run.warnings,
        rows: toScanResultRows(run.results),
        needsReview: toScanResultRows(run.needsReview),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Audit request failed', { error: message });
      res.status(500).json({ error: 'Audit failed' });
    }
  });

  app.get('/api/scan-stream', async (req: Request, res: Response) => {
    const requestedRoot = String(req.query.docsRoot ?? '').trim();
    if (requestedRoot) {
      const relative = path.relative(config.docs.repoRoot, path.resolve(config.docs.repoRoot, requestedRoot));
      if (relative.startsWith('..') || path.isAbsolute(relative)) {
        res.status(400).json({ error: 'docsRoot must stay inside the repository root' });
        return;
      }
    }

    const stream = createSseStream(res, {
      heartbeatMs: config.server.heartbeatIntervalMs,
      label: 'scan',
    });

    await handleScanStream({
      config,
      logger,
      stream,
      store,
      docsRoot: requestedRoot || undefined,
      signal: stream.controller.signal,
    });
  });

  // kind: scan_results, needs_review, summary, index_warnings
  app.get('/api/runs/:runId/artifacts/:kind', async (req: Request, res: Response) => {
    const runId = String(req.params.runId || '').trim();
    const kind = String(req.params.kind || '').trim();
    if (!runId || !isArtifactKind(kind)) {
      res.status(400).json({ error: 'Missing runId or unknown artifact kind' });
      return;
    }
    if (config.persistence.mode !== 'fs') {
      res.status(404).json({ error: 'Artifacts are not persisted' });
      return;
    }

    const filePath = path.join(config.persistence.outputRoot, sanitizeSegment(runId), `${kind}.json`);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      res.type('application/json').send(content);
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        res.status(404).json({ error: 'Not found' });
        return;
      }
      res.status(500).json({ error: 'Failed to read artifact' });
    }
  });

  return app;
};
