import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';
import type { SseStream } from '../../shared/sse';
import type { AuditSummary } from '../../shared/types';
import { randomId } from '../../shared/crypto';
import type { Logger } from '../obs/logger';
import { runDocsAudit, type PersistedArtifacts } from './auditPipeline';

export interface ScanStreamArgs {
  config: AppConfig;
  logger: Logger;
  stream: SseStream;
  store: ArtifactStore;
  docsRoot?: string;
  signal?: AbortSignal;
}

export interface ScanStreamResult {
  runId: string;
  summary: AuditSummary;
  needsReview: string[];
  artifacts: PersistedArtifacts;
}

export const handleScanStream = async ({
  config,
  logger,
  stream,
  store,
  docsRoot,
  signal,
}: ScanStreamArgs): Promise<void> => {
  const runId = randomId();
  try {
    const { run, artifacts } = await runDocsAudit({
      config,
      logger,
      store,
      runId,
      scanOptions: docsRoot ? { docsRoot } : undefined,
      send: (event) => stream.send(event),
      signal,
    });

    stream.sendJson('audit-result', {
      runId,
      summary: run.summary,
      needsReview: run.needsReview.map((result) => result.identityKey),
      artifacts,
    } satisfies ScanStreamResult);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Docs audit failed', { runId, error: message });
    stream.sendJson('fatal', { error: message });
  } finally {
    stream.close();
  }
};
