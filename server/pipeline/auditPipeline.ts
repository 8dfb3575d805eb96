import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';
import type { AuditRunResult, ReferenceEntry, ReferenceIndexWarning, ScenarioInput } from '../../shared/types';
import { randomId } from '../../shared/crypto';
import { withContext, type Logger } from '../obs/logger';
import { buildReferenceIndex } from '../audit/referenceIndex';
import { runAudit } from '../audit/runAudit';
import { toScanResultRows } from '../audit/report';
import { docsScanOptionsFromConfig, scanDocs, type DocsScanOptions } from '../docs/docsScanner';
import { loadInventory } from '../inventory/loadInventory';
import { makeStageEmitter, type StageEmitter, type StageEventSender } from './stageEmitter';

export interface PersistedArtifacts {
  scanResults: string;
  needsReview: string;
  summary: string;
  indexWarnings: string;
}

export const logIndexWarnings = (logger: Logger, warnings: readonly ReferenceIndexWarning[]) => {
  for (const warning of warnings) {
    logger.warn('Reference inventory warning', { ...warning });
  }
};

export const persistAuditRun = async (store: ArtifactStore, run: AuditRunResult): Promise<PersistedArtifacts> => {
  await store.ensureLayout();
  return {
    scanResults: await store.saveRunArtifact(run.runId, 'scan_results', toScanResultRows(run.results)),
    needsReview: await store.saveRunArtifact(run.runId, 'needs_review', toScanResultRows(run.needsReview)),
    summary: await store.saveRunArtifact(run.runId, 'summary', run.summary),
    indexWarnings: await store.saveRunArtifact(run.runId, 'index_warnings', run.warnings),
  };
};

export interface AuditScenariosArgs {
  scenarios: readonly ScenarioInput[];
  inventory: readonly ReferenceEntry[];
  config: AppConfig;
  logger: Logger;
  runId?: string;
}

/** Core audit over already extracted scenarios: index first, then every scenario against it. */
export const auditScenarios = ({
  scenarios,
  inventory,
  config,
  logger,
  runId = randomId(),
}: AuditScenariosArgs): AuditRunResult => {
  const { index, warnings } = buildReferenceIndex(inventory);
  logIndexWarnings(withContext(logger, { runId }), warnings);
  return runAudit(scenarios, index, {
    runId,
    warnings,
    repoCommit: config.observability.repoCommit,
  });
};

export interface DocsAuditArgs {
  config: AppConfig;
  logger: Logger;
  store: ArtifactStore;
  runId?: string;
  scanOptions?: Partial<DocsScanOptions>;
  inventoryPath?: string;
  send?: StageEventSender;
  signal?: AbortSignal;
}

export interface DocsAuditResult {
  run: AuditRunResult;
  artifacts: PersistedArtifacts;
}

const noopSender: StageEventSender = () => {};

/**
 * Full run over a docs tree: load the inventory, extract scenarios, audit them
 * and persist the report. A missing inventory or an empty docs tree aborts the run.
 */
export const runDocsAudit = async ({
  config,
  logger,
  store,
  runId = randomId(),
  scanOptions,
  inventoryPath = config.inventory.path,
  send = noopSender,
  signal,
}: DocsAuditArgs): Promise<DocsAuditResult> => {
  const runLogger = withContext(logger, { runId });
  const inventoryStage = makeStageEmitter(runId, 'inventory', send);
  const extractionStage = makeStageEmitter(runId, 'extraction', send);
  const comparisonStage = makeStageEmitter(runId, 'comparison', send);
  const reportStage = makeStageEmitter(runId, 'report', send);
  let currentStage: StageEmitter = inventoryStage;

  try {
    inventoryStage.start({ message: `Loading reference inventory from ${inventoryPath}` });
    const inventory = await loadInventory(inventoryPath);
    if (!inventory.length) {
      throw new Error(`Reference inventory is empty: ${inventoryPath}`);
    }
    const { index, warnings } = buildReferenceIndex(inventory);
    logIndexWarnings(runLogger, warnings);
    inventoryStage.success({
      message: `Indexed ${index.size} inventory scenarios`,
      data: { records: inventory.length, indexed: index.size, warnings: warnings.length },
    });

    currentStage = extractionStage;
    const options = { ...docsScanOptionsFromConfig(config), ...scanOptions };
    extractionStage.start({ message: `Scanning ${options.docsRoot}` });
    const { files, scenarios } = await scanDocs(options, { logger: runLogger, signal });
    if (!files.length) {
      throw new Error(`No scenario YAML files found under ${options.docsRoot}`);
    }
    const extractionIssues = scenarios.filter((scenario) => scenario.metadata?.extractionIssue).length;
    extractionStage.success({
      message: `Extracted ${scenarios.length} scenarios`,
      data: { files: files.length, extractionIssues },
    });

    currentStage = comparisonStage;
    comparisonStage.start({ message: 'Classifying links and comparing estimates' });
    const run = runAudit(scenarios, index, {
      runId,
      warnings,
      repoCommit: config.observability.repoCommit,
    });
    comparisonStage.success({ message: `${run.summary.needsReview} scenarios need review`, data: run.summary });

    currentStage = reportStage;
    reportStage.start({ message: 'Writing report artifacts' });
    const artifacts = await persistAuditRun(store, run);
    reportStage.success({ data: artifacts });

    runLogger.info('Audit complete', {
      total: run.summary.totalScenarios,
      criteriaPassed: run.summary.criteriaPassed,
      criteriaFailed: run.summary.criteriaFailed,
      needsReview: run.summary.needsReview,
    });

    return { run, artifacts };
  } catch (error) {
    currentStage.failure(error);
    throw error;
  }
};
