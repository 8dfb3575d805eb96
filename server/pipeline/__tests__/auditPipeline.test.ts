import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { StageEvent } from '../../../shared/types';
import { createArtifactStore } from '../../persistence/fsStore';
import { auditScenarios, runDocsAudit } from '../auditPipeline';
import { makeTestConfig, makeTestLogger } from '../../__tests__/helpers';
import { WEB_APP_KEY, createDocsRepo, removeDir } from '../../docs/__tests__/docsFixture';

const INVENTORY = `[
  { yml_url: '${WEB_APP_KEY}/', estimate_link: 'https://azure.com/e/small123; https://azure.com/e/other' },
]`;

describe('runDocsAudit', () => {
  let repoRoot = '';

  beforeEach(async () => {
    repoRoot = await createDocsRepo();
    await fs.writeFile(path.join(repoRoot, 'estimate_scenarios.json'), INVENTORY, 'utf-8');
  });

  afterEach(async () => {
    await removeDir(repoRoot);
  });

  it('runs every stage, audits the docs tree and writes the report', async () => {
    const config = makeTestConfig(repoRoot);
    const logger = makeTestLogger();
    const events: StageEvent<unknown>[] = [];

    const { run, artifacts } = await runDocsAudit({
      config,
      logger,
      store: createArtifactStore(config),
      runId: 'run-test',
      send: (event) => events.push(event),
    });

    expect(events.map((e) => `${e.stage}:${e.status}`)).toEqual([
      'inventory:start',
      'inventory:success',
      'extraction:start',
      'extraction:success',
      'comparison:start',
      'comparison:success',
      'report:start',
      'report:success',
    ]);
    expect(events.every((e) => e.runId === 'run-test')).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('Audit complete', {
      runId: 'run-test',
      total: 5,
      criteriaPassed: 1,
      criteriaFailed: 4,
      needsReview: 0,
    });

    expect(run.summary).toMatchObject({
      totalScenarios: 5,
      criteriaPassed: 1,
      criteriaFailed: 4,
      failureReasons: { no_estimate_link: 4, no_estimate_link_calculator_tool_link_only: 0 },
      matchedInventoryScenarios: 1,
      extractionIssues: {
        yaml_parse_failed: 1,
        missing_content_string: 1,
        no_include_directive: 1,
        include_md_unresolvable: 0,
        include_md_missing: 1,
      },
      needsReview: 0,
      indexWarnings: 0,
      repoCommit: 'test-sha',
    });
    expect(run.results[0]).toMatchObject({
      identityKey: WEB_APP_KEY,
      comparisonStatus: 'matched_existing_scenario_same_estimate',
      normalizedEstimateLinks: [
        'https://azure.com/e/small123',
        'https://azure.microsoft.com/pricing/calculator?shared-estimate=large456',
      ],
    });

    const runDir = path.join(repoRoot, 'audit_output', 'run-test');
    expect(artifacts).toEqual({
      scanResults: path.join(runDir, 'scan_results.json'),
      needsReview: path.join(runDir, 'needs_review.json'),
      summary: path.join(runDir, 'summary.json'),
      indexWarnings: path.join(runDir, 'index_warnings.json'),
    });
    const rows: unknown = JSON.parse(await fs.readFile(artifacts.scanResults, 'utf-8'));
    expect(rows).toHaveLength(5);
    expect(rows).toMatchObject([
      {
        extraction_issue: '',
        yml_github_url: 'https://github.com/MicrosoftDocs/architecture-center/blob/main/docs/example-scenario/web-app.yml',
        include_md_github_url:
          'https://github.com/MicrosoftDocs/architecture-center/blob/main/docs/example-scenario/web-app-content.md',
        image_paths: 'docs/example-scenario/images/web-app.svg',
      },
      { yml_path: 'docs/other/broken.yaml', extraction_issue: 'yaml_parse_failed' },
      { yml_path: 'docs/other/missing.yml', extraction_issue: 'include_md_missing' },
      { yml_path: 'docs/other/no-content.yml', extraction_issue: 'missing_content_string' },
      { yml_path: 'docs/other/no-include.yml', extraction_issue: 'no_include_directive' },
    ]);
    expect(JSON.parse(await fs.readFile(artifacts.needsReview, 'utf-8'))).toEqual([]);
  });

  it('fails the inventory stage when the inventory is missing', async () => {
    const config = makeTestConfig(repoRoot, { PERSISTENCE_ENABLED: 'false' });
    const events: StageEvent<unknown>[] = [];
    const inventoryPath = path.join(repoRoot, 'missing.json');

    await expect(
      runDocsAudit({
        config,
        logger: makeTestLogger(),
        store: createArtifactStore(config),
        inventoryPath,
        send: (event) => events.push(event),
      }),
    ).rejects.toThrow(`Inventory file not found: ${inventoryPath}`);
    expect(events.map((e) => `${e.stage}:${e.status}`)).toEqual(['inventory:start', 'inventory:failure']);
    expect(events[1]?.message).toBe(`Inventory file not found: ${inventoryPath}`);
  });

  it('rejects an empty inventory', async () => {
    const config = makeTestConfig(repoRoot, { PERSISTENCE_ENABLED: 'false', INVENTORY_PATH: 'empty.json' });
    await fs.writeFile(path.join(repoRoot, 'empty.json'), '[]', 'utf-8');
    await expect(
      runDocsAudit({ config, logger: makeTestLogger(), store: createArtifactStore(config) }),
    ).rejects.toThrow(`Reference inventory is empty: ${path.join(repoRoot, 'empty.json')}`);
  });

  it('fails the extraction stage when no scenario files exist', async () => {
    const config = makeTestConfig(repoRoot, { PERSISTENCE_ENABLED: 'false' });
    await fs.mkdir(path.join(repoRoot, 'docs', 'empty'));
    const events: StageEvent<unknown>[] = [];

    await expect(
      runDocsAudit({
        config,
        logger: makeTestLogger(),
        store: createArtifactStore(config),
        scanOptions: { docsRoot: 'docs/empty' },
        send: (event) => events.push(event),
      }),
    ).rejects.toThrow('No scenario YAML files found under docs/empty');
    expect(events.map((e) => `${e.stage}:${e.status}`)).toEqual([
      'inventory:start',
      'inventory:success',
      'extraction:start',
      'extraction:failure',
    ]);
  });
});

describe('auditScenarios', () => {
  it('logs inventory warnings and audits in memory', () => {
    const logger = makeTestLogger();
    const run = auditScenarios({
      scenarios: [{ identityKey: WEB_APP_KEY, rawLinks: ['https://azure.com/e/fresh'] }],
      inventory: [{ identityKey: WEB_APP_KEY, estimateLinks: ['https://azure.com/e/old', 'broken'] }],
      config: makeTestConfig('/tmp/unused-repo'),
      logger,
      runId: 'memory-run',
    });

    expect(run.runId).toBe('memory-run');
    expect(run.results[0]?.comparisonStatus).toBe('matched_existing_scenario_new_estimate');
    expect(run.needsReview).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith('Reference inventory warning', {
      runId: 'memory-run',
      code: 'unusable_reference_link',
      identityKey: WEB_APP_KEY,
      entryIndex: 0,
      link: 'broken',
    });
  });
});
