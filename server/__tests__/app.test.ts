import request from 'supertest';
import { afterEach, describe, expect, it } from 'vitest';
import { createNoopArtifactStore } from '../../shared/artifacts';
import { createApp } from '../app';
import { createArtifactStore } from '../persistence/fsStore';
import { createTempDir, removeDir } from '../docs/__tests__/docsFixture';
import { makeTestConfig, makeTestLogger } from './helpers';

const BASE = 'https://learn.microsoft.com/en-us/azure/architecture';

const AUDIT_BODY = {
  scenarios: [
    { identityKey: `${BASE}/a`, rawLinks: ['https://azure.com/e/new1'], metadata: { title: 'A' } },
    { identityKey: `${BASE}/b`, rawLinks: ['https://azure.microsoft.com/pricing/calculator'] },
  ],
  inventory: [{ identityKey: `${BASE}/a`, estimateLinks: ['https://azure.com/e/old1'] }],
};

const makeApp = (env: NodeJS.ProcessEnv = { PERSISTENCE_ENABLED: 'false' }, repoRoot = '/tmp/unused-repo') => {
  const config = makeTestConfig(repoRoot, env);
  return createApp({ config, logger: makeTestLogger(), store: createArtifactStore(config) });
};

describe('server app', () => {
  let dir = '';

  afterEach(async () => {
    if (dir) await removeDir(dir);
    dir = '';
  });

  it('answers health checks', async () => {
    const res = await request(makeApp()).get('/api/healthz');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
  });

  it('exposes the public configuration', async () => {
    const res = await request(makeApp()).get('/api/config');
    expect(res.status).toBe(200);
    expect(res.body.persistence).toEqual({ mode: 'none' });
    expect(res.body.docs.docsRoot).toBe('docs');
    expect(res.body.docs.repoRoot).toBeUndefined();
  });

  it('audits posted scenarios against the posted inventory', async () => {
    const res = await request(makeApp()).post('/api/audit').send(AUDIT_BODY);
    expect(res.status).toBe(200);
    expect(res.body.summary).toMatchObject({
      totalScenarios: 2,
      criteriaPassed: 1,
      criteriaFailed: 1,
      needsReview: 1,
      repoCommit: 'test-sha',
    });
    expect(res.body.rows).toHaveLength(2);
    expect(res.body.rows[0]).toMatchObject({
      title: 'A',
      estimate_link: 'https://azure.com/e/new1',
      comparison_status: 'matched_existing_scenario_new_estimate',
    });
    expect(res.body.rows[1]).toMatchObject({
      criteria_passed: false,
      failure_reason: 'no_estimate_link_calculator_tool_link_only',
      comparison_status: 'not_applicable',
    });
    expect(res.body.needsReview.map((row: { yml_url: string }) => row.yml_url)).toEqual([`${BASE}/a`]);
    expect(res.body.warnings).toEqual([]);
  });

  it('rejects malformed audit requests', async () => {
    const res = await request(makeApp()).post('/api/audit').send({ scenarios: [], inventory: [] });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid audit request');
  });

  it('refuses docs roots outside the repository', async () => {
    const res = await request(makeApp()).get('/api/scan-stream').query({ docsRoot: '../elsewhere' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('docsRoot must stay inside the repository root');
  });

  it('validates artifact requests', async () => {
    const unknown = await request(makeApp()).get('/api/runs/run-1/artifacts/secrets');
    expect(unknown.status).toBe(400);

    const notPersisted = await request(makeApp()).get('/api/runs/run-1/artifacts/summary');
    expect(notPersisted.status).toBe(404);
    expect(notPersisted.body.error).toBe('Artifacts are not persisted');
  });

  it('serves artifacts written by an audit run', async () => {
    dir = await createTempDir();
    const app = makeApp({}, dir);

    const audit = await request(app).post('/api/audit').send(AUDIT_BODY);
    expect(audit.status).toBe(200);

    const summary = await request(app).get(`/api/runs/${audit.body.runId}/artifacts/summary`);
    expect(summary.status).toBe(200);
    expect(summary.body.totalScenarios).toBe(2);

    const missing = await request(app).get('/api/runs/no-such-run/artifacts/summary');
    expect(missing.status).toBe(404);
  });
});
