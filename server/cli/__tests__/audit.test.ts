import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { applyCliOptions, parseCliArgs } from '../audit';
import { makeTestConfig } from '../../__tests__/helpers';

describe('parseCliArgs', () => {
  it('accepts separate and inline values', () => {
    expect(parseCliArgs(['--docs-root', 'content', '--repo=org/repo', '--inventory=a=b.json'])).toEqual({
      docsRoot: 'content',
      repo: 'org/repo',
      inventory: 'a=b.json',
    });
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseCliArgs(['--output'])).toThrow('Missing value for --output');
    expect(() => parseCliArgs(['--branch', '--repo', 'x'])).toThrow('Missing value for --branch');
  });
});

describe('applyCliOptions', () => {
  const base = makeTestConfig(path.resolve('/tmp/base-repo'));

  it('overrides configuration and resolves paths against the repository root', () => {
    const repoRoot = path.resolve('/tmp/cli-repo');
    const config = applyCliOptions(base, {
      repoRoot,
      docsRoot: 'content',
      inventory: 'data/inventory.json',
      output: 'out',
      repo: 'org/repo',
      branch: 'live',
    });
    expect(config.docs).toMatchObject({ repoRoot, docsRoot: 'content', repoSlug: 'org/repo', branch: 'live' });
    expect(config.inventory.path).toBe(path.join(repoRoot, 'data/inventory.json'));
    expect(config.persistence.outputRoot).toBe(path.join(repoRoot, 'out'));
  });

  it('keeps the base configuration without flags', () => {
    expect(applyCliOptions(base, {})).toEqual(base);
  });
});
