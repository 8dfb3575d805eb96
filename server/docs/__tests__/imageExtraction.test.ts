import { describe, expect, it } from 'vitest';
import { cleanRef, extractImageRefs, resolveRepoRel } from '../imageExtraction';
import { makeGithubBlobUrl, makeLearnUrl, makeRawUrl } from '../urls';

describe('extractImageRefs', () => {
  it('collects every image syntax in order, skipping thumbnails and repeats', () => {
    const markdown = [
      '![Architecture](./media/architecture.svg "Diagram")',
      ':::image type="content" source="media/flow.png" alt-text="Flow":::',
      '<img src="../images/extra.png" alt="Extra">',
      '<picture><source srcset="media/dark.png 1x, media/dark@2x.png 2x"></picture>',
      '![Reference][diagram]',
      '![Thumb](media/thumbs/small.png)',
      '![Again](./media/architecture.svg)',
      '',
      '[diagram]: media/ref-diagram.png',
    ].join('\n');

    expect(extractImageRefs(markdown)).toEqual([
      './media/architecture.svg',
      'media/flow.png',
      '../images/extra.png',
      'media/dark.png',
      'media/ref-diagram.png',
    ]);
  });
});

describe('cleanRef', () => {
  it('unwraps angle brackets, quotes and titles', () => {
    expect(cleanRef('<media/a.png>')).toBe('media/a.png');
    expect(cleanRef('"media/a.png"')).toBe('media/a.png');
    expect(cleanRef('media/a.png "Title"')).toBe('media/a.png');
    expect(cleanRef(undefined)).toBe('');
  });
});

describe('resolveRepoRel', () => {
  it('resolves relative references to repository paths', () => {
    expect(resolveRepoRel('/repo/docs/guide', '../images/x.png?raw=true', '/repo')).toBe('docs/images/x.png');
    expect(resolveRepoRel('/repo/docs/guide', './media/y.png#frag', '/repo')).toBe('docs/guide/media/y.png');
  });

  it('rejects absolute URLs and paths outside the repository', () => {
    expect(resolveRepoRel('/repo/docs', 'https://example.com/x.png', '/repo')).toBeNull();
    expect(resolveRepoRel('/repo/docs', '../../outside.png', '/repo')).toBeNull();
    expect(resolveRepoRel('/repo/docs', '', '/repo')).toBeNull();
  });
});

describe('url helpers', () => {
  const base = 'https://learn.microsoft.com/en-us/azure/architecture';

  it('maps a scenario YAML path to its published URL', () => {
    expect(makeLearnUrl(`${base}/`, 'docs', 'docs/example-scenario/web-app.yml')).toBe(
      `${base}/example-scenario/web-app`,
    );
    expect(makeLearnUrl(base, './docs/', 'docs\\guide\\page.YAML')).toBe(`${base}/guide/page`);
  });

  it('builds GitHub blob and raw download URLs', () => {
    expect(makeGithubBlobUrl('org/repo', 'main', '/docs/a.yml')).toBe('https://github.com/org/repo/blob/main/docs/a.yml');
    expect(makeRawUrl('org/repo', 'main', 'docs/a.png')).toBe(
      'https://raw.githubusercontent.com/org/repo/main/docs/a.png',
    );
  });
});
