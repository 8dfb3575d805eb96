import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const LEARN_BASE = 'https://learn.microsoft.com/en-us/azure/architecture';
export const WEB_APP_KEY = `${LEARN_BASE}/example-scenario/web-app`;

const FILES: Record<string, string> = {
  'docs/example-scenario/web-app.yml': [
    '### YamlMime:Architecture',
    'metadata:',
    '  title: Web app baseline',
    '  description: Baseline web app.',
    '  author: yml-author',
    '  ms.author: ymlms',
    '  ms.date: 01/15/2025',
    'azureCategories:',
    '  - web',
    '  - databases',
    'content: |',
    '  [!INCLUDE[](web-app-content.md)]',
    '',
  ].join('\n'),
  'docs/example-scenario/web-app-content.md': [
    '---',
    'author: md-author',
    'ms.author: mdms',
    '---',
    '# Web app',
    '',
    '![Architecture](./images/web-app.svg)',
    '',
    'Estimate: [Small](https://azure.com/e/small123) and [Large](https://azure.microsoft.com/pricing/calculator?shared-estimate=large456&ocid=docs).',
    'Use the [calculator](https://azure.microsoft.com/pricing/calculator) to change it.',
    '',
  ].join('\n'),
  'docs/other/broken.yaml': 'metadata: [unclosed\n',
  'docs/other/missing.yml': 'content: "[!INCLUDE[](missing.md)]"\n',
  'docs/other/no-content.yml': 'metadata:\n  title: No content\n',
  'docs/other/no-include.yml': 'metadata:\n  title: No include\ncontent: just text\n',
};

export const createTempDir = (prefix = 'estimate-audit-'): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

/** Writes a small docs tree (one passing scenario, four with extraction issues) and returns its root. */
export const createDocsRepo = async (): Promise<string> => {
  const root = await createTempDir();
  for (const [relative, content] of Object.entries(FILES)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }
  return root;
};

export const removeDir = (dir: string): Promise<void> => fs.rm(dir, { recursive: true, force: true });
