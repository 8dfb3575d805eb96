import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig } from '../../shared/config';
import type { ExtractionIssue, ScenarioInput, ScenarioMetadata } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { mapWithConcurrency } from '../utils/concurrency';
import { extractEstimateLinkCandidates } from './linkExtraction';
import { cleanRef, extractImageRefs, resolveRepoRel, stripQueryFragment } from './imageExtraction';
import { makeGithubBlobUrl, makeLearnUrl, makeRawUrl } from './urls';

// [!INCLUDE[](path/to/article.md)] inside the YAML content string.
const INCLUDE_RE = /\[!INCLUDE\s*\[\s*\]\s*\(\s*([^)\s]+\.md)\s*\)\s*\]/i;
const YAML_EXT_RE = /\.ya?ml$/i;

export interface DocsScanOptions {
  repoRoot: string;
  docsRoot: string;
  repoSlug: string;
  branch: string;
  learnBaseUrl: string;
  concurrency: number;
}

export const docsScanOptionsFromConfig = (config: AppConfig): DocsScanOptions => ({
  repoRoot: config.docs.repoRoot,
  docsRoot: config.docs.docsRoot,
  repoSlug: config.docs.repoSlug,
  branch: config.docs.branch,
  learnBaseUrl: config.docs.learnBaseUrl,
  concurrency: config.docs.scanConcurrency,
});

type YamlRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is YamlRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asText = (value: unknown): string | null => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return null;
};

const asTextList = (value: unknown): string[] => {
  const list = Array.isArray(value) ? value : value == null ? [] : [value];
  return list.map(asText).filter((item): item is string => item !== null);
};

const safeParseYaml = (text: string): unknown => {
  try {
    return parseYaml(text);
  } catch {
    return null;
  }
};

export const parseFrontMatter = (markdown: string): YamlRecord => {
  if (!markdown.startsWith('---')) return {};
  const end = markdown.indexOf('\n---', 3);
  if (end === -1) return {};
  const parsed = safeParseYaml(markdown.slice(3, end));
  return isRecord(parsed) ? parsed : {};
};

/** Metadata values live under `metadata:` or at the top level. */
const readMeta = (data: YamlRecord, key: string): string | null => {
  const meta = isRecord(data.metadata) ? data.metadata : {};
  return asText(meta[key]) ?? asText(data[key]);
};

export const listScenarioFiles = async (repoRoot: string, docsRoot: string): Promise<string[]> => {
  const docsPath = path.resolve(repoRoot, docsRoot);
  let entries: string[];
  try {
    entries = await fs.readdir(docsPath, { recursive: true });
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      throw new Error(`Docs root not found: ${docsPath}`);
    }
    throw error;
  }
  return entries
    .filter((entry) => YAML_EXT_RE.test(entry))
    .map((entry) => path.relative(repoRoot, path.join(docsPath, entry)).split(path.sep).join('/'))
    .sort();
};

const fileExists = async (target: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(target);
    return stat.isFile();
  } catch {
    return false;
  }
};

/** Reads one scenario YAML file and the article it includes. Never throws on content problems. */
export const extractScenario = async (repoRelYml: string, options: DocsScanOptions): Promise<ScenarioInput> => {
  const repoRoot = path.resolve(options.repoRoot);
  const ymlFile = path.join(repoRoot, repoRelYml);
  const identityKey = makeLearnUrl(options.learnBaseUrl, options.docsRoot, repoRelYml);
  const metadata: ScenarioMetadata = {
    ymlPath: repoRelYml,
    ymlGithubUrl: makeGithubBlobUrl(options.repoSlug, options.branch, repoRelYml),
    azureCategories: [],
    imagePaths: [],
    imageDownloadUrls: [],
  };
  const withIssue = (issue: ExtractionIssue): ScenarioInput => ({
    identityKey,
    rawLinks: [],
    metadata: { ...metadata, extractionIssue: issue },
  });

  const data = safeParseYaml(await fs.readFile(ymlFile, 'utf-8'));
  if (!isRecord(data)) {
    return withIssue('yaml_parse_failed');
  }

  metadata.title = readMeta(data, 'title');
  metadata.description = readMeta(data, 'description');
  metadata.azureCategories = asTextList(data.azureCategories);
  metadata.msDate = readMeta(data, 'ms.date');

  const content = data.content;
  if (typeof content !== 'string') {
    return withIssue('missing_content_string');
  }

  const include = content.match(INCLUDE_RE);
  if (!include) {
    return withIssue('no_include_directive');
  }

  const includeRel = resolveRepoRel(path.dirname(ymlFile), include[1], repoRoot);
  if (!includeRel) {
    metadata.includeMdPath = include[1];
    return withIssue('include_md_unresolvable');
  }

  metadata.includeMdPath = includeRel;
  metadata.includeMdGithubUrl = makeGithubBlobUrl(options.repoSlug, options.branch, includeRel);
  const mdFile = path.join(repoRoot, includeRel);
  if (!(await fileExists(mdFile))) {
    return withIssue('include_md_missing');
  }

  const markdown = await fs.readFile(mdFile, 'utf-8');
  const frontMatter = parseFrontMatter(markdown);
  metadata.mdAuthor = asText(frontMatter.author) ?? readMeta(data, 'author');
  metadata.mdMsAuthor = asText(frontMatter['ms.author']) ?? readMeta(data, 'ms.author');

  const imagePaths = extractImageRefs(markdown).map((ref) => {
    const cleaned = cleanRef(ref);
    return (
      resolveRepoRel(path.dirname(mdFile), cleaned, repoRoot) ?? stripQueryFragment(cleaned).replace(/^\/+/, '')
    );
  });
  metadata.imagePaths = imagePaths;
  metadata.imageDownloadUrls = imagePaths.map((p) => makeRawUrl(options.repoSlug, options.branch, p));

  return {
    identityKey,
    rawLinks: extractEstimateLinkCandidates(markdown),
    metadata,
  };
};

export interface DocsScanResult {
  files: string[];
  scenarios: ScenarioInput[];
}

export const scanDocs = async (
  options: DocsScanOptions,
  deps: { logger: Logger; signal?: AbortSignal },
): Promise<DocsScanResult> => {
  const files = await listScenarioFiles(options.repoRoot, options.docsRoot);
  deps.logger.info('Scenario files found', { count: files.length, docsRoot: options.docsRoot });

  const scenarios = await mapWithConcurrency(
    files,
    options.concurrency,
    async (file) => {
      const scenario = await extractScenario(file, options);
      const issue = scenario.metadata?.extractionIssue;
      if (issue) {
        deps.logger.debug('Scenario extraction issue', { ymlPath: file, issue });
      }
      return scenario;
    },
    deps.signal,
  );

  return { files, scenarios };
};
