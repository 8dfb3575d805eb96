import 'dotenv/config';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { AppConfig } from '../../shared/config';
import { loadConfig } from '../config/config';
import { createLogger } from '../obs/logger';
import { createArtifactStore } from '../persistence/fsStore';
import { runDocsAudit } from '../pipeline/auditPipeline';

export interface CliOptions {
  repoRoot?: string;
  docsRoot?: string;
  inventory?: string;
  output?: string;
  repo?: string;
  branch?: string;
}

const FLAGS = new Map<string, keyof CliOptions>([
  ['--repo-root', 'repoRoot'],
  ['--docs-root', 'docsRoot'],
  ['--inventory', 'inventory'],
  ['--output', 'output'],
  ['--repo', 'repo'],
  ['--branch', 'branch'],
]);

export const parseCliArgs = (args: readonly string[]): CliOptions => {
  const options: CliOptions = {};
  for (let i = 0; i < args.length; i++) {
    const eq = args[i].indexOf('=');
    const flag = eq === -1 ? args[i] : args[i].slice(0, eq);
    const inline = eq === -1 ? undefined : args[i].slice(eq + 1);
    const key = FLAGS.get(flag);
    if (!key) {
      throw new Error(`Unknown option: ${args[i]}`);
    }
    const value = inline ?? args[i + 1];
    if (!value || value.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    options[key] = value;
    if (inline === undefined) i++;
  }
  return options;
};

/** CLI flags win over environment configuration; relative paths resolve against the repo root. */
export const applyCliOptions = (base: AppConfig, options: CliOptions): AppConfig => {
  const repoRoot = options.repoRoot ? path.resolve(options.repoRoot) : base.docs.repoRoot;
  return {
    ...base,
    docs: {
      ...base.docs,
      repoRoot,
      docsRoot: options.docsRoot ?? base.docs.docsRoot,
      repoSlug: options.repo ?? base.docs.repoSlug,
      branch: options.branch ?? base.docs.branch,
    },
    inventory: {
      path: options.inventory ? path.resolve(repoRoot, options.inventory) : base.inventory.path,
    },
    persistence: {
      ...base.persistence,
      outputRoot: options.output ? path.resolve(repoRoot, options.output) : base.persistence.outputRoot,
    },
  };
};

async function main() {
  const config = applyCliOptions(loadConfig(), parseCliArgs(process.argv.slice(2)));
  const logger = createLogger(config);
  const store = createArtifactStore(config);

  logger.info('Starting estimate link audit', {
    repoRoot: config.docs.repoRoot,
    docsRoot: config.docs.docsRoot,
    inventory: config.inventory.path,
  });

  try {
    const { run, artifacts } = await runDocsAudit({ config, logger, store });
    logger.info('Audit summary', { runId: run.runId, ...run.summary, artifacts });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Audit failed', { error: message });
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
