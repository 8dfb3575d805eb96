import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import { createNoopArtifactStore, type ArtifactStore } from '../../shared/artifacts';

export const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'artifact';

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of output root: ${target}`);
  }
};

export const createFsArtifactStore = (outputRoot: string): ArtifactStore => {
  const root = path.resolve(outputRoot);

  const ensureLayout = async () => {
    await fs.mkdir(root, { recursive: true });
  };

  const saveRunArtifact: ArtifactStore['saveRunArtifact'] = async (runId, kind, data) => {
    const dir = path.join(root, sanitizeSegment(runId));
    guardPath(root, dir);
    await fs.mkdir(dir, { recursive: true });
    const target = path.join(dir, `${sanitizeSegment(kind)}.json`);
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  return { ensureLayout, saveRunArtifact };
};

export const createArtifactStore = (config: AppConfig): ArtifactStore =>
  config.persistence.mode === 'fs' ? createFsArtifactStore(config.persistence.outputRoot) : createNoopArtifactStore();
