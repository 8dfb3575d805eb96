export type AuditArtifactKind = 'scan_results' | 'needs_review' | 'summary' | 'index_warnings';

export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  /** Writes `{runId}/{kind}.json` and returns its path, or '' when nothing is stored. */
  saveRunArtifact: (runId: string, kind: AuditArtifactKind, data: unknown) => Promise<string>;
}

export const createNoopArtifactStore = (): ArtifactStore => ({
  ensureLayout: async () => {},
  saveRunArtifact: async () => '',
});
