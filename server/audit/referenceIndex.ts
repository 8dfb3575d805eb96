import type { NormalizedLink, ReferenceEntry, ReferenceIndexWarning } from '../../shared/types';
import { normalizeEstimateLink } from './estimateNormalizer';
import { normalizeScenarioKey } from './scenarioKey';

/**
 * Read-only lookup from scenario identity to the canonical estimate links the
 * inventory records for it. Built once per run by `buildReferenceIndex`.
 */
export class ReferenceIndex {
  private readonly entries: ReadonlyMap<string, ReadonlySet<NormalizedLink>>;

  constructor(entries: Map<string, Set<NormalizedLink>>) {
    const frozen = new Map<string, ReadonlySet<NormalizedLink>>();
    for (const [key, links] of entries) {
      frozen.set(key, new Set(links));
    }
    this.entries = frozen;
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  has(identityKey: string): boolean {
    return this.entries.has(normalizeScenarioKey(identityKey));
  }

  lookup(identityKey: string): ReadonlySet<NormalizedLink> | undefined {
    return this.entries.get(normalizeScenarioKey(identityKey));
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}

export interface BuildReferenceIndexResult {
  index: ReferenceIndex;
  warnings: ReferenceIndexWarning[];
}

export const buildReferenceIndex = (entries: readonly ReferenceEntry[]): BuildReferenceIndexResult => {
  const warnings: ReferenceIndexWarning[] = [];
  const byKey = new Map<string, Set<NormalizedLink>>();

  entries.forEach((entry, entryIndex) => {
    const key = normalizeScenarioKey(entry.identityKey);
    if (!key) {
      warnings.push({ code: 'empty_reference_entry', identityKey: entry.identityKey, entryIndex });
      return;
    }

    const links = new Set<NormalizedLink>();
    for (const raw of entry.estimateLinks) {
      const normalized = normalizeEstimateLink(raw);
      if (normalized) {
        links.add(normalized);
      } else {
        warnings.push({ code: 'unusable_reference_link', identityKey: key, entryIndex, link: raw });
      }
    }

    if (!links.size) {
      warnings.push({ code: 'empty_reference_entry', identityKey: key, entryIndex });
      return;
    }

    // Last record wins; the collision is reported, never silent.
    if (byKey.has(key)) {
      warnings.push({ code: 'duplicate_identity_key', identityKey: key, entryIndex });
    }
    byKey.set(key, links);
  });

  return { index: new ReferenceIndex(byKey), warnings };
};
