import type { NormalizedLink, PositiveComparisonStatus } from '../../shared/types';
import type { ReferenceIndex } from './referenceIndex';

/**
 * Compares a passing scenario's normalized links with the inventory. Any one
 * shared link counts as a match.
 */
export const compareScenario = (
  identityKey: string,
  normalizedLinks: readonly NormalizedLink[],
  index: ReferenceIndex,
): PositiveComparisonStatus => {
  const reference = index.lookup(identityKey);
  if (!reference) {
    return 'new_estimate_candidate';
  }
  return normalizedLinks.some((link) => reference.has(link))
    ? 'matched_existing_scenario_same_estimate'
    : 'matched_existing_scenario_new_estimate';
};
