import type { ComparisonStatus } from '../../shared/types';

export const NEEDS_REVIEW_STATUSES: ReadonlySet<ComparisonStatus> = new Set<ComparisonStatus>([
  'matched_existing_scenario_new_estimate',
  'new_estimate_candidate',
]);

export const needsReview = (status: ComparisonStatus): boolean => NEEDS_REVIEW_STATUSES.has(status);

export const collectNeedsReview = <T extends { comparisonStatus: ComparisonStatus }>(scenarios: readonly T[]): T[] =>
  scenarios.filter((scenario) => needsReview(scenario.comparisonStatus));
