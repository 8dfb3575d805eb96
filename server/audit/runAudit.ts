import type {
  AuditRunResult,
  AuditSummary,
  ComparisonStatus,
  ExtractionIssue,
  FailureReason,
  ReferenceIndexWarning,
  ScenarioInput,
  ScenarioResult,
} from '../../shared/types';
import { randomId } from '../../shared/crypto';
import { evaluateScenario } from './evaluateScenario';
import { collectNeedsReview } from './reviewCollector';
import type { ReferenceIndex } from './referenceIndex';

export interface RunAuditOptions {
  runId?: string;
  warnings?: ReferenceIndexWarning[];
  repoCommit?: string;
  now?: Date;
}

const emptyFailureCounts = (): Record<FailureReason, number> => ({
  no_estimate_link_calculator_tool_link_only: 0,
  no_estimate_link: 0,
});

const emptyIssueCounts = (): Record<ExtractionIssue, number> => ({
  yaml_parse_failed: 0,
  missing_content_string: 0,
  no_include_directive: 0,
  include_md_unresolvable: 0,
  include_md_missing: 0,
});

const emptyStatusCounts = (): Record<ComparisonStatus, number> => ({
  matched_existing_scenario_same_estimate: 0,
  matched_existing_scenario_new_estimate: 0,
  new_estimate_candidate: 0,
  not_applicable: 0,
});

export const summarizeResults = (
  results: readonly ScenarioResult[],
  options: { needsReview: number; indexWarnings: number; repoCommit: string; now: Date },
): AuditSummary => {
  const failureReasons = emptyFailureCounts();
  const comparisonStatuses = emptyStatusCounts();
  const extractionIssues = emptyIssueCounts();
  let criteriaPassed = 0;

  for (const result of results) {
    comparisonStatuses[result.comparisonStatus] += 1;
    const issue = result.metadata.extractionIssue;
    if (issue) {
      extractionIssues[issue] += 1;
    }
    if (result.criteriaPassed) {
      criteriaPassed += 1;
    } else {
      failureReasons[result.failureReason] += 1;
    }
  }

  return {
    totalScenarios: results.length,
    criteriaPassed,
    criteriaFailed: results.length - criteriaPassed,
    failureReasons,
    comparisonStatuses,
    matchedInventoryScenarios:
      comparisonStatuses.matched_existing_scenario_same_estimate +
      comparisonStatuses.matched_existing_scenario_new_estimate,
    extractionIssues,
    needsReview: options.needsReview,
    indexWarnings: options.indexWarnings,
    scanDate: options.now.toISOString(),
    repoCommit: options.repoCommit,
  };
};

/**
 * Evaluates every scenario against a fully built index. Scenarios are
 * independent; results keep input order.
 */
export const runAudit = (
  inputs: readonly ScenarioInput[],
  index: ReferenceIndex,
  options: RunAuditOptions = {},
): AuditRunResult => {
  const results = inputs.map((input) => evaluateScenario(input, index));
  const needsReview = collectNeedsReview(results);
  const warnings = options.warnings ?? [];

  return {
    runId: options.runId ?? randomId(),
    results,
    needsReview,
    summary: summarizeResults(results, {
      needsReview: needsReview.length,
      indexWarnings: warnings.length,
      repoCommit: options.repoCommit ?? 'local',
      now: options.now ?? new Date(),
    }),
    warnings,
  };
};
