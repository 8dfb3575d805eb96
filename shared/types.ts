export type StageName = 'inventory' | 'extraction' | 'comparison' | 'report';

export type StageStatus = 'start' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export const USABLE_LINK_CATEGORIES = ['azure_experience', 'shared_estimate', 'service_scoped_estimate'] as const;

export type UsableLinkCategory = (typeof USABLE_LINK_CATEGORIES)[number];

export type LinkCategory = UsableLinkCategory | 'calculator_tool_root' | 'other';

export type FailureReason = 'no_estimate_link_calculator_tool_link_only' | 'no_estimate_link';

export type PositiveComparisonStatus =
  | 'matched_existing_scenario_same_estimate'
  | 'matched_existing_scenario_new_estimate'
  | 'new_estimate_candidate';

export type ComparisonStatus = PositiveComparisonStatus | 'not_applicable';

/**
 * Canonical form of a usable estimate URL, as produced by the estimate
 * normalizer. Two usable links identify the same estimate iff these are equal.
 */
export type NormalizedLink = string;

export interface ClassifiedLink {
  raw: string;
  category: LinkCategory;
}

export type ExtractionIssue =
  | 'yaml_parse_failed'
  | 'missing_content_string'
  | 'no_include_directive'
  | 'include_md_unresolvable'
  | 'include_md_missing';

export interface ScenarioMetadata {
  title?: string | null;
  description?: string | null;
  azureCategories?: string[];
  msDate?: string | null;
  ymlPath?: string | null;
  ymlGithubUrl?: string | null;
  includeMdPath?: string | null;
  includeMdGithubUrl?: string | null;
  mdAuthor?: string | null;
  mdMsAuthor?: string | null;
  imagePaths?: string[];
  imageDownloadUrls?: string[];
  extractionIssue?: ExtractionIssue | null;
}

export interface ScenarioInput {
  /** Published article URL. */
  identityKey: string;
  rawLinks: string[];
  metadata?: ScenarioMetadata;
}

interface ScenarioResultBase {
  identityKey: string;
  links: ClassifiedLink[];
  metadata: ScenarioMetadata;
}

export interface PassedScenarioResult extends ScenarioResultBase {
  criteriaPassed: true;
  failureReason?: undefined;
  /** Original text of the usable links, in discovery order. */
  usableLinks: string[];
  normalizedEstimateLinks: NormalizedLink[];
  comparisonStatus: PositiveComparisonStatus;
}

export interface FailedScenarioResult extends ScenarioResultBase {
  criteriaPassed: false;
  failureReason: FailureReason;
  usableLinks: [];
  normalizedEstimateLinks: [];
  comparisonStatus: 'not_applicable';
}

export type ScenarioResult = PassedScenarioResult | FailedScenarioResult;

export interface ReferenceEntry {
  identityKey: string;
  estimateLinks: string[];
}

export type ReferenceIndexWarningCode = 'duplicate_identity_key' | 'unusable_reference_link' | 'empty_reference_entry';

export interface ReferenceIndexWarning {
  code: ReferenceIndexWarningCode;
  identityKey: string;
  /** Position of the offending record in the inventory. */
  entryIndex: number;
  link?: string;
}

/** One row of the scan report, named the way the spreadsheet columns are. */
export interface ScanResultRow {
  title: string;
  description: string;
  azureCategories: string;
  'ms.date': string;
  yml_url: string;
  image_download_urls: string;
  estimate_link: string;
  criteria_passed: boolean;
  failure_reason: FailureReason | '';
  comparison_status: ComparisonStatus;
  extraction_issue: ExtractionIssue | '';
  yml_path: string;
  yml_github_url: string;
  include_md_path: string;
  include_md_github_url: string;
  image_paths: string;
  md_author_name: string;
  md_ms_author_name: string;
}

export interface AuditSummary {
  totalScenarios: number;
  criteriaPassed: number;
  criteriaFailed: number;
  failureReasons: Record<FailureReason, number>;
  comparisonStatuses: Record<ComparisonStatus, number>;
  matchedInventoryScenarios: number;
  extractionIssues: Record<ExtractionIssue, number>;
  needsReview: number;
  indexWarnings: number;
  scanDate: string;
  repoCommit: string;
}

export interface AuditRunResult {
  runId: string;
  results: ScenarioResult[];
  needsReview: ScenarioResult[];
  summary: AuditSummary;
  warnings: ReferenceIndexWarning[];
}

export interface ApiHealthResponse {
  ok: boolean;
  ts: string;
}
