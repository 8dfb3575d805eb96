import type { ScanResultRow, ScenarioResult } from '../../shared/types';

export const toScanResultRow = (result: ScenarioResult): ScanResultRow => {
  const meta = result.metadata;
  return {
    title: meta.title ?? '',
    description: meta.description ?? '',
    azureCategories: (meta.azureCategories ?? []).join('; '),
    'ms.date': meta.msDate ?? '',
    yml_url: result.identityKey,
    image_download_urls: (meta.imageDownloadUrls ?? []).join('\n'),
    estimate_link: result.usableLinks.join('\n'),
    criteria_passed: result.criteriaPassed,
    failure_reason: result.failureReason ?? '',
    comparison_status: result.comparisonStatus,
    extraction_issue: meta.extractionIssue ?? '',
    yml_path: meta.ymlPath ?? '',
    yml_github_url: meta.ymlGithubUrl ?? '',
    include_md_path: meta.includeMdPath ?? '',
    include_md_github_url: meta.includeMdGithubUrl ?? '',
    image_paths: (meta.imagePaths ?? []).join('\n'),
    md_author_name: meta.mdAuthor ?? '',
    md_ms_author_name: meta.mdMsAuthor ?? '',
  };
};

export const toScanResultRows = (results: readonly ScenarioResult[]): ScanResultRow[] => results.map(toScanResultRow);
