import type { ScenarioInput, ScenarioResult } from '../../shared/types';
import { classifyLinks, isUsableCategory } from './linkClassifier';
import { evaluateCriteria } from './criteria';
import { normalizeEstimateLinks } from './estimateNormalizer';
import { compareScenario } from './comparator';
import type { ReferenceIndex } from './referenceIndex';

const uniqueInOrder = (values: string[]): string[] => Array.from(new Set(values));

/** Classify, evaluate, normalize and compare one scenario. Never throws on link content. */
export const evaluateScenario = (input: ScenarioInput, index: ReferenceIndex): ScenarioResult => {
  const links = classifyLinks(input.rawLinks);
  const metadata = input.metadata ?? {};
  const verdict = evaluateCriteria(links.map((link) => link.category));

  if (!verdict.criteriaPassed) {
    return {
      identityKey: input.identityKey,
      links,
      metadata,
      criteriaPassed: false,
      failureReason: verdict.failureReason,
      usableLinks: [],
      normalizedEstimateLinks: [],
      comparisonStatus: 'not_applicable',
    };
  }

  const usableLinks = uniqueInOrder(
    links.filter((link) => isUsableCategory(link.category)).map((link) => link.raw),
  );
  const normalizedEstimateLinks = normalizeEstimateLinks(usableLinks);

  return {
    identityKey: input.identityKey,
    links,
    metadata,
    criteriaPassed: true,
    usableLinks,
    normalizedEstimateLinks,
    comparisonStatus: compareScenario(input.identityKey, normalizedEstimateLinks, index),
  };
};
