import type { FailureReason, LinkCategory } from '../../shared/types';
import { isUsableCategory } from './linkClassifier';

export type CriteriaVerdict =
  | { criteriaPassed: true; failureReason?: undefined }
  | { criteriaPassed: false; failureReason: FailureReason };

export const evaluateCriteria = (categories: readonly LinkCategory[]): CriteriaVerdict => {
  if (categories.some(isUsableCategory)) {
    return { criteriaPassed: true };
  }
  if (categories.includes('calculator_tool_root')) {
    return { criteriaPassed: false, failureReason: 'no_estimate_link_calculator_tool_link_only' };
  }
  return { criteriaPassed: false, failureReason: 'no_estimate_link' };
};
