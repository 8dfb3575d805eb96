import {
  USABLE_LINK_CATEGORIES,
  type ClassifiedLink,
  type LinkCategory,
  type UsableLinkCategory,
} from '../../shared/types';

export const EXPERIENCE_HOST = 'azure.com';
export const EXPERIENCE_PATH_PREFIX = '/e/';
export const CALCULATOR_HOST = 'azure.microsoft.com';

export const SHARED_ESTIMATE_PARAM = 'shared-estimate';
export const SERVICE_PARAM = 'service';

// Optional locale segment (en-us) and optional trailing slash.
const CALCULATOR_PATH_RE = /^\/(?:[a-z]{2}-[a-z]{2}\/)?pricing\/calculator\/?$/i;

export const parseHttpUrl = (raw: string): URL | null => {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }
  return url;
};

/**
 * First non-empty value of a query parameter, matching the name
 * case-insensitively. Returns null when the parameter is absent or blank.
 */
export const firstParamValue = (url: URL, name: string): string | null => {
  const wanted = name.toLowerCase();
  for (const [key, value] of url.searchParams) {
    if (key.toLowerCase() !== wanted) continue;
    const trimmed = value.trim();
    if (trimmed) return trimmed;
  }
  return null;
};

const isExperienceLink = (url: URL): boolean => {
  if (url.hostname !== EXPERIENCE_HOST) return false;
  const path = url.pathname;
  if (!path.toLowerCase().startsWith(EXPERIENCE_PATH_PREFIX)) return false;
  return path.slice(EXPERIENCE_PATH_PREFIX.length).replace(/\/+$/, '').length > 0;
};

export const isCalculatorUrl = (url: URL): boolean =>
  url.hostname === CALCULATOR_HOST && CALCULATOR_PATH_RE.test(url.pathname);

export const classifyParsedLink = (url: URL): LinkCategory => {
  if (isExperienceLink(url)) {
    return 'azure_experience';
  }
  if (!isCalculatorUrl(url)) {
    return 'other';
  }
  if (firstParamValue(url, SHARED_ESTIMATE_PARAM)) {
    return 'shared_estimate';
  }
  if (firstParamValue(url, SERVICE_PARAM)) {
    return 'service_scoped_estimate';
  }
  return 'calculator_tool_root';
};

export const classifyLink = (raw: string): LinkCategory => {
  const url = parseHttpUrl(raw);
  return url ? classifyParsedLink(url) : 'other';
};

export const classifyLinks = (raws: readonly string[]): ClassifiedLink[] =>
  raws.map((raw) => ({ raw, category: classifyLink(raw) }));

export const isUsableCategory = (category: LinkCategory): category is UsableLinkCategory =>
  USABLE_LINK_CATEGORIES.some((usable) => usable === category);
