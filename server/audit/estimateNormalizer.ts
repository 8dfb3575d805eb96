import type { NormalizedLink, UsableLinkCategory } from '../../shared/types';
import {
  SERVICE_PARAM,
  SHARED_ESTIMATE_PARAM,
  classifyParsedLink,
  isUsableCategory,
  parseHttpUrl,
} from './linkClassifier';

const identityParamFor = (category: UsableLinkCategory): string => {
  switch (category) {
    case 'azure_experience':
    case 'shared_estimate':
      return SHARED_ESTIMATE_PARAM;
    case 'service_scoped_estimate':
      return SERVICE_PARAM;
  }
};

const decodeQueryComponent = (value: string): string | null => {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    return null;
  }
};

/**
 * `name=value` for the first non-blank value of the parameter, name matched
 * case-insensitively. A value with malformed percent-escapes is kept as
 * written, since decoding it would map different values onto U+FFFD.
 */
const identityQuery = (url: URL, name: string): string => {
  const pairs = url.search.replace(/^\?/, '').split('&');
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    const rawKey = eq === -1 ? pair : pair.slice(0, eq);
    const rawValue = eq === -1 ? '' : pair.slice(eq + 1);
    if ((decodeQueryComponent(rawKey) ?? rawKey).toLowerCase() !== name) continue;

    const decoded = decodeQueryComponent(rawValue);
    if (decoded === null) {
      return `?${name}=${rawValue.trim()}`;
    }
    const trimmed = decoded.trim();
    if (trimmed) {
      return `?${new URLSearchParams([[name, trimmed]]).toString()}`;
    }
  }
  return '';
};

/**
 * Canonical form of a usable estimate link: lower-cased scheme and host, no
 * trailing slash, and only the parameter that identifies the estimate. Returns
 * null for links that are not usable estimate links.
 */
export const normalizeEstimateLink = (raw: string): NormalizedLink | null => {
  const url = parseHttpUrl(raw);
  if (!url) return null;

  const category = classifyParsedLink(url);
  if (!isUsableCategory(category)) return null;

  const path = url.pathname.replace(/\/+$/, '');
  const query = identityQuery(url, identityParamFor(category));

  return `${url.protocol}//${url.host}${path}${query}`;
};

/** Normalized links of the usable inputs, first occurrence order, no duplicates. */
export const normalizeEstimateLinks = (raws: readonly string[]): NormalizedLink[] => {
  const seen = new Set<NormalizedLink>();
  const out: NormalizedLink[] = [];
  for (const raw of raws) {
    const normalized = normalizeEstimateLink(raw);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    out.push(normalized);
  }
  return out;
};
