/**
 * Join key for scenarios: the published article URL with scheme and host
 * lower-cased, query and fragment dropped and trailing slashes removed.
 * Strings that do not parse as URLs are only trimmed.
 */
export const normalizeScenarioKey = (identityKey: string): string => {
  const trimmed = identityKey.trim();
  if (!trimmed) return '';
  try {
    const url = new URL(trimmed);
    return `${url.protocol}//${url.host}${url.pathname.replace(/\/+$/, '')}`;
  } catch {
    return trimmed.replace(/\/+$/, '');
  }
};
