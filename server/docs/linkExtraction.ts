// Experience links (azure.com/e/...) and every pricing calculator link, with or
// without a locale segment. A link ends at whitespace, a closing bracket,
// a backslash, a quote or an angle bracket.
const ESTIMATE_CANDIDATE_RE =
  /https?:\/\/(?:azure\.com\/e\/[^\s)\]\\"'<>]+|azure\.microsoft\.com\/(?:[a-z]{2}-[a-z]{2}\/)?pricing\/calculator[^\s)\]\\"'<>]*)/gi;

const TRAILING_PUNCTUATION_RE = /[.,;:!]+$/;
// Query separators escaped in HTML attributes (href="...?a=1&amp;b=2").
const HTML_AMP_RE = /&amp;/gi;

/**
 * Raw estimate-link candidates found in Markdown text, in discovery order,
 * without duplicates. Classification happens later; this only finds strings.
 */
export const extractEstimateLinkCandidates = (markdown: string): string[] => {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const match of markdown.matchAll(ESTIMATE_CANDIDATE_RE)) {
    const link = match[0].replace(HTML_AMP_RE, '&').replace(TRAILING_PUNCTUATION_RE, '');
    if (!link || seen.has(link)) continue;
    seen.add(link);
    out.push(link);
  }
  return out;
};
