import path from 'node:path';

const MD_INLINE_IMG_RE = /!\[[^\]]*\]\(([^)]+)\)/g;
const MD_REF_IMG_USE_RE = /!\[[^\]]*\]\[([^\]]+)\]/g;
const MD_REF_DEF_RE = /^\[([^\]]+)\]:\s*(\S+)/gim;
const DOCS_IMAGE_BLOCK_RE = /^\s*:::image\b[^\n]*/gim;
const DOCS_IMAGE_SOURCE_RE = /\bsource\s*=\s*(?:"([^"]+)"|'([^']+)'|([^\s>]+))/i;
const HTML_IMG_SRC_RE = /<img[^>]+\bsrc\s*=\s*(?:"([^"]+)"|'([^']+)'|([^\s>]+))/gi;
const HTML_SOURCE_SRCSET_RE = /<source[^>]+\bsrcset\s*=\s*(?:"([^"]+)"|'([^']+)'|([^\s>]+))/gi;
const THUMB_EXCLUDE_RE = /(\/browse\/thumbs\/|\bthumbs\/|thumbnail|social_image|\/icons\/)/i;
const SCHEME_RE = /^[a-zA-Z]+:\/\//;

const firstGroup = (match: RegExpMatchArray | RegExpExecArray): string => match[1] || match[2] || match[3] || '';

const trimChars = (value: string, chars: string): string => {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start += 1;
  while (end > start && chars.includes(value[end - 1])) end -= 1;
  return value.slice(start, end);
};

/** Unwraps `<...>`, keeps the first token (drops Markdown titles) and strips quotes and brackets. */
export const cleanRef = (ref: string | null | undefined): string => {
  let value = (ref || '').trim();
  if (value.startsWith('<') && value.endsWith('>')) {
    value = value.slice(1, -1).trim();
  }
  value = value.split(/\s+/)[0] ?? '';
  return trimChars(trimChars(trimChars(value, '"'), "'").trim(), '()<>[]');
};

export const stripQueryFragment = (value: string): string => value.split('#', 1)[0].split('?', 1)[0];

/**
 * Resolves a relative reference against `baseDir` and returns it relative to
 * the repository root in POSIX form. Absolute URLs and references that escape
 * the repository yield null.
 */
export const resolveRepoRel = (baseDir: string, ref: string, repoRoot: string): string | null => {
  let cleaned = cleanRef(ref);
  if (!cleaned || SCHEME_RE.test(cleaned)) {
    return null;
  }
  cleaned = stripQueryFragment(cleaned);
  while (cleaned.startsWith('./')) {
    cleaned = cleaned.slice(2);
  }
  cleaned = cleaned.replace(/^\/+/, '');
  if (!cleaned) {
    return null;
  }
  const resolved = path.resolve(baseDir, cleaned);
  const relative = path.relative(path.resolve(repoRoot), resolved);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return relative.split(path.sep).join('/');
};

const extractReferenceMap = (markdown: string): Map<string, string> => {
  const map = new Map<string, string>();
  for (const match of markdown.matchAll(MD_REF_DEF_RE)) {
    map.set(match[1].trim().toLowerCase(), cleanRef(match[2]));
  }
  return map;
};

/**
 * Image references in Markdown, whatever the syntax: inline and
 * reference-style images, `:::image` blocks, `<img>` and `<source srcset>`.
 * Thumbnails and icons are skipped. Order of first appearance, no duplicates.
 */
export const extractImageRefs = (markdown: string): string[] => {
  const refs: string[] = [];
  const add = (raw: string) => {
    const cleaned = cleanRef(raw);
    if (!cleaned || THUMB_EXCLUDE_RE.test(cleaned)) return;
    refs.push(cleaned);
  };

  for (const match of markdown.matchAll(MD_INLINE_IMG_RE)) {
    add(match[1]);
  }

  for (const block of markdown.matchAll(DOCS_IMAGE_BLOCK_RE)) {
    const source = block[0].match(DOCS_IMAGE_SOURCE_RE);
    if (source) add(firstGroup(source));
  }

  for (const match of markdown.matchAll(HTML_IMG_SRC_RE)) {
    add(firstGroup(match));
  }

  for (const match of markdown.matchAll(HTML_SOURCE_SRCSET_RE)) {
    // First candidate of the srcset, without its width/density descriptor.
    const first = firstGroup(match).split(',')[0].trim().split(/\s+/)[0] ?? '';
    add(first);
  }

  const refMap = extractReferenceMap(markdown);
  for (const match of markdown.matchAll(MD_REF_IMG_USE_RE)) {
    const target = refMap.get(match[1].trim().toLowerCase());
    if (target) add(target);
  }

  return Array.from(new Set(refs));
};
