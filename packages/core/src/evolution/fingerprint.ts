import type { Fingerprint } from '@sinew/shared';

const ATTR_RE = /(\w[\w:-]*)\s*=\s*(['"])(.*?)\2/gis;
const INPUT_ATTRS = ['type', 'name', 'id', 'autocomplete', 'placeholder', 'aria-label'] as const;
const BUTTON_ATTRS = INPUT_ATTRS.filter(a => a !== 'autocomplete' && a !== 'placeholder');

/**
 * Text-only form fingerprint: URL host and path plus whitelisted
 * `<input>` / `<button>` attribute values, tokenised and sorted.
 * Same input, same output.
 */
export function fingerprint(url: string | undefined, html: string): Fingerprint {
  const { domain, path } = splitUrl(url);
  const tokens = new Set<string>([...tokenize(domain), ...tokenize(path)]);

  for (const attrs of extractTags(html, 'input')) {
    for (const key of INPUT_ATTRS) tokenize(attrs.get(key)).forEach(t => tokens.add(t));
  }
  for (const attrs of extractTags(html, 'button')) {
    for (const key of BUTTON_ATTRS) tokenize(attrs.get(key)).forEach(t => tokens.add(t));
  }

  return { version: 1, domain, path, tokens: [...tokens].sort() };
}

/** |A ∩ B| / |A ∪ B|, 0 for two empty sets. */
export function jaccard(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a);
  const right = new Set(b);
  let shared = 0;
  for (const t of left) if (right.has(t)) shared++;
  const union = left.size + right.size - shared;
  return union === 0 ? 0 : shared / union;
}

export function tokenize(text: string | undefined): string[] {
  if (!text) return [];
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

export function domainOf(url: string | undefined): string {
  return splitUrl(url).domain;
}

function splitUrl(url: string | undefined): { domain: string; path: string } {
  if (!url) return { domain: '', path: '/' };
  try {
    const parsed = new URL(url);
    return { domain: parsed.host.toLowerCase(), path: parsed.pathname || '/' };
  } catch {
    return { domain: '', path: '/' };
  }
}

function extractTags(html: string, tag: string): Map<string, string>[] {
  const tagRe = new RegExp(`<\\s*${tag}\\b([^>]*)>`, 'gi');
  const result: Map<string, string>[] = [];
  for (const match of html.matchAll(tagRe)) {
    const attrs = new Map<string, string>();
    for (const attr of (match[1] ?? '').matchAll(ATTR_RE)) {
      const key = attr[1].toLowerCase();
      const value = attr[3].trim();
      if (value) attrs.set(key, value);
    }
    result.push(attrs);
  }
  return result;
}
