/** Prefixes https:// when the input carries no http(s) scheme. */
export function normalizeTargetUrl(input: string): string {
  const trimmed = input.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function originOf(url: string): string | null {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return null;
  }
}

/** File-system safe stem for a URL: scheme and trailing slash dropped, other characters mapped to `_`. */
export function urlToFileStem(url: string): string {
  const stem = url
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/$/, '')
    .replace(/[^a-zA-Z0-9.-]/g, '_');
  return stem.length > 0 ? stem : 'site';
}

/** One URL per line; blank lines and `#` comments are skipped. */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map(normalizeTargetUrl);
}
